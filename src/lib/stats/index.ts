/**
 * Stats Module - Running statistics and session reports
 *
 * @module stats
 */

export {
	ResultAggregator,
	computeSessionStatistics,
	type AggregatorWindow
} from './ResultAggregator';

export {
	buildReport,
	DEFAULT_REPORT_OPTIONS,
	DEFAULT_DEFECT_EXPLANATION,
	type ReportOptions,
	type TrendGranularity,
	type DefectCatalog,
	type SessionReport,
	type ReportSummary,
	type TrendBucket,
	type DistributionEntry,
	type DefectTypeEntry,
	type ConfidenceLevelEntry,
	type StageBreakdown,
	type HistogramBucket,
	type HourlyPattern,
	type ReportedDefect
} from './SessionReportBuilder';

export {
	roundTo,
	percentage,
	formatDuration,
	formatDefectLabel,
	utcDayKey,
	utcHourKey,
	utcHourOfDay
} from './format';
