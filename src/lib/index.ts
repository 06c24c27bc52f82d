/**
 * Real-time inspection session engine
 *
 * Capture frames from a live device on a fixed cadence, submit each one to a
 * defect-detection service, and keep running statistics that are persisted
 * and summarised into reports.
 *
 * @module inspection-session-engine
 */

export * from './session';
export * from './capture';
export * from './analysis';
export * from './stats';
export * from './persistence';
export {
	DEFAULT_SESSION_CONFIG,
	DEFAULT_ANALYSIS_CLIENT_CONFIG,
	assertCaptureInterval,
	resolveSessionConfig,
	loadAnalysisClientConfig,
	type AnalysisClientConfig
} from './config/engineConfig';
