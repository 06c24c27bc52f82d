/**
 * Analysis Module - Frame submission and the detection service client
 *
 * @module analysis
 */

export {
	SubmissionPipeline,
	DEFAULT_PIPELINE_CONFIG,
	type AnalysisCollaborator,
	type AnalyzeOptions,
	type CapturedFrame,
	type FrameSink,
	type SinkVerdict,
	type PipelineConfig,
	type PipelineCounters,
	type SubmissionOutcome,
	type SubmissionFailedListener
} from './SubmissionPipeline';

export {
	HttpAnalysisClient,
	FRAME_ENDPOINT,
	HEALTH_ENDPOINT,
	type HttpAnalysisClientOptions
} from './HttpAnalysisClient';

export {
	validateAnalysisResult,
	parseDetectionResponse,
	DEFECT_DEFAULTS,
	DEFAULT_CONFIDENCE_LEVEL,
	type AnalysisResult
} from './AnalysisResultSchema';
