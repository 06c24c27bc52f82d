/**
 * Capture Module - Device access and interval-driven capture
 *
 * Components:
 * - FrameSource: device collaborator contract
 * - ExclusiveFrameSource: one lease per device across sessions
 * - CaptureScheduler: skip-on-busy periodic capture
 *
 * @module capture
 */

export { ExclusiveFrameSource, type FrameSource, type RawImage } from './FrameSource';

export {
	CaptureScheduler,
	DEFAULT_SCHEDULER_CONFIG,
	type SchedulerConfig,
	type SchedulerStats,
	type TickOutcome,
	type CaptureSchedulerDeps
} from './CaptureScheduler';
