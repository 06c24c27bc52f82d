/**
 * Session Module - Lifecycle, per-session context and registry
 *
 * @module session
 */

export {
	InspectionSession,
	type InspectionSessionDeps,
	type InspectionSessionEvents,
	type InspectionSessionEventType
} from './InspectionSession';

export { InspectionSessionManager, type SessionManagerDeps } from './InspectionSessionManager';

export {
	SessionStateMachine,
	VALID_TRANSITIONS,
	canTransition,
	isTerminal,
	type LifecycleListener
} from './SessionStateMachine';

export * from './errors';
export * from './types';
