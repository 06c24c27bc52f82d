/**
 * SessionStateMachine - Single source of truth for session lifecycle
 *
 * Replaces loose `isPaused` / `sessionActive` flags with one state value and
 * explicit transition functions:
 *
 *   idle ──start──▶ active ──pause──▶ paused
 *                    ▲   ◀──resume──   │
 *                    │                 │
 *                  stop/abort       stop/abort
 *                    ▼                 ▼
 *               stopped | aborted (terminal)
 *
 * The machine also owns the capture device handle: it is acquired only by
 * `start()` and released only by `stop()` / `abort()`.
 *
 * @module session/SessionStateMachine
 */

import type { FrameSource } from '$lib/capture/FrameSource';
import {
	DeviceUnavailableError,
	InvalidTransitionError,
	errorMessage
} from './errors';
import type { LifecycleEvent, LifecycleEventType, SessionState } from './types';

/**
 * Callback invoked after every transition
 */
export type LifecycleListener = (event: LifecycleEvent) => void;

/**
 * Valid state transitions. Anything not listed here is rejected.
 */
export const VALID_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map([
	['idle', ['active', 'aborted']],
	['active', ['paused', 'stopped', 'aborted']],
	['paused', ['active', 'stopped', 'aborted']],
	['stopped', []],
	['aborted', []]
]);

export function canTransition(from: SessionState, to: SessionState): boolean {
	return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export function isTerminal(state: SessionState): boolean {
	return state === 'stopped' || state === 'aborted';
}

/**
 * SessionStateMachine - Lifecycle and device ownership for one session
 *
 * @example
 * ```typescript
 * const machine = new SessionStateMachine(cameraSource, 'line-3-camera');
 * machine.on((event) => console.log(event.type));
 *
 * await machine.start();   // acquires the device, emits 'started'
 * machine.pause();         // emits 'paused'
 * machine.resume();        // emits 'resumed'
 * machine.stop();          // releases the device, emits 'stopped'
 * ```
 */
export class SessionStateMachine<H = unknown> {
	private readonly source: FrameSource<H>;
	private readonly sourceId: string;
	private readonly listeners = new Set<LifecycleListener>();
	private readonly clock: () => number;

	private _state: SessionState = 'idle';
	private _handle: H | null = null;
	private _abortReason: string | null = null;
	private acquiring = false;
	private released: Promise<void> = Promise.resolve();

	constructor(source: FrameSource<H>, sourceId: string, clock: () => number = Date.now) {
		this.source = source;
		this.sourceId = sourceId;
		this.clock = clock;
	}

	/** Current state */
	get state(): SessionState {
		return this._state;
	}

	/** Device handle while active or paused */
	get handle(): H | null {
		return this._handle;
	}

	/** Reason given to abort(), if aborted */
	get abortReason(): string | null {
		return this._abortReason;
	}

	get isActive(): boolean {
		return this._state === 'active';
	}

	get isTerminal(): boolean {
		return isTerminal(this._state);
	}

	/**
	 * Subscribe to lifecycle events
	 *
	 * @returns Unsubscribe function
	 */
	on(listener: LifecycleListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Acquire the device and move idle → active
	 *
	 * @throws DeviceUnavailableError if acquisition fails (state stays idle)
	 * @throws InvalidTransitionError if not idle or a start is already pending
	 */
	async start(): Promise<void> {
		if (this._state !== 'idle' || this.acquiring) {
			throw new InvalidTransitionError(this.acquiring ? 'starting' : this._state, 'start');
		}

		this.acquiring = true;
		let handle: H;
		try {
			handle = await this.source.acquire(this.sourceId);
		} catch (err) {
			console.warn(`[SessionStateMachine] Device acquisition failed: ${errorMessage(err)}`);
			if (err instanceof DeviceUnavailableError) throw err;
			throw new DeviceUnavailableError(this.sourceId, undefined, { cause: err });
		} finally {
			this.acquiring = false;
		}

		// abort() may have run while we were waiting on the device
		if (this._state !== 'idle') {
			this.released = this.releaseHandle(handle);
			throw new InvalidTransitionError(this._state, 'start');
		}

		this._handle = handle;
		this.transition('active', 'started');
	}

	/**
	 * active → paused
	 */
	pause(): void {
		this.assertCan('paused', 'pause');
		this.transition('paused', 'paused');
	}

	/**
	 * paused → active
	 */
	resume(): void {
		this.assertCan('active', 'resume');
		this.transition('active', 'resumed');
	}

	/**
	 * active | paused → stopped. Releases the device.
	 *
	 * No-op when already terminal.
	 */
	stop(): void {
		if (this.isTerminal) return;
		this.assertCan('stopped', 'stop');

		this.transition('stopped', 'stopped');
		this.releaseDevice();
	}

	/**
	 * Any non-terminal state → aborted. Releases the device if held.
	 *
	 * No-op when already terminal.
	 */
	abort(reason: string): void {
		if (this.isTerminal) return;

		this._abortReason = reason;
		this.transition('aborted', 'aborted', reason);
		this.releaseDevice();
	}

	/**
	 * Resolves once any pending device release has finished
	 */
	whenReleased(): Promise<void> {
		return this.released;
	}

	private assertCan(to: SessionState, action: string): void {
		if (!canTransition(this._state, to)) {
			throw new InvalidTransitionError(this._state, action);
		}
	}

	private transition(to: SessionState, type: LifecycleEventType, reason?: string): void {
		const from = this._state;
		this._state = to;

		const event: LifecycleEvent = { type, from, to, at: this.clock() };
		if (reason !== undefined) event.reason = reason;

		console.log(
			`[SessionStateMachine] ${from} -> ${to}${reason !== undefined ? ` (${reason})` : ''}`
		);

		for (const listener of [...this.listeners]) {
			try {
				listener(event);
			} catch (err) {
				console.error('[SessionStateMachine] Lifecycle listener error:', errorMessage(err));
			}
		}
	}

	private releaseDevice(): void {
		const handle = this._handle;
		this._handle = null;
		if (handle !== null) {
			this.released = this.releaseHandle(handle);
		}
	}

	private async releaseHandle(handle: H): Promise<void> {
		try {
			await this.source.release(handle);
		} catch (err) {
			console.error('[SessionStateMachine] Device release failed:', errorMessage(err));
		}
	}
}
