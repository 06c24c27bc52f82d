/**
 * SessionStateMachine Property-Based Tests
 *
 * Properties tested:
 * 1. State after any call sequence matches a reference model
 * 2. A device handle is held exactly while active or paused
 * 3. Every acquired handle is released once a terminal state is reached
 * 4. Terminal states never change
 */

import { describe, expect } from 'vitest';
import { fc, test as fcTest } from '@fast-check/vitest';
import { SessionStateMachine } from '$lib/session/SessionStateMachine';
import type { SessionState } from '$lib/session/types';
import { sessionActionArbitrary } from '../../arbitraries';
import { FakeFrameSource } from '../../helpers';

type Action = 'start' | 'pause' | 'resume' | 'stop' | 'abort';

function expectedNext(state: SessionState, action: Action): SessionState {
	switch (action) {
		case 'start':
			return state === 'idle' ? 'active' : state;
		case 'pause':
			return state === 'active' ? 'paused' : state;
		case 'resume':
			return state === 'paused' ? 'active' : state;
		case 'stop':
			return state === 'active' || state === 'paused' ? 'stopped' : state;
		case 'abort':
			return state === 'stopped' || state === 'aborted' ? state : 'aborted';
	}
}

async function apply(machine: SessionStateMachine<unknown>, action: Action): Promise<void> {
	try {
		switch (action) {
			case 'start':
				await machine.start();
				break;
			case 'pause':
				machine.pause();
				break;
			case 'resume':
				machine.resume();
				break;
			case 'stop':
				machine.stop();
				break;
			case 'abort':
				machine.abort('property test');
				break;
		}
	} catch (err) {
		// rejected transitions leave the state alone; checked by the caller
		expect(err).toBeInstanceOf(Error);
	}
}

describe('SessionStateMachine properties', () => {
	fcTest.prop([fc.array(sessionActionArbitrary, { maxLength: 30 })])(
		'state follows the reference model',
		async (actions) => {
			const source = new FakeFrameSource();
			const machine = new SessionStateMachine(source, 'cam-1');
			let model: SessionState = 'idle';

			for (const action of actions) {
				await apply(machine, action);
				model = expectedNext(model, action);
				expect(machine.state).toBe(model);

				const holdsDevice = model === 'active' || model === 'paused';
				expect(machine.handle !== null).toBe(holdsDevice);
			}
		}
	);

	fcTest.prop([fc.array(sessionActionArbitrary, { maxLength: 30 })])(
		'every acquired handle is released after stop',
		async (actions) => {
			const source = new FakeFrameSource();
			const machine = new SessionStateMachine(source, 'cam-1');

			for (const action of actions) {
				await apply(machine, action);
			}
			machine.abort('end of run');
			await machine.whenReleased();

			expect(source.released).toHaveLength(source.acquire.mock.calls.length);
			expect(machine.isTerminal).toBe(true);
		}
	);
});
