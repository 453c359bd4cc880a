import { describe, expect, it } from 'vitest';
import { awaitsGrace, transition } from './state-machine';
import type { ConnectionEvent, ConnectionState } from './state-machine';

const connected: ConnectionEvent = { type: 'transport', state: 'connected' };
const disconnected: ConnectionEvent = { type: 'transport', state: 'disconnected' };
const failed: ConnectionEvent = { type: 'transport', state: 'failed' };

describe('transition', () => {
	it.each<[ConnectionState, ConnectionEvent, ConnectionState]>([
		['new', { type: 'offer' }, 'negotiating'],
		['negotiating', connected, 'connected'],
		['connected', disconnected, 'disconnected'],
		['disconnected', connected, 'connected'],
		['disconnected', { type: 'graceExpired' }, 'closed'],
		['failed', { type: 'graceExpired' }, 'closed'],
		['new', failed, 'failed'],
		['negotiating', { type: 'error', error: new Error('sdp') }, 'failed'],
		['connected', failed, 'failed'],
		['disconnected', failed, 'failed'],
		['connected', { type: 'stop' }, 'closed'],
		['new', { type: 'stop' }, 'closed'],
		['connected', { type: 'transport', state: 'closed' }, 'closed'],
	])('%s + %o -> %s', (from, event, to) => {
		expect(transition(from, event)).toBe(to);
	});

	it.each<[ConnectionState, ConnectionEvent]>([
		['negotiating', { type: 'offer' }],
		['connected', { type: 'offer' }],
		['new', connected],
		['negotiating', disconnected],
		['failed', connected],
		['connected', { type: 'graceExpired' }],
		['negotiating', { type: 'graceExpired' }],
	])('ignores %o in %s', (from, event) => {
		expect(transition(from, event)).toBe(from);
	});

	it('never leaves closed', () => {
		const events: ConnectionEvent[] = [{ type: 'offer' }, connected, failed, { type: 'error', error: null }, { type: 'stop' }];
		for (const event of events) {
			expect(transition('closed', event)).toBe('closed');
		}
	});

	it('arms the grace period only for disconnected and failed', () => {
		const states: ConnectionState[] = ['new', 'negotiating', 'connected', 'disconnected', 'failed', 'closed'];
		expect(states.filter(awaitsGrace)).toEqual(['disconnected', 'failed']);
	});
});
