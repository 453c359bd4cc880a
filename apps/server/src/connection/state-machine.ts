export type ConnectionState = 'new' | 'negotiating' | 'connected' | 'disconnected' | 'failed' | 'closed';

export type ConnectionEvent =
	| { type: 'offer' }
	| { type: 'transport'; state: 'connected' | 'disconnected' | 'failed' | 'closed' }
	| { type: 'error'; error: unknown }
	| { type: 'graceExpired' }
	| { type: 'stop' };

type TransportEvent = Extract<ConnectionEvent, { type: 'transport' }>;

function onTransport(state: ConnectionState, reported: TransportEvent['state']): ConnectionState {
	switch (reported) {
		case 'connected':
			// disconnected -> connected is the transport's own ICE recovery
			return state === 'negotiating' || state === 'disconnected' ? 'connected' : state;
		case 'disconnected':
			return state === 'connected' ? 'disconnected' : state;
		case 'failed':
			return 'failed';
		case 'closed':
			return 'closed';
	}
}

/**
 * The only place connection states change. Events that do not apply to the
 * current state return it unchanged; `closed` absorbs everything.
 */
export function transition(state: ConnectionState, event: ConnectionEvent): ConnectionState {
	if (state === 'closed') return state;

	switch (event.type) {
		case 'offer':
			return state === 'new' ? 'negotiating' : state;
		case 'transport':
			return onTransport(state, event.state);
		case 'error':
			return 'failed';
		case 'graceExpired':
			return state === 'disconnected' || state === 'failed' ? 'closed' : state;
		case 'stop':
			return 'closed';
	}
}

// States that close on their own once the grace period runs out
export function awaitsGrace(state: ConnectionState): boolean {
	return state === 'disconnected' || state === 'failed';
}
