import type { SessionDescriptionPayload } from '@rtc-detect/shared';
import type { BackChannel } from '../pipeline/result-broadcaster';

// Connection-level states reported by the underlying peer connection
export type TransportState = 'new' | 'connecting' | 'connected' | 'disconnected' | 'failed' | 'closed';

export type Unsubscribe = () => void;

/**
 * One peer session as the connection state machine sees it. The werift
 * adapter implements it in production; tests drive a fake.
 */
export interface PeerTransport {
	readonly backChannel: BackChannel;
	onStateChange(listener: (state: TransportState) => void): Unsubscribe;
	// Raw messages from the client's frame channel (the media intake)
	onFrameMessage(listener: (data: string | Uint8Array) => void): Unsubscribe;
	answer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload>;
	close(): Promise<void>;
}

export type TransportFactory = () => PeerTransport;
