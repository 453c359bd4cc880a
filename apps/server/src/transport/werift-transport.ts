import { DETECTION_CHANNEL_LABEL, FRAME_CHANNEL_LABEL } from '@rtc-detect/shared';
import type { SessionDescriptionPayload } from '@rtc-detect/shared';
import { RTCPeerConnection } from 'werift';
import type { RTCDataChannel } from 'werift';
import { TransportError } from '../errors';
import type { BackChannel, ChannelState } from '../pipeline/result-broadcaster';
import type { PeerTransport, TransportFactory, TransportState, Unsubscribe } from './peer-transport';

type Subscription = { unSubscribe: () => void };

function toTransportState(state: string): TransportState | null {
	switch (state) {
		case 'new':
		case 'connecting':
		case 'connected':
		case 'disconnected':
		case 'failed':
		case 'closed':
			return state;
		default:
			return null;
	}
}

function toChannelState(state: string): ChannelState {
	switch (state) {
		case 'open':
		case 'closing':
		case 'closed':
			return state;
		default:
			return 'connecting';
	}
}

// Stands in for the 'detections' channel before negotiation creates it
class DetectionChannel implements BackChannel {
	constructor(private readonly current: () => RTCDataChannel | null) {}

	get readyState(): ChannelState {
		const channel = this.current();
		return channel ? toChannelState(channel.readyState) : 'connecting';
	}

	send(data: string): void {
		const channel = this.current();
		if (!channel) throw new TransportError('detection channel not created');
		channel.send(data);
	}

	close(): void {
		this.current()?.close();
	}
}

class WeriftTransport implements PeerTransport {
	readonly backChannel: BackChannel;
	private readonly pc: RTCPeerConnection;
	private detectionChannel: RTCDataChannel | null = null;
	private readonly stateListeners = new Set<(state: TransportState) => void>();
	private readonly frameListeners = new Set<(data: string | Uint8Array) => void>();
	private readonly subscriptions: Subscription[] = [];

	constructor(iceServers: string[]) {
		this.pc = new RTCPeerConnection({ iceServers: iceServers.map((urls) => ({ urls })) });

		this.subscriptions.push(this.pc.connectionStateChange.subscribe((raw) => {
			const state = toTransportState(raw);
			console.log('[transport] pc state:', raw);
			if (!state) return;
			for (const listener of this.stateListeners) listener(state);
		}));

		this.subscriptions.push(this.pc.onDataChannel.subscribe((channel) => {
			// Client-created 'frames' channel is the media intake; ignore anything else
			if (channel.label !== FRAME_CHANNEL_LABEL) {
				console.warn('[transport] ignoring data channel:', channel.label);
				return;
			}
			this.subscriptions.push(channel.onMessage.subscribe((data) => {
				for (const listener of this.frameListeners) listener(data);
			}));
		}));

		this.backChannel = new DetectionChannel(() => this.detectionChannel);
	}

	onStateChange(listener: (state: TransportState) => void): Unsubscribe {
		this.stateListeners.add(listener);
		return () => {
			this.stateListeners.delete(listener);
		};
	}

	onFrameMessage(listener: (data: string | Uint8Array) => void): Unsubscribe {
		this.frameListeners.add(listener);
		return () => {
			this.frameListeners.delete(listener);
		};
	}

	async answer(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
		await this.pc.setRemoteDescription({ type: 'offer', sdp: offer.sdp });
		// Server-owned back-channel for detection results
		this.detectionChannel = this.pc.createDataChannel(DETECTION_CHANNEL_LABEL, { ordered: true });
		const answer = await this.pc.createAnswer();
		await this.pc.setLocalDescription(answer);
		const local = this.pc.localDescription;
		if (!local) throw new TransportError('no local description after negotiation');
		return { type: 'answer', sdp: local.sdp };
	}

	async close(): Promise<void> {
		for (const sub of this.subscriptions.splice(0)) sub.unSubscribe();
		this.stateListeners.clear();
		this.frameListeners.clear();
		// The connection closes the back-channel itself before this runs
		await this.pc.close();
	}
}

export function weriftTransportFactory(iceServers: string[]): TransportFactory {
	return () => new WeriftTransport(iceServers);
}
