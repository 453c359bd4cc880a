import type { DetectionMessage } from '@rtc-detect/shared';
import { errorMessage } from '../errors';
import { toDetectionMessage } from '../types';
import type { DetectionResult } from '../types';

export type ChannelState = 'connecting' | 'open' | 'closing' | 'closed';

// Server -> client data channel carrying detection messages
export interface BackChannel {
	readonly readyState: ChannelState;
	send(data: string): void;
	close(): void;
}

export type DeliveryListener = (connectionId: string, message: DetectionMessage) => void;

type Registration = {
	channel: BackChannel;
	lastFrameIndex: number;
};

/**
 * Best-effort delivery of detection results. Nothing is buffered or retried:
 * a result that cannot be sent now is superseded by the next sampled frame.
 */
export class ResultBroadcaster {
	private readonly channels = new Map<string, Registration>();
	private readonly listeners = new Set<DeliveryListener>();

	register(connectionId: string, channel: BackChannel): void {
		this.channels.set(connectionId, { channel, lastFrameIndex: -1 });
	}

	unregister(connectionId: string): void {
		this.channels.delete(connectionId);
	}

	subscribe(listener: DeliveryListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	lastDelivered(connectionId: string): number | null {
		const reg = this.channels.get(connectionId);
		return reg && reg.lastFrameIndex >= 0 ? reg.lastFrameIndex : null;
	}

	/** Returns true when the result went out on the back-channel. */
	publish(connectionId: string, result: DetectionResult): boolean {
		const reg = this.channels.get(connectionId);
		if (!reg) return false; // connection no longer active
		if (reg.channel.readyState !== 'open') return false;
		if (result.frameIndex < reg.lastFrameIndex) {
			console.warn(`[broadcast] ${connectionId}: stale frame ${result.frameIndex} after ${reg.lastFrameIndex}, dropped`);
			return false;
		}

		const message = toDetectionMessage(result);
		try {
			reg.channel.send(JSON.stringify(message));
		} catch (error) {
			// Channel closed under us; the next state event tears the connection down
			console.warn(`[broadcast] ${connectionId}: send failed:`, errorMessage(error));
			return false;
		}
		reg.lastFrameIndex = result.frameIndex;

		for (const listener of this.listeners) {
			listener(connectionId, message);
		}
		return true;
	}
}
