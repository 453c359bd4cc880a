import type { DetectionMessage, FrameMessage, SessionDescriptionPayload } from '@rtc-detect/shared';
import type { BackChannel, ChannelState } from '../pipeline/result-broadcaster';
import type { PeerTransport, TransportState, Unsubscribe } from '../transport/peer-transport';
import type { BoundingBox, Detector, Frame } from '../types';

export const OFFER: SessionDescriptionPayload = { type: 'offer', sdp: 'v=0\r\no=- 1 1 IN IP4 127.0.0.1\r\ns=-\r\n' };
export const ANSWER_SDP = 'v=0\r\no=- 2 2 IN IP4 127.0.0.1\r\ns=answer\r\n';

export class FakeBackChannel implements BackChannel {
	readyState: ChannelState = 'open';
	readonly sent: string[] = [];
	closeCalls = 0;

	send(data: string): void {
		if (this.readyState !== 'open') throw new Error('channel is not open');
		this.sent.push(data);
	}

	close(): void {
		this.closeCalls++;
		this.readyState = 'closed';
	}

	messages(): DetectionMessage[] {
		return this.sent.map((s): DetectionMessage => JSON.parse(s));
	}
}

export class FakeTransport implements PeerTransport {
	readonly backChannel = new FakeBackChannel();
	closeCalls = 0;
	answerError: Error | null = null;
	private readonly stateListeners = new Set<(state: TransportState) => void>();
	private readonly frameListeners = new Set<(data: string | Uint8Array) => void>();

	get listenerCount(): number {
		return this.stateListeners.size + this.frameListeners.size;
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

	emitState(state: TransportState): void {
		for (const listener of this.stateListeners) listener(state);
	}

	emitFrame(data: string | Uint8Array): void {
		for (const listener of this.frameListeners) listener(data);
	}

	async answer(_offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
		if (this.answerError) throw this.answerError;
		return { type: 'answer', sdp: ANSWER_SDP };
	}

	async close(): Promise<void> {
		this.closeCalls++;
	}
}

export function frameMessage(frameId: number, overrides: Partial<FrameMessage> = {}): string {
	const msg: FrameMessage = {
		frame_id: frameId,
		capture_ts: 1000 + frameId,
		width: 64,
		height: 48,
		image_b64: 'data:image/jpeg;base64,/9j/4AAQ',
		...overrides,
	};
	return JSON.stringify(msg);
}

export function makeFrame(sequence: number, width = 64, height = 48): Frame {
	return { data: new Uint8Array([0xff, 0xd8, 0xff]), sequence, width, height, capturedAt: sequence };
}

export type Deferred<T> = {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: unknown) => void;
};

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

// Lets setImmediate callbacks and the microtasks they start run
export function settle(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/** Detector whose calls stay pending until the test resolves them. */
export class ControlledDetector implements Detector {
	readonly name = 'controlled';
	readonly calls: Array<{ frame: Frame; result: Deferred<BoundingBox[]> }> = [];
	active = 0;
	maxActive = 0;

	constructor(readonly reentrant = true) {}

	detect(frame: Frame): Promise<BoundingBox[]> {
		const result = deferred<BoundingBox[]>();
		this.calls.push({ frame, result });
		this.active++;
		this.maxActive = Math.max(this.maxActive, this.active);
		const done = () => {
			this.active--;
		};
		result.promise.then(done, done);
		return result.promise;
	}
}

export const PERSON: BoundingBox = { x: 10, y: 20, w: 30, h: 40, class: 'person', confidence: 0.875 };
