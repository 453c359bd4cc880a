import { randomUUID } from 'node:crypto';
import type { SessionDescriptionPayload } from '@rtc-detect/shared';
import { TransportError, errorMessage } from '../errors';
import { FrameSampler } from '../pipeline/frame-sampler';
import type { InferenceScheduler } from '../pipeline/inference-scheduler';
import type { ResultBroadcaster } from '../pipeline/result-broadcaster';
import { parseFrameMessage } from '../transport/frame-codec';
import type { PeerTransport, TransportState, Unsubscribe } from '../transport/peer-transport';
import { awaitsGrace, transition } from './state-machine';
import type { ConnectionEvent, ConnectionState } from './state-machine';

export type ConnectionOptions = {
	transport: PeerTransport;
	scheduler: InferenceScheduler;
	broadcaster: ResultBroadcaster;
	sampleInterval: number;
	graceMs: number;
	isModelDegraded: () => boolean;
	onClosed?: (connection: Connection) => void;
	id?: string;
};

/**
 * One peer session. Owns its transport, frame intake and back-channel; the
 * scheduler and broadcaster only ever see its id.
 */
export class Connection {
	readonly id: string;
	private currentState: ConnectionState = 'new';
	private readonly transport: PeerTransport;
	private readonly scheduler: InferenceScheduler;
	private readonly broadcaster: ResultBroadcaster;
	private readonly sampler: FrameSampler;
	private readonly graceMs: number;
	private readonly isModelDegraded: () => boolean;
	private readonly onClosed: (connection: Connection) => void;
	private readonly subscriptions: Unsubscribe[];
	private graceTimer: ReturnType<typeof setTimeout> | null = null;
	private closing: Promise<void> | null = null;

	constructor(options: ConnectionOptions) {
		this.id = options.id ?? randomUUID();
		this.isModelDegraded = options.isModelDegraded;
		this.transport = options.transport;
		this.scheduler = options.scheduler;
		this.broadcaster = options.broadcaster;
		this.sampler = new FrameSampler(options.sampleInterval);
		this.graceMs = options.graceMs;
		this.onClosed = options.onClosed ?? (() => {});

		this.broadcaster.register(this.id, this.transport.backChannel);
		this.subscriptions = [
			this.transport.onStateChange((state) => this.onTransportState(state)),
			this.transport.onFrameMessage((data) => this.onFrameMessage(data)),
		];
	}

	get state(): ConnectionState {
		return this.currentState;
	}

	// Follows the registry, so a load that settles after the offer is reflected
	get degraded(): boolean {
		return this.isModelDegraded();
	}

	get frameIndex(): number {
		return this.sampler.frameIndex;
	}

	get inferenceInFlight(): boolean {
		return this.scheduler.isInFlight(this.id);
	}

	async negotiate(offer: SessionDescriptionPayload): Promise<SessionDescriptionPayload> {
		this.dispatch({ type: 'offer' });
		if (this.currentState !== 'negotiating') {
			throw new TransportError(`cannot negotiate connection ${this.id} in state ${this.currentState}`);
		}
		try {
			return await this.transport.answer(offer);
		} catch (error) {
			const failure = new TransportError(`negotiation failed: ${errorMessage(error)}`, { cause: error });
			this.dispatch({ type: 'error', error: failure });
			throw failure;
		}
	}

	/** Close now, whatever the state. Resolves once the transport is closed. */
	stop(): Promise<void> {
		this.dispatch({ type: 'stop' });
		return this.closing ?? Promise.resolve();
	}

	dispatch(event: ConnectionEvent): void {
		const prev = this.currentState;
		const next = transition(prev, event);
		if (next === prev) return;
		this.currentState = next;
		console.log(`[connection] ${this.id}: ${prev} -> ${next}`);
		if (event.type === 'error') {
			console.error(`[connection] ${this.id}:`, errorMessage(event.error));
		}

		if (awaitsGrace(next)) this.armGraceTimer();
		else this.clearGraceTimer();

		if (next === 'closed') this.release();
	}

	private onTransportState(state: TransportState): void {
		// new/connecting carry no transition
		if (state === 'new' || state === 'connecting') return;
		this.dispatch({ type: 'transport', state });
	}

	private onFrameMessage(data: string | Uint8Array): void {
		if (this.currentState === 'closed') return;
		const frame = parseFrameMessage(data);
		if (!frame) {
			console.warn(`[connection] ${this.id}: malformed frame message dropped`);
			return;
		}
		const sampled = this.sampler.next(frame);
		if (!sampled) return;

		this.scheduler
			.submit(this.id, sampled)
			.then((result) => {
				if (result) this.broadcaster.publish(this.id, result);
			})
			.catch((error: unknown) => console.error(`[connection] ${this.id}: result delivery failed:`, error));
	}

	private armGraceTimer(): void {
		this.clearGraceTimer();
		this.graceTimer = setTimeout(() => {
			this.graceTimer = null;
			this.dispatch({ type: 'graceExpired' });
		}, this.graceMs);
	}

	private clearGraceTimer(): void {
		if (this.graceTimer) {
			clearTimeout(this.graceTimer);
			this.graceTimer = null;
		}
	}

	// Runs once, on the transition into `closed`
	private release(): void {
		if (this.closing) return;
		this.clearGraceTimer();
		for (const unsubscribe of this.subscriptions.splice(0)) unsubscribe();
		this.scheduler.cancel(this.id);
		this.broadcaster.unregister(this.id);
		try {
			this.transport.backChannel.close();
		} catch (error) {
			console.warn(`[connection] ${this.id}: back-channel close failed:`, errorMessage(error));
		}
		this.closing = this.transport.close().catch((error: unknown) => {
			console.warn(`[connection] ${this.id}: transport close failed:`, errorMessage(error));
		});
		this.onClosed(this);
	}
}
