import type { SessionDescriptionPayload } from '@rtc-detect/shared';
import type { InferenceScheduler } from '../pipeline/inference-scheduler';
import type { ResultBroadcaster } from '../pipeline/result-broadcaster';
import type { TransportFactory } from '../transport/peer-transport';
import { Connection } from './connection';

export type ConnectionManagerOptions = {
	transportFactory: TransportFactory;
	scheduler: InferenceScheduler;
	broadcaster: ResultBroadcaster;
	sampleInterval: number;
	graceMs: number;
	isModelDegraded: () => boolean;
};

// The active-connection set. A connection removes itself when it closes.
export class ConnectionManager {
	private readonly active = new Map<string, Connection>();

	constructor(private readonly options: ConnectionManagerOptions) {}

	async accept(offer: SessionDescriptionPayload): Promise<{ connection: Connection; answer: SessionDescriptionPayload }> {
		const { transportFactory, scheduler, broadcaster, sampleInterval, graceMs, isModelDegraded } = this.options;
		const connection = new Connection({
			transport: transportFactory(),
			scheduler,
			broadcaster,
			sampleInterval,
			graceMs,
			isModelDegraded,
			onClosed: (closed) => {
				this.active.delete(closed.id);
				console.log(`[connection] ${closed.id} removed, ${this.active.size} active`);
			},
		});
		this.active.set(connection.id, connection);
		console.log(`[connection] ${connection.id} created${connection.degraded ? ' (degraded)' : ''}, ${this.active.size} active`);

		const answer = await connection.negotiate(offer);
		return { connection, answer };
	}

	get(id: string): Connection | undefined {
		return this.active.get(id);
	}

	list(): Connection[] {
		return [...this.active.values()];
	}

	get size(): number {
		return this.active.size;
	}

	async closeAll(): Promise<void> {
		await Promise.all([...this.active.values()].map((connection) => connection.stop()));
	}
}
