import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { ServerConfig } from './config';
import { ConnectionManager } from './connection/connection-manager';
import { attachDetectionFeed } from './feed/detection-feed';
import type { DetectionFeed } from './feed/detection-feed';
import { ModelRegistry } from './model/registry';
import type { ModelSource } from './model/registry';
import { defaultModelSources } from './model/sources';
import { InferenceScheduler } from './pipeline/inference-scheduler';
import { ResultBroadcaster } from './pipeline/result-broadcaster';
import { createApp } from './signaling/app';
import type { TransportFactory } from './transport/peer-transport';
import { weriftTransportFactory } from './transport/werift-transport';

export type DetectionServer = {
	readonly registry: ModelRegistry;
	readonly scheduler: InferenceScheduler;
	readonly broadcaster: ResultBroadcaster;
	readonly connections: ConnectionManager;
	readonly http: Server;
	listen(): Promise<void>;
	close(): Promise<void>;
};

export type DetectionServerOverrides = {
	modelSources?: ModelSource[];
	transportFactory?: TransportFactory;
};

// Wires the components once; the registry is the only object shared by every connection
export function createDetectionServer(config: ServerConfig, overrides: DetectionServerOverrides = {}): DetectionServer {
	const registry = new ModelRegistry(overrides.modelSources ?? defaultModelSources(config));
	const scheduler = new InferenceScheduler(registry, config.workerPoolSize);
	const broadcaster = new ResultBroadcaster();
	const connections = new ConnectionManager({
		transportFactory: overrides.transportFactory ?? weriftTransportFactory(config.iceServers),
		scheduler,
		broadcaster,
		sampleInterval: config.sampleInterval,
		graceMs: config.disconnectGraceMs,
		isModelDegraded: () => registry.degraded,
	});
	const http = createServer(createApp({ connections, registry, scheduler }));
	let feed: DetectionFeed | null = null;

	return {
		registry,
		scheduler,
		broadcaster,
		connections,
		http,
		listen: () => new Promise<void>((resolve, reject) => {
			http.once('error', reject);
			http.listen(config.port, config.host, () => {
				http.off('error', reject);
				feed = attachDetectionFeed(http, broadcaster);
				resolve();
			});
		}),
		close: async () => {
			await connections.closeAll();
			await registry.close();
			await feed?.close();
			await new Promise<void>((resolve, reject) => {
				http.close((error) => (error ? reject(error) : resolve()));
			});
		},
	};
}
