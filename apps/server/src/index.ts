import { loadConfig } from './config';
import { errorMessage } from './errors';
import { createDetectionServer } from './server';

async function main(): Promise<void> {
	const config = loadConfig();
	const server = createDetectionServer(config);

	// Load the model up front so the first frames do not wait on it
	server.registry.warm();

	await server.listen();
	console.log(`[server] listening on http://${config.host}:${config.port} (K=${config.sampleInterval}, pool=${config.workerPoolSize})`);

	let stopping = false;
	const shutdown = (signal: string) => {
		if (stopping) return;
		stopping = true;
		console.log(`[server] ${signal} received, closing ${server.connections.size} connection(s)`);
		server.close().then(
			() => process.exit(0),
			(error: unknown) => {
				console.error('[server] shutdown failed:', errorMessage(error));
				process.exit(1);
			},
		);
	};
	process.on('SIGINT', () => shutdown('SIGINT'));
	process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
	console.error('[server] failed to start:', error);
	process.exit(1);
});
