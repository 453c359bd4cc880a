import type { Server } from 'node:http';
import { WebSocket, WebSocketServer } from 'ws';
import type { ResultBroadcaster } from '../pipeline/result-broadcaster';

export type DetectionFeed = {
	readonly clientCount: number;
	close(): Promise<void>;
};

/**
 * Mirrors every delivered detection message to WebSocket clients on `path`.
 * Clients only listen; whatever they send is ignored.
 */
export function attachDetectionFeed(server: Server, broadcaster: ResultBroadcaster, path = '/ws'): DetectionFeed {
	const wss = new WebSocketServer({ server, path });

	wss.on('connection', (socket) => {
		console.log(`[feed] client connected, ${wss.clients.size} total`);
		socket.on('close', () => console.log(`[feed] client disconnected, ${wss.clients.size} total`));
		socket.on('error', (error) => console.warn('[feed] socket error:', error.message));
	});

	const unsubscribe = broadcaster.subscribe((_connectionId, message) => {
		if (wss.clients.size === 0) return;
		const payload = JSON.stringify(message);
		for (const client of wss.clients) {
			if (client.readyState !== WebSocket.OPEN) continue;
			client.send(payload, (error) => {
				if (!error) return;
				console.warn('[feed] send failed, dropping client:', error.message);
				client.terminate();
			});
		}
	});

	return {
		get clientCount() {
			return wss.clients.size;
		},
		close: () => {
			unsubscribe();
			for (const client of wss.clients) client.terminate();
			return new Promise<void>((resolve, reject) => {
				wss.close((error) => (error ? reject(error) : resolve()));
			});
		},
	};
}
