import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { isObject, stripDataUrl } from '@rtc-detect/shared';
import type { DetectResponse, HealthResponse, StatsResponse } from '@rtc-detect/shared';
import type { ConnectionManager } from '../connection/connection-manager';
import { InvalidOfferError, errorMessage } from '../errors';
import { decodeJpeg } from '../image/decode';
import type { ModelRegistry } from '../model/registry';
import type { InferenceScheduler } from '../pipeline/inference-scheduler';
import { createDetectionResult, toDetectionMessage } from '../types';
import { parseOffer } from './offer';

export type AppDeps = {
	connections: ConnectionManager;
	registry: ModelRegistry;
	scheduler: InferenceScheduler;
};

function badImage(res: Response, error: string): void {
	const body: DetectResponse = { error, detections: [], w: 0, h: 0 };
	res.status(400).json(body);
}

export function createApp({ connections, registry, scheduler }: AppDeps): Express {
	const app = express();
	app.use(cors());
	app.use(express.json({ limit: '10mb' }));

	app.post('/offer', async (req, res, next) => {
		try {
			const offer = parseOffer(req.body);
			// A connection created before the load settles picks up the outcome later
			registry.warm();
			const { connection, answer } = await connections.accept(offer);
			console.log(`[signaling] answered offer for ${connection.id}`);
			res.json(answer);
		} catch (error) {
			next(error);
		}
	});

	app.get('/health', (_req, res) => {
		const body: HealthResponse = { status: registry.status };
		res.json(body);
	});

	app.get('/stats', (_req, res) => {
		const body: StatsResponse = {
			status: registry.status,
			connections: connections.size,
			inference: scheduler.stats,
		};
		res.json(body);
	});

	// Single-image detection on the shared model, outside any peer session
	app.post('/detect', async (req, res, next) => {
		const image: unknown = isObject(req.body) ? req.body.image : undefined;
		if (typeof image !== 'string' || image.length === 0) {
			badImage(res, 'image must be a base64 JPEG string');
			return;
		}
		const bytes = new Uint8Array(Buffer.from(stripDataUrl(image), 'base64'));
		let width: number;
		let height: number;
		try {
			({ width, height } = decodeJpeg(bytes));
		} catch (error) {
			badImage(res, `cannot decode image: ${errorMessage(error)}`);
			return;
		}

		try {
			const frame = { data: bytes, sequence: 0, width, height, capturedAt: Date.now() };
			const boxes = await registry.infer(frame);
			const { w, h, detections } = toDetectionMessage(createDetectionResult({ frameIndex: 0, frame }, boxes));
			const body: DetectResponse = { w, h, detections };
			res.json(body);
		} catch (error) {
			next(error);
		}
	});

	app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
		if (error instanceof InvalidOfferError) {
			console.warn('[signaling] rejected offer:', error.message);
			res.status(400).json({ error: error.message });
			return;
		}
		// body-parser marks malformed JSON with a 4xx status
		const status = isObject(error) ? error.status : undefined;
		if (typeof status === 'number' && status >= 400 && status < 500) {
			res.status(status).json({ error: errorMessage(error) });
			return;
		}
		console.error('[signaling] request failed:', error);
		res.status(500).json({ error: errorMessage(error) });
	});

	return app;
}
