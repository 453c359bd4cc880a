import { Worker } from 'node:worker_threads';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InferenceScheduler } from '../pipeline/inference-scheduler';
import { makeFrame } from '../testing/fakes';
import { DetectorPool } from './detector-pool';
import type { SpawnWorker } from './detector-pool';

// Worker that spins the CPU for `busyMs` per frame and labels its box with its thread id
function busyWorker(busyMs: number): SpawnWorker {
	const source = `
		const { parentPort, threadId } = require('node:worker_threads');
		parentPort.postMessage({ type: 'ready', name: 'busy' });
		parentPort.on('message', (request) => {
			const until = Date.now() + ${busyMs};
			while (Date.now() < until) {}
			parentPort.postMessage({
				type: 'result',
				id: request.id,
				boxes: [{ x: request.frame.sequence, y: 0, w: 1, h: 1, class: String(threadId), confidence: 1 }],
			});
		});
	`;
	return () => new Worker(source, { eval: true });
}

function scriptedWorker(source: string): SpawnWorker {
	return () => new Worker(`const { parentPort } = require('node:worker_threads');\n${source}`, { eval: true });
}

describe('DetectorPool', () => {
	let pool: DetectorPool | null = null;

	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
	});

	async function startPool(spawn: SpawnWorker, size: number): Promise<DetectorPool> {
		const started = await DetectorPool.start(spawn, size);
		pool = started;
		return started;
	}

	afterEach(async () => {
		await pool?.close();
		pool = null;
		vi.restoreAllMocks();
	});

	it('keeps the event loop free while a frame is inferred', async () => {
		const detectors = await startPool(busyWorker(300), 1);
		const scheduler = new InferenceScheduler({ infer: (frame) => detectors.detect(frame) }, 1);
		const order: string[] = [];

		const result = scheduler.submit('conn-1', { frameIndex: 0, frame: makeFrame(0) }).then((r) => {
			order.push('inferred');
			return r;
		});
		await new Promise<void>((resolve) => {
			setTimeout(() => {
				order.push('timer');
				resolve();
			}, 5);
		});

		await expect(result).resolves.toMatchObject({ frameIndex: 0, boxes: [{ x: 0, w: 1, h: 1, confidence: 1 }] });
		expect(order).toEqual(['timer', 'inferred']);
	});

	it('runs frames on separate workers at the same time', async () => {
		const detectors = await startPool(busyWorker(50), 2);
		expect(detectors.size).toBe(2);

		const [a, b] = await Promise.all([detectors.detect(makeFrame(1)), detectors.detect(makeFrame(2))]);
		expect(a[0].x).toBe(1);
		expect(b[0].x).toBe(2);
		expect(a[0].class).not.toBe(b[0].class);
	});

	it('queues frames beyond the worker count', async () => {
		const detectors = await startPool(busyWorker(10), 1);

		const boxes = await Promise.all([1, 2, 3].map((seq) => detectors.detect(makeFrame(seq))));
		expect(boxes.map((b) => b[0].x)).toEqual([1, 2, 3]);
	});

	it('fails to start when a worker cannot create its session', async () => {
		await expect(
			DetectorPool.start(scriptedWorker(`parentPort.postMessage({ type: 'error', message: 'weights are not an ONNX model' });`), 2),
		).rejects.toThrow('weights are not an ONNX model');
	});

	it('rejects a frame the worker reports as failed', async () => {
		const detectors = await startPool(
			scriptedWorker(`
				parentPort.postMessage({ type: 'ready', name: 'failing' });
				parentPort.on('message', (request) => {
					parentPort.postMessage({ type: 'failed', id: request.id, message: 'bad jpeg' });
				});
			`),
			1,
		);

		await expect(detectors.detect(makeFrame(0))).rejects.toThrow('bad jpeg');
	});

	it('fails the current frame and drops the worker when it exits', async () => {
		const detectors = await startPool(
			scriptedWorker(`
				parentPort.postMessage({ type: 'ready', name: 'crashing' });
				parentPort.on('message', () => process.exit(3));
			`),
			1,
		);

		await expect(detectors.detect(makeFrame(0))).rejects.toThrow('detector worker exited with code 3');
		expect(detectors.size).toBe(0);
		await expect(detectors.detect(makeFrame(1))).rejects.toThrow('no detector workers left');
	});

	it('rejects waiting frames on close', async () => {
		const detectors = await startPool(busyWorker(100), 1);
		const running = expect(detectors.detect(makeFrame(0))).rejects.toThrow('detector pool is closed');
		const waiting = expect(detectors.detect(makeFrame(1))).rejects.toThrow('detector pool is closed');

		await detectors.close();
		await running;
		await waiting;
		await expect(detectors.detect(makeFrame(2))).rejects.toThrow('detector pool is closed');
	});
});
