import { Worker } from 'node:worker_threads';
import type { BoundingBox, Detector, Frame } from '../types';
import { parseWorkerReply } from './worker-messages';
import type { DetectorWorkerInit, WorkerReply, WorkerRequest } from './worker-messages';

export type SpawnWorker = () => Worker;

type Job = {
	id: number;
	frame: Frame;
	resolve: (boxes: BoundingBox[]) => void;
	reject: (error: Error) => void;
};

type Slot = {
	worker: Worker;
	job: Job | null;
};

const DETECTOR_WORKER_URL = new URL('./detector-worker.ts', import.meta.url);

// Workers inherit the parent's execArgv, so the tsx loader that runs the server also loads the worker
export function detectorWorkerSpawner(init: DetectorWorkerInit): SpawnWorker {
	return () => new Worker(DETECTOR_WORKER_URL, { workerData: init });
}

function waitUntilReady(worker: Worker): Promise<string> {
	return new Promise((resolve, reject) => {
		const cleanup = () => {
			worker.off('message', onMessage);
			worker.off('error', onError);
			worker.off('exit', onExit);
		};
		const onMessage = (message: unknown) => {
			const reply = parseWorkerReply(message);
			if (reply?.type === 'ready') {
				cleanup();
				resolve(reply.name);
			} else if (reply?.type === 'error') {
				cleanup();
				reject(new Error(reply.message));
			}
		};
		const onError = (error: Error) => {
			cleanup();
			reject(error);
		};
		const onExit = (code: number) => {
			cleanup();
			reject(new Error(`detector worker exited with code ${code} before it was ready`));
		};
		worker.on('message', onMessage);
		worker.on('error', onError);
		worker.on('exit', onExit);
	});
}

/**
 * A `Detector` backed by worker threads, each holding its own model session.
 * A frame goes to an idle worker; when every worker is busy it waits in FIFO
 * order. Decoding, preprocessing and the session run all happen in the worker,
 * so the event loop only posts the frame bytes and receives the boxes.
 *
 * A worker that crashes fails its current frame and leaves the pool.
 */
export class DetectorPool implements Detector {
	readonly reentrant = true;
	private readonly slots: Slot[];
	private readonly backlog: Job[] = [];
	private nextId = 0;
	private closed = false;

	private constructor(readonly name: string, workers: Worker[]) {
		this.slots = workers.map((worker) => ({ worker, job: null }));
		for (const slot of this.slots) this.watch(slot);
	}

	/** Spawns `size` workers and resolves once every one has its session ready. */
	static async start(spawn: SpawnWorker, size: number): Promise<DetectorPool> {
		if (!Number.isInteger(size) || size < 1) {
			throw new RangeError(`detector pool size must be a positive integer, got ${size}`);
		}
		const workers = Array.from({ length: size }, () => spawn());
		try {
			const names = await Promise.all(workers.map(waitUntilReady));
			console.log(`[pool] ${size} detector worker(s) ready`);
			return new DetectorPool(`${names[0]} x${size}`, workers);
		} catch (error) {
			await Promise.all(workers.map((worker) => worker.terminate()));
			throw error;
		}
	}

	get size(): number {
		return this.slots.length;
	}

	detect(frame: Frame): Promise<BoundingBox[]> {
		if (this.closed) return Promise.reject(new Error('detector pool is closed'));
		if (this.slots.length === 0) return Promise.reject(new Error('no detector workers left'));
		return new Promise((resolve, reject) => {
			this.backlog.push({ id: this.nextId++, frame, resolve, reject });
			this.pump();
		});
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		const pending = [...this.backlog.splice(0), ...this.slots.flatMap((slot) => (slot.job ? [slot.job] : []))];
		for (const job of pending) job.reject(new Error('detector pool is closed'));
		await Promise.all(this.slots.splice(0).map((slot) => slot.worker.terminate()));
	}

	private watch(slot: Slot): void {
		slot.worker.on('message', (message: unknown) => {
			const reply = parseWorkerReply(message);
			if (reply) this.onReply(slot, reply);
		});
		slot.worker.on('error', (error) => this.onCrash(slot, error));
		slot.worker.on('exit', (code) => this.onCrash(slot, new Error(`detector worker exited with code ${code}`)));
	}

	private onReply(slot: Slot, reply: WorkerReply): void {
		const job = slot.job;
		if (!job || (reply.type !== 'result' && reply.type !== 'failed') || reply.id !== job.id) return;
		slot.job = null;
		if (reply.type === 'result') job.resolve(reply.boxes);
		else job.reject(new Error(reply.message));
		this.pump();
	}

	private onCrash(slot: Slot, error: Error): void {
		const idx = this.slots.indexOf(slot);
		if (this.closed || idx < 0) return;
		this.slots.splice(idx, 1);
		console.error(`[pool] detector worker lost, ${this.slots.length} left:`, error.message);
		slot.job?.reject(error);
		slot.job = null;
		if (this.slots.length === 0) {
			for (const job of this.backlog.splice(0)) job.reject(new Error('no detector workers left'));
		}
	}

	private pump(): void {
		for (const slot of this.slots) {
			if (slot.job) continue;
			const job = this.backlog.shift();
			if (!job) return;
			slot.job = job;
			const request: WorkerRequest = { type: 'detect', id: job.id, frame: job.frame };
			slot.worker.postMessage(request);
		}
	}
}
