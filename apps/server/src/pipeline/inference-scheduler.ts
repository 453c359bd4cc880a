import type { InferenceStats } from '@rtc-detect/shared';
import { errorMessage } from '../errors';
import { createDetectionResult } from '../types';
import type { BoundingBox, DetectionResult, Frame, SampledFrame } from '../types';

export interface InferenceBackend {
	infer(frame: Frame): Promise<BoundingBox[]>;
}

type Task = {
	connectionId: string;
	sampled: SampledFrame;
	cancelled: boolean;
	resolve: (result: DetectionResult | null) => void;
};

/**
 * Gates sampled frames into the inference backend: at most `poolSize` frames
 * in the backend at once across all connections, and at most one per
 * connection. The production backend is the model registry over a
 * `DetectorPool` of `poolSize` worker threads, so the backend's work runs off
 * the event loop.
 *
 * A frame submitted while its connection already has a task is dropped, not
 * queued: `submit` resolves `null` at once. Tasks start on a later turn of the
 * event loop, so frame intake never waits on the backend. When all slots are
 * busy, tasks wait in FIFO order; the wait list holds at most one task per
 * connection.
 */
export class InferenceScheduler {
	private readonly inFlight = new Map<string, Task>();
	private readonly waiting: Task[] = [];
	private running = 0;
	private drainScheduled = false;
	private counters = { submitted: 0, dropped: 0, failed: 0, completed: 0 };

	constructor(
		private readonly backend: InferenceBackend,
		readonly poolSize: number,
	) {
		if (!Number.isInteger(poolSize) || poolSize < 1) {
			throw new RangeError(`worker pool size must be a positive integer, got ${poolSize}`);
		}
	}

	submit(connectionId: string, sampled: SampledFrame): Promise<DetectionResult | null> {
		if (this.inFlight.has(connectionId)) {
			this.counters.dropped++;
			return Promise.resolve(null);
		}
		this.counters.submitted++;
		return new Promise((resolve) => {
			const task: Task = { connectionId, sampled, cancelled: false, resolve };
			this.inFlight.set(connectionId, task);
			this.waiting.push(task);
			this.scheduleDrain();
		});
	}

	isInFlight(connectionId: string): boolean {
		return this.inFlight.has(connectionId);
	}

	/**
	 * Cancel the connection's task. A waiting task resolves `null` now; a
	 * running one finishes in its slot and then resolves `null`.
	 */
	cancel(connectionId: string): void {
		const task = this.inFlight.get(connectionId);
		if (!task) return;
		task.cancelled = true;
		this.inFlight.delete(connectionId);
		const idx = this.waiting.indexOf(task);
		if (idx >= 0) {
			this.waiting.splice(idx, 1);
			task.resolve(null);
		}
	}

	get stats(): InferenceStats {
		return { ...this.counters, running: this.running, waiting: this.waiting.length };
	}

	private scheduleDrain(): void {
		if (this.drainScheduled) return;
		this.drainScheduled = true;
		setImmediate(() => {
			this.drainScheduled = false;
			this.drain();
		});
	}

	private drain(): void {
		while (this.running < this.poolSize) {
			const task = this.waiting.shift();
			if (!task) return;
			this.running++;
			this.run(task).then(
				(result) => task.resolve(task.cancelled ? null : result),
				(error: unknown) => {
					console.error('[scheduler] task crashed:', error);
					task.resolve(null);
				},
			);
		}
	}

	private async run(task: Task): Promise<DetectionResult> {
		const { connectionId, sampled } = task;
		let boxes: BoundingBox[];
		try {
			boxes = await this.backend.infer(sampled.frame);
			this.counters.completed++;
		} catch (error) {
			// A failed frame counts as "no detections"; the connection stays up
			this.counters.failed++;
			console.error(`[scheduler] inference failed for ${connectionId} frame ${sampled.frameIndex}:`, errorMessage(error));
			boxes = [];
		} finally {
			this.running--;
			if (this.inFlight.get(connectionId) === task) this.inFlight.delete(connectionId);
			if (this.waiting.length > 0) this.scheduleDrain();
		}
		return createDetectionResult(sampled, boxes);
	}
}
