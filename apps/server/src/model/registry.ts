import type { HealthStatus } from '@rtc-detect/shared';
import { InferenceError, ModelUnavailableError, errorMessage } from '../errors';
import type { BoundingBox, Detector, Frame } from '../types';

// One step of the fallback chain. Throws when the weights cannot be obtained.
export type ModelSource = {
	name: string;
	load: () => Promise<Detector>;
};

export type ModelHandle = Readonly<{
	ready: boolean;
	degraded: boolean;
	source: string;
	detector: Detector;
}>;

export const noopDetector: Detector = {
	name: 'noop',
	reentrant: true,
	detect: async () => [],
};

/**
 * Owns the process-wide detection model.
 *
 * The first caller of `load()` (or `infer()`) starts the fallback chain; every
 * concurrent caller awaits the same promise, so the handle is built once and
 * nobody sees it half-constructed. When no source loads the registry settles
 * on a degraded handle whose detector returns no boxes.
 */
export class ModelRegistry {
	private loading: Promise<ModelHandle> | null = null;
	private handle: ModelHandle | null = null;
	private tail: Promise<unknown> = Promise.resolve();

	constructor(private readonly sources: readonly ModelSource[]) {}

	load(): Promise<ModelHandle> {
		if (!this.loading) {
			this.loading = this.runFallbackChain().then((handle) => {
				this.handle = handle;
				return handle;
			});
		}
		return this.loading;
	}

	// Starts the load in the background if nobody has yet
	warm(): void {
		if (this.loading) return;
		this.load().catch((error: unknown) => console.error('[model] load failed:', error));
	}

	/** Releases the loaded detector. Waits for a load still in progress. */
	async close(): Promise<void> {
		if (!this.loading) return;
		const { detector } = await this.loading;
		await detector.close?.();
	}

	get status(): HealthStatus {
		if (!this.handle) return 'unreachable';
		return this.handle.degraded ? 'degraded' : 'ready';
	}

	get degraded(): boolean {
		return this.handle?.degraded ?? false;
	}

	async infer(frame: Frame): Promise<BoundingBox[]> {
		const { detector, degraded } = await this.load();
		if (degraded) return [];
		const run = async () => {
			try {
				return await detector.detect(frame);
			} catch (error) {
				throw new InferenceError(`${detector.name} failed on frame ${frame.sequence}: ${errorMessage(error)}`, { cause: error });
			}
		};
		return detector.reentrant ? run() : this.serialize(run);
	}

	private serialize<T>(task: () => Promise<T>): Promise<T> {
		const result = this.tail.then(task, task);
		this.tail = result.then(() => undefined, () => undefined);
		return result;
	}

	private async runFallbackChain(): Promise<ModelHandle> {
		for (const source of this.sources) {
			try {
				console.log(`[model] loading from ${source.name}...`);
				const detector = await source.load();
				console.log(`[model] loaded ${detector.name} from ${source.name}`);
				return Object.freeze({ ready: true, degraded: false, source: source.name, detector });
			} catch (error) {
				const failure = new ModelUnavailableError(`${source.name}: ${errorMessage(error)}`, { cause: error });
				console.warn('[model] source failed:', failure.message);
			}
		}
		console.warn('[model] no model source succeeded, running degraded (no detections)');
		return Object.freeze({ ready: true, degraded: true, source: 'noop', detector: noopDetector });
	}
}
