import type { Frame, SampledFrame } from '../types';

export const DEFAULT_SAMPLE_INTERVAL = 5;

/**
 * Forwards every Kth frame of one connection's intake and drops the rest on
 * arrival. Keeps a counter only, never a frame.
 */
export class FrameSampler {
	private count = 0;

	constructor(readonly interval: number = DEFAULT_SAMPLE_INTERVAL) {
		if (!Number.isInteger(interval) || interval < 1) {
			throw new RangeError(`sample interval must be a positive integer, got ${interval}`);
		}
	}

	// Frames seen so far; the next frame gets this arrival index
	get frameIndex(): number {
		return this.count;
	}

	next(frame: Frame): SampledFrame | null {
		const frameIndex = this.count++;
		return frameIndex % this.interval === 0 ? { frameIndex, frame } : null;
	}
}
