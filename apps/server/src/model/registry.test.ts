import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InferenceError } from '../errors';
import { ControlledDetector, PERSON, deferred, makeFrame } from '../testing/fakes';
import type { Detector } from '../types';
import { ModelRegistry } from './registry';
import type { ModelSource } from './registry';

function failingSource(name: string): ModelSource {
	return { name, load: () => Promise.reject(new Error(`${name} missing`)) };
}

function staticSource(name: string, detector: Detector): ModelSource {
	return { name, load: async () => detector };
}

const fixedDetector: Detector = { name: 'fixed', reentrant: true, detect: async () => [PERSON] };

describe('ModelRegistry', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('loads once for concurrent first callers', async () => {
		const gate = deferred<Detector>();
		const load = vi.fn(() => gate.promise);
		const registry = new ModelRegistry([{ name: 'local', load }]);

		const first = registry.load();
		const second = registry.load();
		const inferred = registry.infer(makeFrame(0));
		expect(registry.status).toBe('unreachable');

		gate.resolve(fixedDetector);
		const [a, b] = await Promise.all([first, second]);
		expect(a).toBe(b);
		expect(load).toHaveBeenCalledTimes(1);
		await expect(inferred).resolves.toEqual([PERSON]);
		expect(registry.status).toBe('ready');
	});

	it('walks the fallback chain in order', async () => {
		const remote = vi.fn(async () => fixedDetector);
		const registry = new ModelRegistry([failingSource('file:models/missing.onnx'), { name: 'remote', load: remote }]);

		const handle = await registry.load();
		expect(handle).toMatchObject({ ready: true, degraded: false, source: 'remote' });
		expect(remote).toHaveBeenCalledTimes(1);
	});

	it('degrades to a no-op detector when every source fails', async () => {
		const registry = new ModelRegistry([failingSource('local'), failingSource('remote')]);

		await expect(registry.infer(makeFrame(0))).resolves.toEqual([]);
		await expect(registry.infer(makeFrame(5))).resolves.toEqual([]);
		expect(registry.status).toBe('degraded');
		expect(registry.degraded).toBe(true);
		expect((await registry.load()).source).toBe('noop');
	});

	it('degrades with no sources at all', async () => {
		const registry = new ModelRegistry([]);
		await registry.load();
		expect(registry.status).toBe('degraded');
	});

	it('serializes calls into a detector that is not reentrant', async () => {
		const detector = new ControlledDetector(false);
		const registry = new ModelRegistry([staticSource('local', detector)]);

		const calls = [0, 1, 2].map((i) => registry.infer(makeFrame(i)));
		for (let i = 0; i < 3; i++) {
			await vi.waitFor(() => expect(detector.calls).toHaveLength(i + 1));
			detector.calls[i].result.resolve([]);
		}
		await Promise.all(calls);
		expect(detector.maxActive).toBe(1);
		expect(detector.calls.map((c) => c.frame.sequence)).toEqual([0, 1, 2]);
	});

	it('lets a reentrant detector run calls concurrently', async () => {
		const detector = new ControlledDetector(true);
		const registry = new ModelRegistry([staticSource('local', detector)]);

		const calls = [0, 1, 2].map((i) => registry.infer(makeFrame(i)));
		await vi.waitFor(() => expect(detector.calls).toHaveLength(3));
		detector.calls.forEach((c) => c.result.resolve([]));
		await Promise.all(calls);
		expect(detector.maxActive).toBe(3);
	});

	it('wraps detector failures in InferenceError and keeps serving', async () => {
		let fail = true;
		const flaky: Detector = {
			name: 'flaky',
			reentrant: false,
			detect: async () => {
				if (fail) throw new Error('bad tensor');
				return [PERSON];
			},
		};
		const registry = new ModelRegistry([staticSource('local', flaky)]);

		await expect(registry.infer(makeFrame(3))).rejects.toBeInstanceOf(InferenceError);
		fail = false;
		await expect(registry.infer(makeFrame(4))).resolves.toEqual([PERSON]);
	});

	it('starts the load once from warm()', async () => {
		const load = vi.fn(async () => fixedDetector);
		const registry = new ModelRegistry([{ name: 'local', load }]);

		registry.warm();
		registry.warm();
		await registry.load();
		expect(load).toHaveBeenCalledTimes(1);
		expect(registry.status).toBe('ready');
	});

	it('closes the loaded detector on close()', async () => {
		const close = vi.fn(async () => {});
		const registry = new ModelRegistry([staticSource('local', { ...fixedDetector, close })]);

		await registry.close();
		expect(close).not.toHaveBeenCalled();

		await registry.load();
		await registry.close();
		expect(close).toHaveBeenCalledTimes(1);
	});
});
