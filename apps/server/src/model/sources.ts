import { readFile } from 'node:fs/promises';
import type { ServerConfig } from '../config';
import type { Detector } from '../types';
import { DetectorPool, detectorWorkerSpawner } from './detector-pool';
import type { ModelSource } from './registry';

type DetectorConfig = Pick<ServerConfig, 'modelPath' | 'modelUrl' | 'modelInputSize' | 'confidenceThreshold' | 'workerPoolSize'>;

// Every worker gets its own copy of the weights and builds its own session
function startPool(model: Uint8Array, source: string, config: DetectorConfig): Promise<Detector> {
	const spawn = detectorWorkerSpawner({
		model,
		source,
		options: { inputSize: config.modelInputSize, scoreThreshold: config.confidenceThreshold },
	});
	return DetectorPool.start(spawn, config.workerPoolSize);
}

export function localWeightsSource(path: string, config: DetectorConfig): ModelSource {
	return {
		name: `file:${path}`,
		load: async () => {
			const bytes = await readFile(path);
			return startPool(new Uint8Array(bytes), path, config);
		},
	};
}

export function remoteWeightsSource(url: string, config: DetectorConfig): ModelSource {
	return {
		name: url,
		load: async () => {
			const response = await fetch(url);
			if (!response.ok) {
				throw new Error(`HTTP ${response.status}: ${response.statusText}`);
			}
			const bytes = new Uint8Array(await response.arrayBuffer());
			console.log('[model] fetched weights:', bytes.byteLength, 'bytes');
			return startPool(bytes, url, config);
		},
	};
}

// Local weights first, then the network; the registry falls back to no-op after these
export function defaultModelSources(config: DetectorConfig): ModelSource[] {
	const sources = [localWeightsSource(config.modelPath, config)];
	if (config.modelUrl) sources.push(remoteWeightsSource(config.modelUrl, config));
	return sources;
}
