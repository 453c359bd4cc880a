import { readFileSync } from 'node:fs';
import * as ort from 'onnxruntime-web';
import { decodeJpeg } from '../image/decode';
import type { BoundingBox, Detector, Frame } from '../types';
import { decodeDetections, nonMaxSuppression, toBoundingBoxes } from './postprocess';
import { toModelInput } from './preprocess';

export type OnnxDetectorOptions = {
	inputSize: number; // square model input, e.g. 640
	scoreThreshold: number;
	iouThreshold?: number;
	maxDetections?: number;
	labels?: readonly string[];
};

// The part of an ORT InferenceSession the detector uses
export interface DetectionSession {
	readonly inputNames: readonly string[];
	readonly outputNames: readonly string[];
	run(feeds: Record<string, ort.Tensor>): Promise<Record<string, ort.OnnxValue>>;
}

export function loadCocoLabels(): string[] {
	const raw: unknown = JSON.parse(readFileSync(new URL('./coco-labels.json', import.meta.url), 'utf8'));
	if (!Array.isArray(raw) || !raw.every((l): l is string => typeof l === 'string')) {
		throw new Error('coco-labels.json must be an array of strings');
	}
	return raw;
}

export class OnnxDetector implements Detector {
	readonly name: string;
	// One wasm session cannot run two graphs concurrently
	readonly reentrant = false;

	private constructor(
		private readonly session: DetectionSession,
		private readonly options: Required<OnnxDetectorOptions>,
		source: string,
	) {
		this.name = `onnx:${source}`;
	}

	static async create(model: Uint8Array, source: string, options: OnnxDetectorOptions): Promise<OnnxDetector> {
		ort.env.wasm.numThreads = 1;
		ort.env.wasm.proxy = false;
		const session = await ort.InferenceSession.create(model, {
			executionProviders: ['wasm'],
			graphOptimizationLevel: 'all',
		});
		console.log('[model] session created, inputs:', session.inputNames, 'outputs:', session.outputNames);
		return OnnxDetector.fromSession(session, source, options);
	}

	static fromSession(session: DetectionSession, source: string, options: OnnxDetectorOptions): OnnxDetector {
		return new OnnxDetector(session, {
			iouThreshold: 0.45,
			maxDetections: 50,
			labels: loadCocoLabels(),
			...options,
		}, source);
	}

	async detect(frame: Frame): Promise<BoundingBox[]> {
		const image = decodeJpeg(frame.data);
		const { inputSize, scoreThreshold, iouThreshold, maxDetections, labels } = this.options;
		const { data, letterbox } = toModelInput(image, inputSize);

		const feeds: Record<string, ort.Tensor> = {};
		feeds[this.session.inputNames[0]] = new ort.Tensor('float32', data, [1, 3, inputSize, inputSize]);
		const results = await this.session.run(feeds);

		const out = results[this.session.outputNames[0]];
		if (!out || !(out.data instanceof Float32Array)) {
			throw new Error(`unexpected model output type: ${out ? out.type : 'missing'}`);
		}

		// Boxes come back in decoded-image pixels; rescale to the frame's advertised size
		const decoded = decodeDetections({ data: out.data, dims: out.dims }, {
			letterbox,
			srcW: frame.width,
			srcH: frame.height,
			labels,
			scoreThreshold,
		});
		return toBoundingBoxes(nonMaxSuppression(decoded, iouThreshold, scoreThreshold, maxDetections));
	}
}
