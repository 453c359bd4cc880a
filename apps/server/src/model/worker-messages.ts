import { isObject } from '@rtc-detect/shared';
import type { BoundingBox, Frame } from '../types';
import type { OnnxDetectorOptions } from './onnx-detector';

// Handed to each detector worker as its workerData
export type DetectorWorkerInit = {
	model: Uint8Array;
	source: string;
	options: OnnxDetectorOptions;
};

// Main thread -> worker
export type WorkerRequest = {
	type: 'detect';
	id: number;
	frame: Frame;
};

// Worker -> main thread
export type WorkerReply =
	| { type: 'ready'; name: string }
	| { type: 'error'; message: string } // session could not be created
	| { type: 'result'; id: number; boxes: BoundingBox[] }
	| { type: 'failed'; id: number; message: string };

function isFiniteNumber(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value);
}

function isBoundingBox(value: unknown): value is BoundingBox {
	if (!isObject(value)) return false;
	return isFiniteNumber(value.x) && isFiniteNumber(value.y) && isFiniteNumber(value.w) && isFiniteNumber(value.h)
		&& typeof value.class === 'string' && isFiniteNumber(value.confidence);
}

function parseOptions(value: unknown): OnnxDetectorOptions | null {
	if (!isObject(value)) return null;
	const { inputSize, scoreThreshold, iouThreshold, maxDetections, labels } = value;
	if (!isFiniteNumber(inputSize) || !isFiniteNumber(scoreThreshold)) return null;
	const options: OnnxDetectorOptions = { inputSize, scoreThreshold };
	if (isFiniteNumber(iouThreshold)) options.iouThreshold = iouThreshold;
	if (isFiniteNumber(maxDetections)) options.maxDetections = maxDetections;
	if (Array.isArray(labels) && labels.every((l): l is string => typeof l === 'string')) options.labels = labels;
	return options;
}

export function parseWorkerInit(value: unknown): DetectorWorkerInit | null {
	if (!isObject(value)) return null;
	const { model, source } = value;
	const options = parseOptions(value.options);
	if (!(model instanceof Uint8Array) || typeof source !== 'string' || !options) return null;
	return { model, source, options };
}

export function parseWorkerRequest(value: unknown): WorkerRequest | null {
	if (!isObject(value) || value.type !== 'detect' || !isFiniteNumber(value.id)) return null;
	const frame = value.frame;
	if (!isObject(frame) || !(frame.data instanceof Uint8Array)) return null;
	const { sequence, width, height, capturedAt } = frame;
	if (!isFiniteNumber(sequence) || !isFiniteNumber(width) || !isFiniteNumber(height) || !isFiniteNumber(capturedAt)) {
		return null;
	}
	return { type: 'detect', id: value.id, frame: { data: frame.data, sequence, width, height, capturedAt } };
}

export function parseWorkerReply(value: unknown): WorkerReply | null {
	if (!isObject(value)) return null;
	switch (value.type) {
		case 'ready':
			return typeof value.name === 'string' ? { type: 'ready', name: value.name } : null;
		case 'error':
			return typeof value.message === 'string' ? { type: 'error', message: value.message } : null;
		case 'result': {
			const { id, boxes } = value;
			if (!isFiniteNumber(id) || !Array.isArray(boxes) || !boxes.every(isBoundingBox)) return null;
			return { type: 'result', id, boxes };
		}
		case 'failed':
			if (!isFiniteNumber(value.id) || typeof value.message !== 'string') return null;
			return { type: 'failed', id: value.id, message: value.message };
		default:
			return null;
	}
}
