import type { BoundingBox } from '../types';
import type { Letterbox } from './preprocess';

export type Candidate = {
	label: string;
	score: number;
	xmin: number; // source pixels
	ymin: number;
	xmax: number;
	ymax: number;
};

export type ModelOutput = {
	data: Float32Array;
	dims: readonly number[];
};

export type DecodeOptions = {
	letterbox: Letterbox;
	srcW: number;
	srcH: number;
	labels: readonly string[];
	scoreThreshold: number;
};

function labelFor(labels: readonly string[], cls: number): string {
	return labels[cls] ?? `cls${cls}`;
}

// Model-space xyxy -> source pixels, clamped to the image
function unletterbox(x1: number, y1: number, x2: number, y2: number, opts: DecodeOptions) {
	const { dx, dy, drawW, drawH } = opts.letterbox;
	const clampX = (v: number) => Math.min(opts.srcW, Math.max(0, v));
	const clampY = (v: number) => Math.min(opts.srcH, Math.max(0, v));
	return {
		xmin: clampX(((x1 - dx) / drawW) * opts.srcW),
		ymin: clampY(((y1 - dy) / drawH) * opts.srcH),
		xmax: clampX(((x2 - dx) / drawW) * opts.srcW),
		ymax: clampY(((y2 - dy) / drawH) * opts.srcH),
	};
}

export function decodeDetections(output: ModelOutput, opts: DecodeOptions): Candidate[] {
	const { data, dims } = output;
	const detections: Candidate[] = [];
	if (data.length === 0) return detections;

	// YOLOv8 ONNX usually outputs [1,84,8400] (channels-first). 84 = 4 box + 80 classes
	if (dims.length === 3 && dims[1] >= 6 && dims[1] < dims[2]) {
		const numClasses = dims[1] - 4;
		const numProps = dims[2];
		const getVal = (c: number, k: number) => data[c * numProps + k];

		for (let k = 0; k < numProps; k++) {
			let bestScore = 0;
			let bestClass = -1;
			for (let c = 0; c < numClasses; c++) {
				const s = getVal(4 + c, k);
				if (s > bestScore) { bestScore = s; bestClass = c; }
			}
			if (bestScore < opts.scoreThreshold) continue;

			// xywh(center) -> xyxy in model space
			const cx = getVal(0, k);
			const cy = getVal(1, k);
			const w = getVal(2, k);
			const h = getVal(3, k);
			const box = unletterbox(cx - w / 2, cy - h / 2, cx + w / 2, cy + h / 2, opts);
			if (box.xmax <= box.xmin || box.ymax <= box.ymin) continue;
			detections.push({ label: labelFor(opts.labels, bestClass), score: bestScore, ...box });
		}
		return detections;
	}

	// Fallback: models exported with NMS emit rows of [x1, y1, x2, y2, score, cls]
	const n = Math.floor(data.length / 6);
	for (let i = 0; i < n; i++) {
		const base = i * 6;
		const score = data[base + 4];
		if (score < opts.scoreThreshold) continue;
		const box = unletterbox(data[base], data[base + 1], data[base + 2], data[base + 3], opts);
		if (box.xmax <= box.xmin || box.ymax <= box.ymin) continue;
		detections.push({ label: labelFor(opts.labels, Math.round(data[base + 5])), score, ...box });
	}
	return detections;
}

export function iou(a: Candidate, b: Candidate): number {
	const x1 = Math.max(a.xmin, b.xmin);
	const y1 = Math.max(a.ymin, b.ymin);
	const x2 = Math.min(a.xmax, b.xmax);
	const y2 = Math.min(a.ymax, b.ymax);
	const inter = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
	const areaA = Math.max(0, a.xmax - a.xmin) * Math.max(0, a.ymax - a.ymin);
	const areaB = Math.max(0, b.xmax - b.xmin) * Math.max(0, b.ymax - b.ymin);
	const union = areaA + areaB - inter;
	return union <= 0 ? 0 : inter / union;
}

export function nonMaxSuppression(dets: Candidate[], iouThresh: number, scoreThresh: number, maxDet: number): Candidate[] {
	const filtered = dets.filter((d) => d.score >= scoreThresh).sort((a, b) => b.score - a.score);
	const keep: Candidate[] = [];

	for (const d of filtered) {
		if (keep.some((k) => iou(d, k) > iouThresh)) continue;
		keep.push(d);
		if (keep.length >= maxDet) break;
	}

	return keep;
}

export function toBoundingBoxes(dets: Candidate[]): BoundingBox[] {
	return dets.map((d) => ({
		x: Math.round(d.xmin),
		y: Math.round(d.ymin),
		w: Math.round(d.xmax - d.xmin),
		h: Math.round(d.ymax - d.ymin),
		class: d.label,
		confidence: Math.min(1, Math.max(0, d.score)),
	}));
}
