import type { DetectionMessage } from '@rtc-detect/shared';

export type Frame = Readonly<{
	data: Uint8Array; // encoded JPEG
	sequence: number; // source-assigned frame_id
	width: number;
	height: number;
	capturedAt: number;
}>;

// A frame the sampler forwarded, tagged with its arrival index on the connection
export type SampledFrame = Readonly<{
	frameIndex: number;
	frame: Frame;
}>;

export type BoundingBox = Readonly<{
	x: number;
	y: number;
	w: number;
	h: number;
	class: string;
	confidence: number; // 0..1
}>;

export type DetectionResult = Readonly<{
	frameIndex: number;
	width: number;
	height: number;
	boxes: readonly BoundingBox[];
}>;

export interface Detector {
	readonly name: string;
	// false when the underlying session must not run two frames at once
	readonly reentrant: boolean;
	detect(frame: Frame): Promise<BoundingBox[]>;
	// Releases sessions or workers held by the detector
	close?(): Promise<void>;
}

export function createDetectionResult(sampled: SampledFrame, boxes: readonly BoundingBox[]): DetectionResult {
	return Object.freeze({
		frameIndex: sampled.frameIndex,
		width: sampled.frame.width,
		height: sampled.frame.height,
		boxes: Object.freeze([...boxes]),
	});
}

export function toDetectionMessage(result: DetectionResult): DetectionMessage {
	return {
		type: 'detection',
		frameIndex: result.frameIndex,
		w: result.width,
		h: result.height,
		detections: result.boxes.map((b) => ({
			x: Math.round(b.x),
			y: Math.round(b.y),
			w: Math.round(b.w),
			h: Math.round(b.h),
			cls: b.class,
			conf: b.confidence,
		})),
	};
}
