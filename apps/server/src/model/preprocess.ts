import type { RgbaImage } from '../image/decode';

// How the source image was letterboxed into the square model input
export type Letterbox = {
	dx: number;
	dy: number;
	drawW: number;
	drawH: number;
	modelSize: number;
};

export function computeLetterbox(srcW: number, srcH: number, modelSize: number): Letterbox {
	const scale = Math.min(modelSize / srcW, modelSize / srcH);
	const drawW = Math.round(srcW * scale);
	const drawH = Math.round(srcH * scale);
	const dx = Math.floor((modelSize - drawW) / 2);
	const dy = Math.floor((modelSize - drawH) / 2);
	return { dx, dy, drawW, drawH, modelSize };
}

/**
 * Letterbox an RGBA image into a black modelSize x modelSize square (nearest
 * neighbour) and return it as float32 NCHW [1,3,H,W] normalized to 0..1.
 */
export function toModelInput(image: RgbaImage, modelSize: number): { data: Float32Array; letterbox: Letterbox } {
	const letterbox = computeLetterbox(image.width, image.height, modelSize);
	const { dx, dy, drawW, drawH } = letterbox;
	const plane = modelSize * modelSize;
	const floatData = new Float32Array(3 * plane); // zero-filled = black padding

	for (let y = 0; y < drawH; y++) {
		const srcY = Math.min(image.height - 1, Math.floor((y * image.height) / drawH));
		for (let x = 0; x < drawW; x++) {
			const srcX = Math.min(image.width - 1, Math.floor((x * image.width) / drawW));
			const src = (srcY * image.width + srcX) * 4;
			const dst = (y + dy) * modelSize + (x + dx);
			floatData[dst] = image.data[src] / 255;
			floatData[dst + plane] = image.data[src + 1] / 255;
			floatData[dst + plane * 2] = image.data[src + 2] / 255;
		}
	}

	return { data: floatData, letterbox };
}
