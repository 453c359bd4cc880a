import { decode } from 'jpeg-js';

export type RgbaImage = {
	width: number;
	height: number;
	data: Uint8Array; // RGBA, row-major
};

const MAX_RESOLUTION_MP = 40;
const MAX_MEMORY_MB = 512;

export function decodeJpeg(bytes: Uint8Array): RgbaImage {
	const image = decode(bytes, {
		useTArray: true,
		formatAsRGBA: true,
		maxResolutionInMP: MAX_RESOLUTION_MP,
		maxMemoryUsageInMB: MAX_MEMORY_MB,
	});
	return { width: image.width, height: image.height, data: image.data };
}
