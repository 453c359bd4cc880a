import { isObject, stripDataUrl } from '@rtc-detect/shared';
import type { Frame } from '../types';

function isNonNegativeInt(value: unknown): value is number {
	return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Parse one frame-channel message ({frame_id, capture_ts, width, height,
 * image_b64}). Returns null for anything malformed; the caller drops it.
 */
export function parseFrameMessage(data: string | Uint8Array): Frame | null {
	const text = typeof data === 'string' ? data : Buffer.from(data).toString('utf8');
	let msg: unknown;
	try {
		msg = JSON.parse(text);
	} catch {
		return null;
	}
	if (!isObject(msg)) return null;

	const { frame_id, capture_ts, width, height, image_b64 } = msg;
	if (!isNonNegativeInt(frame_id)) return null;
	if (typeof capture_ts !== 'number' || !Number.isFinite(capture_ts)) return null;
	if (!isNonNegativeInt(width) || width === 0 || !isNonNegativeInt(height) || height === 0) return null;
	if (typeof image_b64 !== 'string') return null;

	const bytes = Buffer.from(stripDataUrl(image_b64), 'base64');
	if (bytes.length === 0) return null;

	return Object.freeze({
		data: new Uint8Array(bytes),
		sequence: frame_id,
		width,
		height,
		capturedAt: capture_ts,
	});
}
