// Shared wire types for frames, detections and signaling

export const FRAME_CHANNEL_LABEL = 'frames'; // client -> server, one JSON frame per message
export const DETECTION_CHANNEL_LABEL = 'detections'; // server -> client back-channel

export type FrameMessage = {
	frame_id: number; // monotonically increasing id from sender
	capture_ts: number; // sender clock at capture time (ms)
	width: number;
	height: number;
	image_b64: string; // JPEG, optionally as a data URL
};

export type SessionDescriptionPayload = {
	sdp: string;
	type: 'offer' | 'answer';
};

export type DetectionBox = {
	x: number; // pixels, top-left
	y: number;
	w: number;
	h: number;
	cls: string;
	conf: number; // 0..1
};

export type DetectionMessage = {
	type: 'detection';
	frameIndex: number;
	w: number;
	h: number;
	detections: DetectionBox[];
};

export type HealthStatus = 'ready' | 'degraded' | 'unreachable';

export type HealthResponse = {
	status: HealthStatus;
};

// Counters of the inference scheduler since start
export type InferenceStats = {
	submitted: number;
	dropped: number; // single-flight rejections
	failed: number;
	completed: number;
	running: number;
	waiting: number;
};

export type StatsResponse = {
	status: HealthStatus;
	connections: number;
	inference: InferenceStats;
};

export type DetectRequest = {
	image: string; // base64 JPEG, optionally as a data URL
};

export type DetectResponse = {
	w: number;
	h: number;
	detections: DetectionBox[];
	error?: string;
};

export function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Strips a `data:image/jpeg;base64,` prefix if present
export function stripDataUrl(b64: string): string {
	const comma = b64.indexOf(',');
	return b64.startsWith('data:') && comma >= 0 ? b64.slice(comma + 1) : b64;
}
