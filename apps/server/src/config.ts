export type ServerConfig = {
	host: string;
	port: number;
	modelPath: string;
	modelUrl: string | null;
	modelInputSize: number;
	confidenceThreshold: number;
	sampleInterval: number; // forward every Kth frame
	workerPoolSize: number;
	disconnectGraceMs: number;
	iceServers: string[];
};

export const DEFAULT_ICE_SERVERS = [
	'stun:stun.l.google.com:19302',
	'stun:stun1.l.google.com:19302',
	'stun:stun2.l.google.com:19302',
];

export const DEFAULT_CONFIG: ServerConfig = {
	host: '0.0.0.0',
	port: 8002,
	modelPath: 'models/yolov8n.onnx',
	modelUrl: null,
	modelInputSize: 640,
	confidenceThreshold: 0.25,
	sampleInterval: 5,
	workerPoolSize: 2,
	disconnectGraceMs: 5000,
	iceServers: DEFAULT_ICE_SERVERS,
};

function positiveInt(raw: string | undefined, fallback: number): number {
	const n = Number(raw);
	return raw && Number.isInteger(n) && n > 0 ? n : fallback;
}

function unitInterval(raw: string | undefined, fallback: number): number {
	const n = Number(raw);
	return raw && Number.isFinite(n) && n >= 0 && n <= 1 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
	const iceServers = (env.ICE_SERVERS || '')
		.split(',')
		.map((url) => url.trim())
		.filter(Boolean);
	return {
		host: env.HOST || DEFAULT_CONFIG.host,
		port: positiveInt(env.PORT, DEFAULT_CONFIG.port),
		modelPath: env.MODEL_PATH || DEFAULT_CONFIG.modelPath,
		modelUrl: env.MODEL_URL || DEFAULT_CONFIG.modelUrl,
		modelInputSize: positiveInt(env.MODEL_INPUT_SIZE, DEFAULT_CONFIG.modelInputSize),
		confidenceThreshold: unitInterval(env.CONFIDENCE_THRESHOLD, DEFAULT_CONFIG.confidenceThreshold),
		sampleInterval: positiveInt(env.SAMPLE_INTERVAL, DEFAULT_CONFIG.sampleInterval),
		workerPoolSize: positiveInt(env.WORKER_POOL_SIZE, DEFAULT_CONFIG.workerPoolSize),
		disconnectGraceMs: positiveInt(env.DISCONNECT_GRACE_MS, DEFAULT_CONFIG.disconnectGraceMs),
		iceServers: iceServers.length > 0 ? iceServers : DEFAULT_CONFIG.iceServers,
	};
}
