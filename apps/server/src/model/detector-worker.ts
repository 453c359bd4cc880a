import { parentPort, workerData } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import { errorMessage } from '../errors';
import { OnnxDetector } from './onnx-detector';
import { parseWorkerInit, parseWorkerRequest } from './worker-messages';
import type { DetectorWorkerInit, WorkerReply } from './worker-messages';

// One inference worker: owns one ORT session and answers one frame at a time
function serve(port: MessagePort, init: DetectorWorkerInit): void {
	const post = (reply: WorkerReply) => port.postMessage(reply);
	const ready = OnnxDetector.create(init.model, init.source, init.options);

	ready.then(
		(detector) => post({ type: 'ready', name: detector.name }),
		(error: unknown) => post({ type: 'error', message: errorMessage(error) }),
	);

	port.on('message', (message: unknown) => {
		const request = parseWorkerRequest(message);
		if (!request) {
			console.warn('[worker] malformed request dropped');
			return;
		}
		ready
			.then((detector) => detector.detect(request.frame))
			.then(
				(boxes) => post({ type: 'result', id: request.id, boxes }),
				(error: unknown) => post({ type: 'failed', id: request.id, message: errorMessage(error) }),
			);
	});
}

const init = parseWorkerInit(workerData);
if (!parentPort || !init) {
	throw new Error('detector worker needs a parent port and model init data');
}
serve(parentPort, init);
