export class DetectionServerError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

// Malformed negotiation input. Rejected at the HTTP boundary, no connection is created.
export class InvalidOfferError extends DetectionServerError {}

// Link failure reported by the peer transport. Drives state transitions only.
export class TransportError extends DetectionServerError {}

// A single frame failed inside an inference slot.
export class InferenceError extends DetectionServerError {}

// No model source could be loaded; the registry degrades instead of failing callers.
export class ModelUnavailableError extends DetectionServerError {}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
