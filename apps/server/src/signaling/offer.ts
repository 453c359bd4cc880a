import { isObject } from '@rtc-detect/shared';
import type { SessionDescriptionPayload } from '@rtc-detect/shared';
import { InvalidOfferError } from '../errors';

// Accepts `{sdp: "v=0...", type: "offer"}`, anything else is an InvalidOfferError
export function parseOffer(body: unknown): SessionDescriptionPayload {
	if (!isObject(body)) {
		throw new InvalidOfferError('offer must be a JSON object');
	}
	const { sdp, type } = body;
	if (type !== 'offer') {
		throw new InvalidOfferError(`expected type "offer", got ${JSON.stringify(type)}`);
	}
	if (typeof sdp !== 'string' || !sdp.trimStart().startsWith('v=0')) {
		throw new InvalidOfferError('sdp must be a session description starting with "v=0"');
	}
	return { sdp, type };
}
