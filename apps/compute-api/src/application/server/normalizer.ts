/**
 * Input Normalizer
 *
 * Turns an encoded request body into the canonical mapping the validators
 * read. JSON bodies pass through as parsed; XML bodies are decoded into the
 * same shapes. Decoding failures are reported, never thrown.
 */

import { Result, UseCaseError } from '@computegate/application';
import { decodeActionDocument, decodeServerDocument, parseXmlDocument } from './xml-decoder.js';
import { isMapping, type RequestBody } from './request-body.js';

export type BodyEncoding = 'json' | 'xml';

/** Which document shape an XML body is read as */
export type BodyKind = 'server' | 'action';

const MALFORMED_BODY = 'Malformed request body';

function malformed(): Result<RequestBody> {
	return Result.failure(UseCaseError.validation('MALFORMED_REQUEST_BODY', MALFORMED_BODY));
}

/**
 * Normalize a request body.
 *
 * An absent or blank body normalizes to an empty mapping; the operation
 * decides whether that is acceptable.
 */
export function normalizeBody(body: unknown, encoding: BodyEncoding, kind: BodyKind): Result<RequestBody> {
	if (body === undefined || body === null) {
		return Result.success({});
	}

	if (typeof body !== 'string') {
		return isMapping(body) ? Result.success(body) : malformed();
	}

	if (body.trim() === '') {
		return Result.success({});
	}

	return encoding === 'xml' ? normalizeXml(body, kind) : normalizeJson(body);
}

function normalizeJson(body: string): Result<RequestBody> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch {
		return malformed();
	}
	return isMapping(parsed) ? Result.success(parsed) : malformed();
}

function normalizeXml(body: string, kind: BodyKind): Result<RequestBody> {
	const document = parseXmlDocument(body);
	if (document === null) {
		return malformed();
	}
	return Result.success(kind === 'server' ? decodeServerDocument(document) : decodeActionDocument(document));
}
