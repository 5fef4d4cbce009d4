import type { IncomingHttpHeaders } from 'node:http';

/**
 * Read a single header value. Repeated headers yield their first value;
 * empty values count as absent.
 */
export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
	const raw = headers[name.toLowerCase()];
	const value = Array.isArray(raw) ? raw[0] : raw;
	return value === undefined || value === '' ? undefined : value;
}
