/**
 * Raw Body Plugin
 *
 * Replaces Fastify's JSON body parser with one that hands the body text to
 * the route untouched, and accepts XML the same way. Decoding happens in the
 * application so that both encodings fail with the same outcome.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { RawBodyPluginOptions } from '../types.js';

const DEFAULT_CONTENT_TYPES = ['application/json', 'application/xml', 'text/xml'];

const rawBodyPluginAsync: FastifyPluginAsync<RawBodyPluginOptions> = async (fastify, opts) => {
	const { contentTypes = DEFAULT_CONTENT_TYPES } = opts;

	if (fastify.hasContentTypeParser('application/json')) {
		fastify.removeContentTypeParser('application/json');
	}

	fastify.addContentTypeParser(
		contentTypes,
		{ parseAs: 'string' },
		async (_request: FastifyRequest, body: string) => body,
	);
};

export const rawBodyPlugin = fp(rawBodyPluginAsync, {
	name: '@computegate/raw-body',
	fastify: '5.x',
});

/**
 * Media type of a request without parameters, lower-cased.
 */
export function mediaType(request: FastifyRequest): string {
	const header = request.headers['content-type'] ?? '';
	return header.split(';')[0]?.trim().toLowerCase() ?? '';
}

/**
 * Whether the request declares an XML body.
 */
export function isXmlRequest(request: FastifyRequest): boolean {
	const type = mediaType(request);
	return type === 'application/xml' || type === 'text/xml';
}
