/**
 * XML Decoder
 *
 * Maps XML server and action documents onto the same mapping shapes a JSON
 * body has. Absent attributes are omitted rather than defaulted, so the
 * validators see one canonical form.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { parseBoolean } from '@computegate/application';
import { isMapping, type RequestBody } from './request-body.js';

const ATTRIBUTE_PREFIX = '@_';
const TEXT_KEY = '#text';

/** Elements that may repeat under their parent */
const REPEATED_ELEMENTS = new Set(['meta', 'file', 'network', 'security_group']);

const SERVER_ATTRIBUTES = [
	'name',
	'imageRef',
	'flavorRef',
	'adminPass',
	'accessIPv4',
	'accessIPv6',
	'key_name',
	'user_data',
	'availability_zone',
	'config_drive',
	'reservation_id',
	'return_reservation_id',
	'min_count',
	'max_count',
] as const;

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	removeNSPrefix: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
	parseTagValue: false,
	parseAttributeValue: false,
	isArray: (name, _jpath, _isLeafNode, isAttribute) => !isAttribute && REPEATED_ELEMENTS.has(name),
});

/**
 * Parse an XML document. Returns null when the text is not well-formed.
 */
export function parseXmlDocument(xml: string): RequestBody | null {
	if (XMLValidator.validate(xml) !== true) {
		return null;
	}
	const document: unknown = parser.parse(xml);
	return isMapping(document) ? document : null;
}

/**
 * Decode a `<server>` document (create and update).
 * A document without a `<server>` root decodes to an empty mapping.
 */
export function decodeServerDocument(document: RequestBody): RequestBody {
	const serverNode = firstChild(document, 'server');
	if (serverNode === undefined) {
		return {};
	}

	const server: RequestBody = {};
	for (const name of SERVER_ATTRIBUTES) {
		const value = attribute(serverNode, name);
		if (value) {
			server[name] = value;
		}
	}

	const metadataNode = firstChild(serverNode, 'metadata');
	if (metadataNode !== undefined) {
		server['metadata'] = extractMetadata(metadataNode);
	}

	const personality = extractPersonality(serverNode);
	if (personality !== undefined) {
		server['personality'] = personality;
	}

	const networksNode = firstChild(serverNode, 'networks');
	if (networksNode !== undefined) {
		server['networks'] = children(networksNode, 'network').map((networkNode) => {
			const network: RequestBody = {};
			const uuid = attribute(networkNode, 'uuid');
			if (uuid !== undefined) network['uuid'] = uuid;
			const fixedIp = attribute(networkNode, 'fixed_ip');
			if (fixedIp !== undefined) network['fixed_ip'] = fixedIp;
			return network;
		});
	}

	const groupsNode = firstChild(serverNode, 'security_groups');
	if (groupsNode !== undefined) {
		const groups: RequestBody[] = [];
		for (const groupNode of children(groupsNode, 'security_group')) {
			const nameNode = firstChild(groupNode, 'name');
			if (nameNode !== undefined) {
				groups.push({ name: text(nameNode) });
			}
		}
		server['security_groups'] = groups;
	}

	const autoDiskConfig = attribute(serverNode, 'auto_disk_config');
	if (autoDiskConfig) {
		server['auto_disk_config'] = parseBoolean(autoDiskConfig);
	}

	return { server };
}

/**
 * Decode an action document. The root element names the action.
 */
export function decodeActionDocument(document: RequestBody): RequestBody {
	const actionName = Object.keys(document)[0];
	if (actionName === undefined) {
		return {};
	}
	const node = document[actionName];

	switch (actionName) {
		case 'createImage':
			return { [actionName]: decodeImageAction(node, ['name']) };
		case 'createBackup':
			return { [actionName]: decodeImageAction(node, ['name', 'backup_type', 'rotation']) };
		case 'changePassword':
			return { [actionName]: pickAttributes(node, ['adminPass']) };
		case 'reboot':
			return { [actionName]: pickAttributes(node, ['type']) };
		case 'resize':
			return { [actionName]: pickAttributes(node, ['flavorRef']) };
		case 'rebuild':
			return { [actionName]: decodeRebuild(node) };
		case 'confirmResize':
		case 'revertResize':
			return { [actionName]: null };
		default:
			return { [actionName]: allAttributes(node) };
	}
}

function decodeImageAction(node: unknown, names: readonly string[]): RequestBody {
	const data: RequestBody = {};
	for (const name of names) {
		const value = attribute(node, name);
		if (value) {
			data[name] = value;
		}
	}
	const metadataNode = firstChild(node, 'metadata');
	if (metadataNode !== undefined) {
		data['metadata'] = extractMetadata(metadataNode);
	}
	return data;
}

function decodeRebuild(node: unknown): RequestBody {
	const rebuild = pickAttributes(node, ['name', 'imageRef', 'adminPass']);

	const metadataNode = firstChild(node, 'metadata');
	if (metadataNode !== undefined) {
		rebuild['metadata'] = extractMetadata(metadataNode);
	}

	const personality = extractPersonality(node);
	if (personality !== undefined) {
		rebuild['personality'] = personality;
	}

	return rebuild;
}

function extractMetadata(metadataNode: unknown): Record<string, string> {
	const metadata: Record<string, string> = {};
	for (const metaNode of children(metadataNode, 'meta')) {
		const key = attribute(metaNode, 'key');
		if (key) {
			metadata[key] = text(metaNode);
		}
	}
	return metadata;
}

function extractPersonality(parent: unknown): RequestBody[] | undefined {
	const personalityNode = firstChild(parent, 'personality');
	if (personalityNode === undefined) {
		return undefined;
	}
	return children(personalityNode, 'file').map((fileNode) => {
		const file: RequestBody = {};
		const path = attribute(fileNode, 'path');
		if (path !== undefined) file['path'] = path;
		file['contents'] = text(fileNode);
		return file;
	});
}

/** Attributes that are present, empty ones included */
function pickAttributes(node: unknown, names: readonly string[]): RequestBody {
	const picked: RequestBody = {};
	for (const name of names) {
		const value = attribute(node, name);
		if (value !== undefined) {
			picked[name] = value;
		}
	}
	return picked;
}

function allAttributes(node: unknown): RequestBody {
	const attributes: RequestBody = {};
	if (!isMapping(node)) {
		return attributes;
	}
	for (const [key, value] of Object.entries(node)) {
		if (key.startsWith(ATTRIBUTE_PREFIX) && typeof value === 'string') {
			attributes[key.slice(ATTRIBUTE_PREFIX.length)] = value;
		}
	}
	return attributes;
}

function attribute(node: unknown, name: string): string | undefined {
	if (!isMapping(node)) {
		return undefined;
	}
	const value = node[`${ATTRIBUTE_PREFIX}${name}`];
	return typeof value === 'string' ? value : undefined;
}

function firstChild(node: unknown, name: string): unknown {
	if (!isMapping(node)) {
		return undefined;
	}
	const child = node[name];
	return Array.isArray(child) ? child[0] : child;
}

function children(node: unknown, name: string): unknown[] {
	if (!isMapping(node)) {
		return [];
	}
	const child = node[name];
	if (child === undefined) {
		return [];
	}
	return Array.isArray(child) ? child : [child];
}

function text(node: unknown): string {
	if (typeof node === 'string') {
		return node;
	}
	if (isMapping(node)) {
		const value = node[TEXT_KEY];
		return typeof value === 'string' ? value : '';
	}
	return '';
}
