/**
 * Server Views
 *
 * Response representations of instances, with self and bookmark links.
 */

import { Type, type Static } from '@computegate/http';
import { statusFromState, type InstanceActionRecord, type InstanceRecord } from '../domain/index.js';

const LinkSchema = Type.Object({
	rel: Type.String(),
	href: Type.String(),
});

const LinkedRefSchema = Type.Object({
	id: Type.String(),
	links: Type.Array(LinkSchema),
});

const AddressSchema = Type.Object({
	version: Type.Integer(),
	addr: Type.String(),
});

export const ServerSummarySchema = Type.Object({
	id: Type.String(),
	name: Type.String(),
	links: Type.Array(LinkSchema),
});

export const ServerDetailSchema = Type.Object({
	id: Type.String(),
	name: Type.String(),
	status: Type.String(),
	tenantId: Type.String(),
	userId: Type.String(),
	hostId: Type.String(),
	accessIPv4: Type.String(),
	accessIPv6: Type.String(),
	progress: Type.Integer(),
	created: Type.String(),
	updated: Type.String(),
	image: LinkedRefSchema,
	flavor: LinkedRefSchema,
	metadata: Type.Record(Type.String(), Type.String()),
	addresses: Type.Record(Type.String(), Type.Array(AddressSchema)),
	security_groups: Type.Array(Type.Object({ name: Type.String() })),
	key_name: Type.String(),
	links: Type.Array(LinkSchema),
	adminPass: Type.Optional(Type.String()),
});

export const ServerResponseSchema = Type.Object({ server: ServerDetailSchema });
export const ServerSummaryListSchema = Type.Object({ servers: Type.Array(ServerSummarySchema) });
export const ServerDetailListSchema = Type.Object({ servers: Type.Array(ServerDetailSchema) });
export const ReservationResponseSchema = Type.Object({ reservation_id: Type.String() });

export const DiagnosticsResponseSchema = Type.Record(Type.String(), Type.Union([Type.String(), Type.Number()]));

export const ServerActionSchema = Type.Object({
	created_at: Type.String(),
	action: Type.String(),
	error: Type.Union([Type.String(), Type.Null()]),
});
export const ServerActionListSchema = Type.Object({ actions: Type.Array(ServerActionSchema) });

export type Link = Static<typeof LinkSchema>;
export type ServerSummary = Static<typeof ServerSummarySchema>;
export type ServerDetail = Static<typeof ServerDetailSchema>;
export type ServerAction = Static<typeof ServerActionSchema>;

export function actionView(entry: InstanceActionRecord): ServerAction {
	return { created_at: entry.createdAt.toISOString(), action: entry.action, error: entry.error };
}

const VERSION_SUFFIX = /\/v\d+(\.\d+)?\/?$/;

/**
 * Builds views relative to the base URL of the request, e.g.
 * `https://compute.example.com/v1.1`.
 */
export class ServerViewBuilder {
	private readonly bookmarkUrl: string;

	constructor(
		private readonly baseUrl: string,
		private readonly projectId: string,
	) {
		this.bookmarkUrl = baseUrl.replace(VERSION_SUFFIX, '');
	}

	links(collection: 'servers' | 'images' | 'flavors', id: string): Link[] {
		return [
			{ rel: 'self', href: `${this.baseUrl}/${this.projectId}/${collection}/${id}` },
			{ rel: 'bookmark', href: `${this.bookmarkUrl}/${this.projectId}/${collection}/${id}` },
		];
	}

	private bookmark(collection: 'images' | 'flavors', id: string): Link[] {
		return [{ rel: 'bookmark', href: `${this.bookmarkUrl}/${this.projectId}/${collection}/${id}` }];
	}

	summary(instance: InstanceRecord): ServerSummary {
		return {
			id: instance.id,
			name: instance.name,
			links: this.links('servers', instance.id),
		};
	}

	detail(instance: InstanceRecord): ServerDetail {
		return {
			id: instance.id,
			name: instance.name,
			status: statusFromState(instance.vmState, instance.taskState),
			tenantId: instance.projectId,
			userId: instance.userId,
			hostId: instance.hostId,
			accessIPv4: instance.accessIpV4 ?? '',
			accessIPv6: instance.accessIpV6 ?? '',
			progress: instance.progress,
			created: instance.createdAt.toISOString(),
			updated: instance.updatedAt.toISOString(),
			image: { id: instance.imageRef, links: this.bookmark('images', instance.imageRef) },
			flavor: { id: instance.flavorId, links: this.bookmark('flavors', instance.flavorId) },
			metadata: { ...instance.metadata },
			addresses: Object.fromEntries(
				Object.entries(instance.addresses).map(([label, addresses]) => [
					label,
					addresses.map((address) => ({ version: address.version, addr: address.addr })),
				]),
			),
			security_groups: instance.securityGroups.map((name) => ({ name })),
			key_name: instance.keyName ?? '',
			links: this.links('servers', instance.id),
		};
	}
}
