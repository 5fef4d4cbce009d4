/**
 * Servers API
 *
 * Endpoints for creating, inspecting, updating, deleting and acting on
 * compute instances. Bodies may be JSON or XML; both are normalized to the
 * same mapping before they reach a use case.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import {
	Type,
	type Static,
	errorResponses,
	isXmlRequest,
	matchResult,
	noContent,
	sendError,
	sendResult,
} from '@computegate/http';
import { Result } from '@computegate/application';
import type { UseCase } from '@computegate/application';
import type { InstanceActionRecord, InstanceDiagnostics, InstanceRecord } from '../domain/index.js';
import {
	normalizeBody,
	type ActionOutcome,
	type BodyKind,
	type CreateServerInput,
	type CreateServerOutput,
	type DeleteServerInput,
	type ListServerActionsInput,
	type ListServersInput,
	type RequestBody,
	type ServerActionInput,
	type ServerDiagnosticsInput,
	type ShowServerInput,
	type UpdateServerInput,
} from '../application/index.js';
import {
	DiagnosticsResponseSchema,
	ReservationResponseSchema,
	ServerActionListSchema,
	ServerDetailListSchema,
	ServerResponseSchema,
	ServerSummaryListSchema,
	ServerViewBuilder,
	actionView,
} from './views.js';

// ─── Request Schemas ────────────────────────────────────────────────────────

const ProjectParams = Type.Object({ projectId: Type.String() });
const ServerParams = Type.Object({ projectId: Type.String(), id: Type.String() });

type ProjectParams = Static<typeof ProjectParams>;
type ServerParams = Static<typeof ServerParams>;

/**
 * Dependencies for the servers API.
 */
export interface ServerRoutesDeps {
	readonly createServerUseCase: UseCase<CreateServerInput, CreateServerOutput>;
	readonly updateServerUseCase: UseCase<UpdateServerInput, InstanceRecord>;
	readonly deleteServerUseCase: UseCase<DeleteServerInput, void>;
	readonly showServerUseCase: UseCase<ShowServerInput, InstanceRecord>;
	readonly listServersUseCase: UseCase<ListServersInput, InstanceRecord[]>;
	readonly serverActionUseCase: UseCase<ServerActionInput, ActionOutcome>;
	/** Admin API only; the diagnostics route is not registered without it */
	readonly serverDiagnosticsUseCase?: UseCase<ServerDiagnosticsInput, InstanceDiagnostics> | undefined;
	/** Admin API only; the actions route is not registered without it */
	readonly listServerActionsUseCase?: UseCase<ListServerActionsInput, InstanceActionRecord[]> | undefined;
	/** Public base URL including the version, e.g. `https://compute.example.com/v1.1` */
	readonly publicBaseUrl?: string | undefined;
}

/**
 * Register the servers routes. Mount under a `/v1.1/:projectId` prefix.
 */
export async function registerServerRoutes(fastify: FastifyInstance, deps: ServerRoutesDeps): Promise<void> {
	const {
		createServerUseCase,
		updateServerUseCase,
		deleteServerUseCase,
		showServerUseCase,
		listServersUseCase,
		serverActionUseCase,
		serverDiagnosticsUseCase,
		listServerActionsUseCase,
		publicBaseUrl,
	} = deps;

	function baseUrlOf(request: FastifyRequest): string {
		return publicBaseUrl ?? `${request.protocol}://${request.host}/v1.1`;
	}

	function viewsFor(request: FastifyRequest): ServerViewBuilder {
		return new ServerViewBuilder(baseUrlOf(request), request.executionContext.projectId);
	}

	function bodyOf(request: FastifyRequest, kind: BodyKind): Result<RequestBody> {
		return normalizeBody(request.body, isXmlRequest(request) ? 'xml' : 'json', kind);
	}

	// GET /servers - List servers
	fastify.get<{ Params: ProjectParams }>(
		'/servers',
		{
			schema: {
				params: ProjectParams,
				response: { 200: ServerSummaryListSchema, ...errorResponses(400, 404) },
			},
		},
		async (request, reply) => {
			const result = await listServersUseCase.execute({ query: request.query }, request.executionContext);
			const views = viewsFor(request);
			return sendResult(reply, result, {
				transform: (instances) => ({ servers: instances.map((instance) => views.summary(instance)) }),
			});
		},
	);

	// GET /servers/detail - List servers with details
	fastify.get<{ Params: ProjectParams }>(
		'/servers/detail',
		{
			schema: {
				params: ProjectParams,
				response: { 200: ServerDetailListSchema, ...errorResponses(400, 404) },
			},
		},
		async (request, reply) => {
			const result = await listServersUseCase.execute({ query: request.query }, request.executionContext);
			const views = viewsFor(request);
			return sendResult(reply, result, {
				transform: (instances) => ({ servers: instances.map((instance) => views.detail(instance)) }),
			});
		},
	);

	// GET /servers/:id - Show server
	fastify.get<{ Params: ServerParams }>(
		'/servers/:id',
		{
			schema: {
				params: ServerParams,
				response: { 200: ServerResponseSchema, ...errorResponses(404) },
			},
		},
		async (request, reply) => {
			const result = await showServerUseCase.execute({ serverId: request.params.id }, request.executionContext);
			const views = viewsFor(request);
			return sendResult(reply, result, { transform: (instance) => ({ server: views.detail(instance) }) });
		},
	);

	// POST /servers - Create server
	fastify.post<{ Params: ProjectParams }>(
		'/servers',
		{
			schema: {
				params: ProjectParams,
				response: {
					202: Type.Union([ServerResponseSchema, ReservationResponseSchema]),
					...errorResponses(400, 413, 422),
				},
			},
		},
		async (request, reply) => {
			const body = bodyOf(request, 'server');
			if (Result.isFailure(body)) {
				return sendError(reply, body.error);
			}

			const result = await createServerUseCase.execute(
				{ body: body.value, baseUrl: baseUrlOf(request) },
				request.executionContext,
			);
			const views = viewsFor(request);
			return sendResult(reply, result, {
				successStatus: 202,
				transform: (created) =>
					created.kind === 'reservation'
						? { reservation_id: created.reservationId }
						: { server: { ...views.detail(created.instance), adminPass: created.adminPass } },
			});
		},
	);

	// PUT /servers/:id - Update server
	fastify.put<{ Params: ServerParams }>(
		'/servers/:id',
		{
			schema: {
				params: ServerParams,
				response: { 200: ServerResponseSchema, ...errorResponses(400, 404, 422) },
			},
		},
		async (request, reply) => {
			const body = bodyOf(request, 'server');
			if (Result.isFailure(body)) {
				return sendError(reply, body.error);
			}

			const result = await updateServerUseCase.execute(
				{ serverId: request.params.id, body: body.value },
				request.executionContext,
			);
			const views = viewsFor(request);
			return sendResult(reply, result, { transform: (instance) => ({ server: views.detail(instance) }) });
		},
	);

	// DELETE /servers/:id - Delete server
	fastify.delete<{ Params: ServerParams }>(
		'/servers/:id',
		{
			schema: {
				params: ServerParams,
				response: errorResponses(404),
			},
		},
		async (request, reply) => {
			const result = await deleteServerUseCase.execute({ serverId: request.params.id }, request.executionContext);
			return matchResult(reply, result, () => noContent(reply));
		},
	);

	// POST /servers/:id/action - Act on a server
	fastify.post<{ Params: ServerParams }>(
		'/servers/:id/action',
		{
			schema: {
				params: ServerParams,
				response: errorResponses(400, 404, 409, 413, 422),
			},
		},
		async (request, reply) => {
			const body = bodyOf(request, 'action');
			if (Result.isFailure(body)) {
				return sendError(reply, body.error);
			}

			const result = await serverActionUseCase.execute(
				{ serverId: request.params.id, body: body.value, baseUrl: baseUrlOf(request) },
				request.executionContext,
			);
			const views = viewsFor(request);
			return matchResult(reply, result, (outcome) => {
				switch (outcome.kind) {
					case 'accepted':
						return reply.status(202).send();
					case 'no_content':
						return noContent(reply);
					case 'image':
						return reply.status(202).header('location', outcome.location).send();
					case 'rebuilt':
						return reply
							.status(202)
							.send({ server: { ...views.detail(outcome.instance), adminPass: outcome.adminPass } });
				}
			});
		},
	);

	if (serverDiagnosticsUseCase) {
		// GET /servers/:id/diagnostics - Hypervisor diagnostics
		fastify.get<{ Params: ServerParams }>(
			'/servers/:id/diagnostics',
			{
				schema: {
					params: ServerParams,
					response: { 200: DiagnosticsResponseSchema, ...errorResponses(404) },
				},
			},
			async (request, reply) => {
				const result = await serverDiagnosticsUseCase.execute(
					{ serverId: request.params.id },
					request.executionContext,
				);
				return sendResult(reply, result);
			},
		);
	}

	if (listServerActionsUseCase) {
		// GET /servers/:id/actions - Action log
		fastify.get<{ Params: ServerParams }>(
			'/servers/:id/actions',
			{
				schema: {
					params: ServerParams,
					response: { 200: ServerActionListSchema, ...errorResponses(404) },
				},
			},
			async (request, reply) => {
				const result = await listServerActionsUseCase.execute(
					{ serverId: request.params.id },
					request.executionContext,
				);
				return sendResult(reply, result, { transform: (entries) => ({ actions: entries.map(actionView) }) });
			},
		);
	}
}
