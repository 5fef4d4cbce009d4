export { registerServerRoutes, type ServerRoutesDeps } from './servers.js';
export {
	ServerViewBuilder,
	ServerDetailSchema,
	ServerSummarySchema,
	type ServerDetail,
	type ServerSummary,
	type Link,
} from './views.js';
