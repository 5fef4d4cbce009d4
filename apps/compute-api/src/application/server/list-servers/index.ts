export {
	buildSearchOptions,
	flattenQuery,
	parseIsoTime,
	removeInvalidOptions,
	PUBLIC_SEARCH_OPTIONS,
	type SearchOptionsConfig,
} from './search-options.js';
export { createListServersUseCase, type ListServersInput, type ListServersUseCaseDeps } from './use-case.js';
