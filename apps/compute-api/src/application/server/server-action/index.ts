export {
	ADMIN_ACTIONS,
	BASE_ACTIONS,
	availableActions,
	parseActionRequest,
	type ActionName,
	type ActionRequest,
	type ActionRequestOptions,
} from './action-request.js';
export {
	createServerActionUseCase,
	type ActionOutcome,
	type ServerActionInput,
	type ServerActionUseCaseDeps,
} from './use-case.js';
