export {
	createListServerActionsUseCase,
	type ListServerActionsInput,
	type ListServerActionsUseCaseDeps,
} from './use-case.js';
