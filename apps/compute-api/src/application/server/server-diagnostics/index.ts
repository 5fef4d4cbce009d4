export {
	createServerDiagnosticsUseCase,
	type ServerDiagnosticsInput,
	type ServerDiagnosticsUseCaseDeps,
} from './use-case.js';
