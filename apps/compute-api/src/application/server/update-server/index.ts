export type { UpdateServerCommand } from './command.js';
export {
	createUpdateServerUseCase,
	parseUpdateServerCommand,
	type UpdateServerInput,
	type UpdateServerUseCaseDeps,
} from './use-case.js';
