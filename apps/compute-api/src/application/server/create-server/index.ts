export type { CreateServerCommand } from './command.js';
export {
	parseCreateServerCommand,
	type BlockDeviceMappingHook,
	type CreateServerParseOptions,
} from './parse-command.js';
export {
	createCreateServerUseCase,
	type CreateServerInput,
	type CreateServerOutput,
	type CreateServerUseCaseDeps,
} from './use-case.js';
