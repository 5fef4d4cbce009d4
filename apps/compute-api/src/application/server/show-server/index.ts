export { createShowServerUseCase, type ShowServerInput, type ShowServerUseCaseDeps } from './use-case.js';
