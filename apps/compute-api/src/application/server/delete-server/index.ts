export { createDeleteServerUseCase, type DeleteServerInput, type DeleteServerUseCaseDeps } from './use-case.js';
