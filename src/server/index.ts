export { createServer } from './server';
export { createHandlers } from './handlers';
export { createTokenAuth } from './auth';
export type { ApiHandlers, ApiRequest, ApiResponse, ServerDependencies } from './types';
