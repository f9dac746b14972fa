// REST endpoints (Fastify)
export type { ApiError, ApiResponse, RouteDependencies } from './types.js';
export { registerErrorHandler, sendSuccess, sendError } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
