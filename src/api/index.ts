// ═══════════════════════════════════════════════════════════════════════════════
// API MODULE — HTTP Surface for the Tiered Memory
// ═══════════════════════════════════════════════════════════════════════════════

export {
  createApiRouter,
  createMemoryRouter,
  createMemoryHandlers,
  type ApiRouterOptions,
  type MemoryHandlers,
  type RouteHandler,
} from './routes/index.js';

export {
  ApiError,
  ValidationError,
  NotFoundError,
  InternalError,
  toApiError,
  errorHandler,
} from './middleware/error-handler.js';

export * from './schemas/index.js';
