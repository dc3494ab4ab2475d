// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const memory = createTieredMemory({ config: loadMemoryConfig() });
//   app.use(express.json());
//   app.use('/api/v1', createApiRouter(memory));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { TieredMemory } from '../../core/memory/index.js';
import { getLogger } from '../../logging/index.js';
import { errorHandler } from '../middleware/error-handler.js';
import { createMemoryRouter } from './memory.js';

export { createMemoryRouter, createMemoryHandlers, type MemoryHandlers, type RouteHandler } from './memory.js';

const logger = getLogger({ component: 'api-routes' });

export interface ApiRouterOptions {
  /**
   * Path the memory routes are mounted under.
   * @default '/memory'
   */
  readonly memoryPath?: string;
}

/**
 * Memory routes plus the shared error middleware, ready to mount.
 */
export function createApiRouter(memory: TieredMemory, options: ApiRouterOptions = {}): Router {
  const memoryPath = options.memoryPath ?? '/memory';
  const router = Router();

  router.use(memoryPath, createMemoryRouter(memory));
  logger.debug('Mounted memory router', { path: memoryPath });

  router.use(errorHandler);

  return router;
}
