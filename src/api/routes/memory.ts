// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY ROUTES — Feed and Query a Session's Tiered Memory over HTTP
// ═══════════════════════════════════════════════════════════════════════════════
//
// POST   /events                 - Record an event of any kind
// POST   /events/chat            - Record a chat line
// POST   /events/vision          - Record a screen summary
// POST   /events/app-activity    - Record a foreground app switch
// GET    /context                - Bounded digest for prompt context
// GET    /recent                 - Latest events, oldest first
// GET    /important              - Highest-importance events
// GET    /archive/:date          - One day bucket
// GET    /stats                  - Layer sizes
// POST   /sweep                  - Decay and archive now
// DELETE /                       - Forget everything
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { TieredMemory } from '../../core/memory/index.js';
import { getLogger } from '../../logging/index.js';
import { NotFoundError } from '../middleware/error-handler.js';
import {
  AddEventSchema,
  AddChatSchema,
  AddVisionSchema,
  AddAppActivitySchema,
  ContextQuerySchema,
  CountQuerySchema,
  ArchiveDateParamSchema,
} from '../schemas/index.js';

const logger = getLogger({ component: 'memory-routes' });

export type RouteHandler = (req: Request, res: Response, next: NextFunction) => void;

// Handlers are synchronous; anything they throw goes to the error middleware
function handle(fn: (req: Request, res: Response) => void): RouteHandler {
  return (req, res, next) => {
    try {
      fn(req, res);
    } catch (error) {
      next(error);
    }
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

export interface MemoryHandlers {
  addEvent: RouteHandler;
  addChat: RouteHandler;
  addVision: RouteHandler;
  addAppActivity: RouteHandler;
  getContext: RouteHandler;
  getRecent: RouteHandler;
  getImportant: RouteHandler;
  getArchive: RouteHandler;
  getStats: RouteHandler;
  sweep: RouteHandler;
  clear: RouteHandler;
}

export function createMemoryHandlers(memory: TieredMemory): MemoryHandlers {
  return {
    addEvent: handle((req, res) => {
      const { kind, payload } = AddEventSchema.parse(req.body);
      const event = memory.add(kind, payload);
      res.status(201).json({ event });
    }),

    addChat: handle((req, res) => {
      const { text, who } = AddChatSchema.parse(req.body);
      const event = memory.addChat(text, who);
      res.status(201).json({ event });
    }),

    addVision: handle((req, res) => {
      const { summary, path } = AddVisionSchema.parse(req.body);
      const event = memory.addVision(summary, path);
      res.status(201).json({ event });
    }),

    addAppActivity: handle((req, res) => {
      const { app, category, surprised, curious } = AddAppActivitySchema.parse(req.body);
      const event = memory.addAppActivity(app, category, { surprised, curious });
      res.status(201).json({ event });
    }),

    getContext: handle((req, res) => {
      const { maxLines } = ContextQuerySchema.parse(req.query);
      res.json({ summary: memory.getContextSummary(maxLines) });
    }),

    getRecent: handle((req, res) => {
      const { count } = CountQuerySchema.parse(req.query);
      res.json({ events: memory.getRecent(count) });
    }),

    getImportant: handle((req, res) => {
      const { count } = CountQuerySchema.parse(req.query);
      res.json({ events: memory.getImportant(count) });
    }),

    getArchive: handle((req, res) => {
      const { date } = ArchiveDateParamSchema.parse(req.params);
      const bucket = memory.getArchiveForDate(date);
      if (!bucket) {
        throw new NotFoundError('Archive', date);
      }
      res.json({ bucket });
    }),

    getStats: handle((_req, res) => {
      res.json({ stats: memory.getMemoryStats() });
    }),

    sweep: handle((_req, res) => {
      const report = memory.sweep();
      logger.info('Manual sweep', { ...report });
      res.json({ report });
    }),

    clear: handle((_req, res) => {
      memory.clear();
      logger.info('Memory cleared on request');
      res.status(204).end();
    }),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER
// ─────────────────────────────────────────────────────────────────────────────────

export function createMemoryRouter(memory: TieredMemory): Router {
  const router = Router();
  const handlers = createMemoryHandlers(memory);

  router.post('/events', handlers.addEvent);
  router.post('/events/chat', handlers.addChat);
  router.post('/events/vision', handlers.addVision);
  router.post('/events/app-activity', handlers.addAppActivity);

  router.get('/context', handlers.getContext);
  router.get('/recent', handlers.getRecent);
  router.get('/important', handlers.getImportant);
  router.get('/archive/:date', handlers.getArchive);
  router.get('/stats', handlers.getStats);

  router.post('/sweep', handlers.sweep);
  router.delete('/', handlers.clear);

  return router;
}
