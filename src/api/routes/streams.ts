import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { StreamSupervisor } from '../../services/supervisor/StreamSupervisor';
import { StreamReaper } from '../../services/supervisor/StreamReaper';
import { parseStreamSpec } from '../../domain/stream/StreamSpec';
import { ValidationError } from '../../utils/errors';

// Validation schemas
const stopSchema = z
  .object({
    force: z.boolean().optional(),
  })
  .default({});

const cleanupSchema = z
  .object({
    ids: z.union([z.literal('all'), z.array(z.string().min(1))]).optional(),
    killAllManaged: z.boolean().optional(),
    removeLogs: z.boolean().optional(),
  })
  .default({});

const logsQuerySchema = z.object({
  lines: z.coerce.number().int().optional(),
});

/** The supervisor and reaper operations the routes call */
export type StreamControl = Pick<StreamSupervisor, 'listAll' | 'start' | 'stop' | 'stopAll' | 'status' | 'tailLog'>;
export type StreamMaintenance = Pick<StreamReaper, 'sweep' | 'cleanup'>;

export interface StreamRouteOptions {
  /** Guards every route in this router */
  requireAuth: RequestHandler;
  defaultTailLines: number;
  maxTailLines: number;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid request body', parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

export const createStreamRoutes = (
  supervisor: StreamControl,
  reaper: StreamMaintenance,
  options: StreamRouteOptions
) => {
  const router = Router();
  router.use(options.requireAuth);

  /**
   * GET /api/streams
   * List all streams
   */
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        success: true,
        data: supervisor.listAll(),
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /api/streams
   * Start a stream
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const spec = parseStreamSpec(req.body);
      const status = await supervisor.start(spec);
      res.status(201).json({
        success: true,
        data: status,
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /api/streams/stop-all
   * Stop every running stream
   */
  router.post('/stop-all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(stopSchema, req.body);
      const stopped = await supervisor.stopAll({ force: body.force });
      res.json({
        success: true,
        data: { stopped },
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /api/streams/sweep
   * Reconcile stream states with the OS now
   */
  router.post('/sweep', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await reaper.sweep();
      res.json({
        success: true,
        data: result,
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /api/streams/cleanup
   * Remove finished streams, optionally killing all managed processes first
   */
  router.post('/cleanup', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(cleanupSchema, req.body);
      const result = await reaper.cleanup({
        ids: body.ids,
        killAllManaged: body.killAllManaged,
        removeLogs: body.removeLogs,
      });
      res.json({
        success: true,
        data: result,
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * GET /api/streams/:id
   * Stream status with fresh liveness
   */
  router.get('/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        success: true,
        data: supervisor.status(req.params.id),
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * POST /api/streams/:id/stop
   * Stop a stream
   */
  router.post('/:id/stop', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(stopSchema, req.body);
      const status = await supervisor.stop(req.params.id, { force: body.force });
      res.json({
        success: true,
        data: status,
      });
    } catch (error) {
      return next(error);
    }
  });

  /**
   * GET /api/streams/:id/logs?lines=200
   * Tail of the stream's log as plain text
   */
  router.get('/:id/logs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = logsQuerySchema.safeParse(req.query);
      const requested = query.success && query.data.lines !== undefined ? query.data.lines : options.defaultTailLines;
      const lines = Math.max(1, Math.min(requested, options.maxTailLines));

      const logLines = await supervisor.tailLog(req.params.id, lines);
      res.type('text/plain').send(logLines.join('\n'));
    } catch (error) {
      return next(error);
    }
  });

  return router;
};
