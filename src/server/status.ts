/**
 * Herald: Status Server
 *
 * Read-only operator view of the running bot. Failures never reach the
 * broadcast channel; this is where they show up instead.
 *
 * Endpoints:
 * - GET /health: liveness and scheduler state
 * - GET /status: seen counts, corrupt categories, last cycle
 *
 * Started only when STATUS_PORT is set.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { logger } from '../lib/logger';
import type { SeenStore } from '../db/seen-store';
import type { Scheduler } from '../pipeline/scheduler';

export interface StatusDependencies {
  scheduler: Pick<Scheduler, 'state' | 'lastResult' | 'skippedTriggers' | 'completedCycles'>;
  store: Pick<SeenStore, 'snapshot' | 'corruptCategories'>;
  startedAt?: Date;
}

export function createStatusApp(deps: StatusDependencies): Express {
  const app = express();
  const startedAt = deps.startedAt ?? new Date();

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      scheduler: deps.scheduler.state,
      lastCycleAt: deps.scheduler.lastResult?.finishedAt ?? null,
    });
  });

  // ============================================================
  // STATUS ENDPOINT
  // ============================================================

  app.get('/status', (_req: Request, res: Response) => {
    res.json({
      startedAt: startedAt.toISOString(),
      scheduler: {
        state: deps.scheduler.state,
        completedCycles: deps.scheduler.completedCycles,
        skippedTriggers: deps.scheduler.skippedTriggers,
      },
      store: {
        seen: deps.store.snapshot(),
        corruptCategories: deps.store.corruptCategories(),
      },
      lastCycle: deps.scheduler.lastResult ?? null,
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error in status server', { error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

/**
 * Listen on `port`; resolves once the socket is bound.
 */
export function startStatusServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info('Status server listening', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
