import { Hono } from 'hono';
import type { QueueStats } from '../../jobs/queue/interface.js';

export interface HealthDeps {
  queueStats?: () => QueueStats;
}

export function healthRoutes(deps: HealthDeps = {}) {
  const routes = new Hono();

  // GET /api/health - Health check endpoint (no auth required)
  routes.get('/', (c) => {
    const queue = deps.queueStats?.();
    return c.json(queue ? { status: 'ok', queue } : { status: 'ok' });
  });

  return routes;
}
