import { Hono } from 'hono';
import type { DigestLog } from '../../services/digests/log.js';
import type { Poller } from '../../workflows/poller.js';
import { errorResponse } from '../errors.js';

export function digestRoutes(digestLog: DigestLog, poller: Pick<Poller, 'poll'>) {
  const routes = new Hono();

  // GET /api/digests - Recent digest results
  routes.get('/digests', (c) => {
    const requested = parseInt(c.req.query('limit') || '50', 10);
    const limit = Math.min(Number.isNaN(requested) || requested < 1 ? 50 : requested, 500);
    return c.json(digestLog.recent(limit));
  });

  // POST /api/poll - Run one poll now
  routes.post('/poll', async (c) => {
    try {
      const summary = await poller.poll();
      if (!summary) {
        return c.json({ detail: 'Poll already in progress' }, 409);
      }
      return c.json({
        listed: summary.listed,
        already_delivered: summary.alreadyDelivered,
        results: summary.results,
      });
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
