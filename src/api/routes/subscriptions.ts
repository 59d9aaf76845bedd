import { Hono } from 'hono';
import { z } from 'zod';
import type { Subscription } from '../../shared/types/api.js';
import type { SubscriptionManager } from '../../services/subscriptions/manager.js';
import { errorResponse } from '../errors.js';

const CreateSubscriptionBody = z.object({
  resource: z.string().min(1).optional(),
  lifetimeMinutes: z.number().int().optional(),
});

/** Subscription as shown to operators: never includes the client-state secret */
export function toSubscriptionView(subscription: Subscription) {
  return {
    id: subscription.id,
    resource: subscription.resource,
    change_type: subscription.changeType,
    status: subscription.status,
    expiration: subscription.expiration.toISOString(),
    issued_at: subscription.issuedAt.toISOString(),
  };
}

export function subscriptionRoutes(manager: SubscriptionManager, defaultResource: string) {
  const routes = new Hono();

  // GET /api/subscriptions - Tracked subscriptions
  routes.get('/', (c) => c.json(manager.list().map(toSubscriptionView)));

  // POST /api/subscriptions - Create a subscription
  routes.post('/', async (c) => {
    try {
      const raw: unknown = await c.req.json().catch(() => ({}));
      const body = CreateSubscriptionBody.parse(raw);
      const created = await manager.create(body.resource ?? defaultResource, body.lifetimeMinutes);
      return c.json(toSubscriptionView(created), 201);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // POST /api/subscriptions/sweep - Renew everything due now
  routes.post('/sweep', async (c) => {
    try {
      const remaining = await manager.sweep();
      return c.json(remaining.map(toSubscriptionView));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // POST /api/subscriptions/:id/renew
  routes.post('/:id/renew', async (c) => {
    try {
      const renewed = await manager.renew(c.req.param('id'));
      return c.json(toSubscriptionView(renewed));
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  // DELETE /api/subscriptions/:id
  routes.delete('/:id', async (c) => {
    try {
      await manager.revoke(c.req.param('id'));
      return c.body(null, 204);
    } catch (error) {
      return errorResponse(c, error);
    }
  });

  return routes;
}
