import { Hono, type Context } from 'hono';
import { errorMessage } from '../../lib/errors.js';
import type { NotificationIntake } from '../../services/intake/notification-intake.js';

// Some validation requests carry the token in a JSON body instead of the query string
function validationTokenOf(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('validationToken' in body)) return null;
  const token = body.validationToken;
  return typeof token === 'string' && token.length > 0 ? token : null;
}

type BodyRead = { ok: true; body: unknown } | { ok: false };

async function readJson(c: Context): Promise<BodyRead> {
  const raw = await c.req.text();
  try {
    return { ok: true, body: JSON.parse(raw) };
  } catch (error) {
    console.warn(`[Webhook] Unparseable notification body: ${errorMessage(error)}`);
    return { ok: false };
  }
}

/**
 * Push boundary. Public: callers authenticate per event with the client-state secret.
 */
export function webhookRoutes(intake: NotificationIntake) {
  const routes = new Hono();

  // POST /webhook/notifications - Validation request or change notification batch
  routes.post('/notifications', async (c) => {
    const validationToken = c.req.query('validationToken');
    if (validationToken) {
      return c.text(validationToken, 200);
    }

    const read = await readJson(c);
    if (!read.ok) {
      return c.text('Invalid notification format', 400);
    }

    const token = validationTokenOf(read.body);
    if (token) {
      return c.text(token, 200);
    }

    const results = intake.handleBatch(read.body);
    if (results.some((r) => r.status === 'rejected' && r.reason === 'Overloaded')) {
      // Provider redelivers later; accepted items of this batch dedup on redelivery
      return c.text('Overloaded', 503);
    }

    return c.body(null, 202);
  });

  // POST /webhook/lifecycle - Validation request or lifecycle notification batch
  routes.post('/lifecycle', async (c) => {
    const validationToken = c.req.query('validationToken');
    if (validationToken) {
      return c.text(validationToken, 200);
    }

    const read = await readJson(c);
    if (!read.ok) {
      return c.text('Invalid notification format', 400);
    }

    const token = validationTokenOf(read.body);
    if (token) {
      return c.text(token, 200);
    }

    intake.handleLifecycleBatch(read.body);
    return c.body(null, 202);
  });

  return routes;
}
