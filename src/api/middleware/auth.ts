import { createMiddleware } from 'hono/factory';
import { secretsMatch } from '../../lib/secrets.js';

export interface BasicAuthCredentials {
  username: string;
  password: string;
}

/**
 * HTTP Basic Authentication middleware.
 * Without credentials every route is public (single-user / trusted environment).
 */
export function basicAuth(creds?: BasicAuthCredentials) {
  return createMiddleware(async (c, next) => {
    if (!creds) {
      return next();
    }

    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Basic ')) {
      c.header('WWW-Authenticate', 'Basic realm="Inbox Digest"');
      return c.json({ detail: 'Unauthorized' }, 401);
    }

    const decoded = Buffer.from(authHeader.slice('Basic '.length), 'base64').toString('utf-8');
    const separator = decoded.indexOf(':');
    const username = separator === -1 ? decoded : decoded.slice(0, separator);
    const password = separator === -1 ? '' : decoded.slice(separator + 1);

    const userOk = secretsMatch(username, creds.username);
    const passwordOk = secretsMatch(password, creds.password);
    if (!userOk || !passwordOk) {
      c.header('WWW-Authenticate', 'Basic realm="Inbox Digest"');
      return c.json({ detail: 'Unauthorized' }, 401);
    }

    return next();
  });
}
