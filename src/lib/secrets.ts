import { createHash, randomBytes, timingSafeEqual } from 'crypto';

/**
 * Random client-state secret, URL safe. Graph caps clientState at 128 characters.
 */
export function generateClientState(bytes = 32): string {
  return randomBytes(bytes).toString('base64url');
}

/**
 * Constant-time string comparison.
 * Both sides are hashed first so inputs of different length take the same path.
 */
export function secretsMatch(received: string, expected: string): boolean {
  const a = createHash('sha256').update(received, 'utf-8').digest();
  const b = createHash('sha256').update(expected, 'utf-8').digest();
  return timingSafeEqual(a, b) && received.length === expected.length;
}
