// Lifetime and renewal-threshold arithmetic for push subscriptions

const MINUTE_MS = 60 * 1000;

export interface RenewalPolicy {
  /** Provider maximum lifetime in minutes */
  maxLifetimeMinutes: number;
  /** Renew when this fraction of the total lifetime remains */
  renewalFraction: number;
  /** Lower bound on the renewal window */
  minRenewalWindowMinutes: number;
}

/** Clamp to [1, max] minutes, silently */
export function clampLifetime(lifetimeMinutes: number, maxLifetimeMinutes: number): number {
  if (!Number.isFinite(lifetimeMinutes)) return maxLifetimeMinutes;
  return Math.min(Math.max(Math.floor(lifetimeMinutes), 1), maxLifetimeMinutes);
}

export function renewalWindowMs(
  subscription: { expiration: Date; issuedAt: Date },
  policy: RenewalPolicy
): number {
  const lifetime = Math.max(subscription.expiration.getTime() - subscription.issuedAt.getTime(), 0);
  return Math.max(lifetime * policy.renewalFraction, policy.minRenewalWindowMinutes * MINUTE_MS);
}

function remainingMs(subscription: { expiration: Date }, now: Date): number {
  return subscription.expiration.getTime() - now.getTime();
}

/** Remaining lifetime has dropped under the renewal threshold */
export function isDueForRenewal(
  subscription: { expiration: Date; issuedAt: Date },
  policy: RenewalPolicy,
  now: Date
): boolean {
  return remainingMs(subscription, now) < renewalWindowMs(subscription, policy);
}

export function isPastExpiration(subscription: { expiration: Date }, now: Date): boolean {
  return remainingMs(subscription, now) <= 0;
}

export function expirationFrom(now: Date, lifetimeMinutes: number): Date {
  return new Date(now.getTime() + lifetimeMinutes * MINUTE_MS);
}
