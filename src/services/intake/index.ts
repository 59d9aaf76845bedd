export {
  NotificationIntake,
  type IntakeResult,
  type LifecycleResult,
  type LifecycleTriggers,
  type NotificationIntakeOptions,
  type RejectionReason,
} from './notification-intake.js';
export { DedupCache, dedupKey, type DedupCacheOptions } from './dedup-cache.js';
export * from './payload.js';
