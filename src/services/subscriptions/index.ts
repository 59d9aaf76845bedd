export { SubscriptionManager, type SubscriptionManagerOptions } from './manager.js';
export { SubscriptionTable, type SubscriptionPatch } from './table.js';
export { SqliteSubscriptionStore, MemorySubscriptionStore, type SubscriptionStore } from './repository.js';
export * from './policy.js';
