export { MemoryJobQueue, type MemoryJobQueueOptions } from "./memory.js";
export type { JobQueue, QueueStats, RetryScheduling } from "./interface.js";
