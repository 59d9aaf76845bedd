export { WorkerPool, type WorkerPoolOptions } from "./worker-pool.js";
export { DigestHandler } from "./handlers/index.js";
export { MemoryJobQueue, type JobQueue, type QueueStats } from "./queue/index.js";
export type { Job, JobHandler, JobStatus, DigestJobPayload } from "./types.js";
