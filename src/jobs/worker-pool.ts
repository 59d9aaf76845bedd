import { backoffDelay } from "../lib/retry.js";
import { errorMessage, isRecoverable } from "../lib/errors.js";
import type { JobQueue } from "./queue/interface.js";
import type { Job, JobHandler } from "./types.js";

export interface WorkerPoolOptions {
  queue: JobQueue;
  handler: JobHandler;
  workers: number;
  /** In-flight jobs get this long to finish on stop */
  shutdownGraceMs: number;
  /** Sleep between claims while the queue is empty */
  idleDelayMs?: number;
  retryBaseDelayMs?: number;
}

export class WorkerPool {
  private workers: Worker[] = [];
  private running = false;

  constructor(private readonly options: WorkerPoolOptions) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      console.warn("Worker pool already running");
      return;
    }

    this.running = true;
    console.log(`Starting worker pool with ${this.options.workers} workers`);

    for (let i = 0; i < this.options.workers; i++) {
      const worker = new Worker(i + 1, this.options);
      this.workers.push(worker);
      worker.start();
    }
  }

  /**
   * Stop claiming, drop queued jobs, and wait up to the grace period for
   * jobs already running. Nothing is retried after this point.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    console.log("Stopping worker pool");
    this.running = false;

    for (const worker of this.workers) {
      worker.stop();
    }

    const dropped = this.options.queue.close();
    if (dropped.length > 0) {
      console.warn(
        `Dropped ${dropped.length} queued job(s): ${dropped.map((job) => job.payload.messageId).join(", ")}`
      );
    }

    const inFlight = this.workers.map((worker) => worker.idle());
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.options.shutdownGraceMs);
    });

    const outcome = await Promise.race([Promise.all(inFlight).then(() => "done" as const), grace]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      const busy = this.workers.filter((worker) => worker.busy).length;
      console.warn(`Grace period elapsed with ${busy} job(s) still running`);
    }

    this.workers = [];
  }
}

class Worker {
  private running = false;
  private current: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly id: number,
    private readonly options: WorkerPoolOptions
  ) {}

  get busy(): boolean {
    return this.current !== null;
  }

  start() {
    this.running = true;
    this.loop().catch((error) => {
      console.error(`[Worker ${this.id}] Worker loop crashed:`, error);
    });
  }

  stop() {
    this.running = false;
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    this.wake?.();
  }

  /** Resolves once the job in progress (if any) has settled */
  async idle(): Promise<void> {
    await this.current;
  }

  private async loop() {
    while (this.running) {
      const job = this.options.queue.claim();

      if (!job) {
        await this.sleep(this.options.idleDelayMs ?? 1000);
        continue;
      }

      console.log(`[Worker ${this.id}] Processing job ${job.id} (message ${job.payload.messageId})`);
      this.current = this.processJob(job);
      try {
        await this.current;
      } finally {
        this.current = null;
      }
    }
  }

  private async processJob(job: Job) {
    const { queue, handler } = this.options;

    try {
      await handler.handle(job);

      queue.complete(job.id);
      console.log(`[Worker ${this.id}] Job ${job.id} completed successfully`);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Worker ${this.id}] Job ${job.id} failed:`, message);

      if (!this.running) {
        queue.fail(job.id, message);
        console.warn(`[Worker ${this.id}] Job ${job.id} not retried: shutting down`);
        return;
      }

      if (isRecoverable(error) && job.attempts + 1 < job.maxAttempts) {
        const delayMs = backoffDelay(job.attempts, this.options.retryBaseDelayMs);
        queue.retry(job.id, message, { delayMs, payload: job.payload });
        console.log(
          `[Worker ${this.id}] Job ${job.id} will retry in ${delayMs}ms (attempt ${job.attempts + 1}/${job.maxAttempts})`
        );
      } else {
        queue.fail(job.id, message);
        console.error(`[Worker ${this.id}] Job ${job.id} failed permanently after ${job.attempts + 1} attempts`);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wake?.();
      }, ms);
    });
  }
}
