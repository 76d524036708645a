import { errorMessage } from "../lib/errors";
import type { IngestJob } from "../contracts";

export type JobHandler = (job: IngestJob) => Promise<void>;

interface Waiting {
  job: IngestJob;
  resolve: () => void;
}

/**
 * In-process work queue for ingestion jobs.
 *
 * At most `concurrency` jobs run at once. A job submitted for a record that
 * is already queued or running is not added twice; the caller gets the
 * existing job's completion instead.
 */
export class MediaQueue {
  private readonly waiting: Waiting[] = [];
  private readonly byRecord = new Map<string, Promise<void>>();
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;

  constructor(
    private readonly handler: JobHandler,
    private readonly concurrency: number = 1
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Queue concurrency must be a positive integer, got ${concurrency}.`);
    }
  }

  /** Resolves once the job has run. Never rejects. */
  submit(job: IngestJob): Promise<void> {
    const existing = this.byRecord.get(job.recordId);
    if (existing) return existing;

    const done = new Promise<void>((resolve) => {
      this.waiting.push({ job, resolve });
    });
    this.byRecord.set(job.recordId, done);
    this.pump();
    return done;
  }

  /** Jobs waiting to start */
  get size(): number {
    return this.waiting.length;
  }

  /** Jobs currently running */
  get running(): number {
    return this.active;
  }

  has(recordId: string): boolean {
    return this.byRecord.has(recordId);
  }

  /** Resolves when nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && this.waiting.length === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const next = this.waiting.shift();
      if (!next) break;
      this.active++;
      void this.execute(next);
    }

    if (this.isIdle()) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }

  private async execute(entry: Waiting): Promise<void> {
    try {
      await this.handler(entry.job);
    } catch (err) {
      console.error(`[queue] Job for ${entry.job.recordId} failed: ${errorMessage(err)}`);
    } finally {
      this.active--;
      this.byRecord.delete(entry.job.recordId);
      entry.resolve();
      this.pump();
    }
  }
}
