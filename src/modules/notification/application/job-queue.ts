import { Injectable, Logger } from '@nestjs/common';

export type JobHandler = (jobId: string) => Promise<void>;

export interface JobQueueStats {
  queued: number;
  running: number;
  concurrency: number;
}

/**
 * In-process work queue feeding a fixed pool of workers.
 *
 * A job id is held at most once, whether waiting or running, so the
 * retry scanner and the consumer can both enqueue without double work.
 * The queue only carries ids; the store stays the source of truth.
 */
@Injectable()
export class JobQueue {
  private readonly logger = new Logger(JobQueue.name);
  private readonly pending: string[] = [];
  private readonly held = new Set<string>();
  private handler: JobHandler | null = null;
  private concurrency = 1;
  private running = 0;
  private accepting = false;
  private idleWaiters: Array<() => void> = [];

  start(handler: JobHandler, concurrency: number): void {
    this.handler = handler;
    this.concurrency = Math.max(1, concurrency);
    this.accepting = true;
    this.logger.log(`Job queue started with ${this.concurrency} workers`);
    this.pump();
  }

  /**
   * @returns false when the id is already held or the queue is stopped
   */
  enqueue(jobId: string): boolean {
    if (!this.accepting || this.held.has(jobId)) {
      return false;
    }

    this.held.add(jobId);
    this.pending.push(jobId);
    this.pump();
    return true;
  }

  /**
   * Stop accepting work and resolve once every running job has finished.
   * Jobs still waiting are dropped; the retry scanner picks them up again
   * from the store after restart.
   */
  async drain(): Promise<void> {
    this.accepting = false;

    const dropped = this.pending.splice(0);
    for (const jobId of dropped) {
      this.held.delete(jobId);
    }
    if (dropped.length > 0) {
      this.logger.warn(`Dropped ${dropped.length} queued jobs on shutdown`);
    }

    await this.onIdle();
  }

  onIdle(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  stats(): JobQueueStats {
    return {
      queued: this.pending.length,
      running: this.running,
      concurrency: this.concurrency,
    };
  }

  private pump(): void {
    const handler = this.handler;
    if (!handler) {
      return;
    }

    while (this.running < this.concurrency && this.pending.length > 0) {
      const jobId = this.pending.shift();
      if (jobId === undefined) {
        break;
      }

      this.running++;
      void this.run(handler, jobId);
    }

    if (this.running === 0 && this.pending.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async run(handler: JobHandler, jobId: string): Promise<void> {
    try {
      await handler(jobId);
    } catch (error) {
      this.logger.error(
        `Job ${jobId} failed in worker: ${error instanceof Error ? error.message : error}`,
      );
    } finally {
      this.running--;
      this.held.delete(jobId);
      this.pump();
    }
  }
}
