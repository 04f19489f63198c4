import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { DispatchEngineService } from './dispatch-engine.service';
import { NOTIFICATION_JOB_REPOSITORY } from '../domain/notification-job.repository';
import type { NotificationJobRepository } from '../domain/notification-job.repository';
import { IDEMPOTENCY_REPOSITORY } from '../domain/idempotency.repository';
import type { IdempotencyRepository } from '../domain/idempotency.repository';
import { CLOCK, addMilliseconds } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import { DISPATCH_SETTINGS } from '../../../shared/config/dispatch.settings';
import type { DispatchSettings } from '../../../shared/config/dispatch.settings';

/**
 * Metrics emitted by the scheduler jobs, logged as structured objects.
 */
export interface RetryScanMetrics {
  job: 'retry_scan';
  dueCount: number;
  stalledCount: number;
  enqueuedCount: number;
  durationMs: number;
}

export interface PurgeMetrics {
  job: 'purge_idempotency';
  removedCount: number;
  durationMs: number;
}

/**
 * Feeds the job queue from the store: jobs whose backoff has expired, and
 * jobs abandoned mid-flight by a worker that died.
 */
@Injectable()
export class RetryScheduler implements OnModuleDestroy {
  private readonly logger = new Logger(RetryScheduler.name);
  private isScanning = false;
  private isShuttingDown = false;

  constructor(
    private readonly engine: DispatchEngineService,
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    @Inject(IDEMPOTENCY_REPOSITORY)
    private readonly idempotency: IdempotencyRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(DISPATCH_SETTINGS)
    private readonly settings: DispatchSettings,
  ) {}

  onModuleDestroy() {
    this.isShuttingDown = true;
  }

  @Cron(CronExpression.EVERY_5_SECONDS)
  async scanRetries(): Promise<RetryScanMetrics | null> {
    if (this.isScanning || this.isShuttingDown) {
      return null;
    }

    this.isScanning = true;
    const startTime = Date.now();

    try {
      const now = this.clock.now();
      const limit = this.settings.retryBatchSize;
      let enqueuedCount = 0;

      const due = await this.jobs.findDueForRetry(now, limit);
      for (const job of due) {
        if (this.engine.enqueue(job.id)) enqueuedCount++;
      }

      const stalled = await this.jobs.findStalled(
        addMilliseconds(now, -this.settings.staleAfterMs),
        limit,
      );
      for (const job of stalled) {
        // SENDING: unknown whether the provider saw it, so go through retry
        if (job.state === 'SENDING') {
          job.releaseStalled(now);
          const saved = await this.jobs.update(job);
          if (!saved) continue;
        }
        if (this.engine.enqueue(job.id)) enqueuedCount++;
      }

      const metrics: RetryScanMetrics = {
        job: 'retry_scan',
        dueCount: due.length,
        stalledCount: stalled.length,
        enqueuedCount,
        durationMs: Date.now() - startTime,
      };

      if (stalled.length > 0) {
        this.logger.warn({
          message: `Recovered ${stalled.length} stalled jobs`,
          ...metrics,
        });
      } else if (enqueuedCount > 0) {
        this.logger.log({ message: 'Retry scan complete', ...metrics });
      }

      return metrics;
    } catch (error) {
      this.logger.error(
        `Retry scan failed: ${error instanceof Error ? error.message : error}`,
      );
      return null;
    } finally {
      this.isScanning = false;
    }
  }

  @Cron(CronExpression.EVERY_HOUR)
  async purgeExpiredRecords(): Promise<PurgeMetrics | null> {
    if (this.isShuttingDown) {
      return null;
    }

    const startTime = Date.now();
    try {
      const removedCount = await this.idempotency.purgeExpired(
        this.clock.now(),
      );
      const metrics: PurgeMetrics = {
        job: 'purge_idempotency',
        removedCount,
        durationMs: Date.now() - startTime,
      };
      this.logger.log({
        message: `Purged ${removedCount} expired idempotency records`,
        ...metrics,
      });
      return metrics;
    } catch (error) {
      this.logger.error(
        `Idempotency purge failed: ${error instanceof Error ? error.message : error}`,
      );
      return null;
    }
  }
}
