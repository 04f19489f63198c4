import { Inject, Injectable } from '@nestjs/common';
import { NOTIFICATION_JOB_REPOSITORY } from '../../domain/notification-job.repository';
import type {
  JobCounts,
  NotificationJobRepository,
} from '../../domain/notification-job.repository';
import { JobQueue } from '../job-queue';
import type { JobQueueStats } from '../job-queue';
import { StoreUnavailableError } from '../../../../shared/domain/errors';

export type GetNotificationStatsResult =
  | { success: true; counts: JobCounts; queue: JobQueueStats }
  | { success: false; error: GetNotificationStatsError };

export type GetNotificationStatsError = {
  code: 'STORE_UNAVAILABLE';
  message: string;
};

/**
 * Stored job totals plus this instance's work queue.
 */
@Injectable()
export class GetNotificationStatsUseCase {
  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    private readonly queue: JobQueue,
  ) {}

  async execute(): Promise<GetNotificationStatsResult> {
    try {
      const counts = await this.jobs.countByDimension();
      return { success: true, counts, queue: this.queue.stats() };
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        return {
          success: false,
          error: { code: 'STORE_UNAVAILABLE', message: error.message },
        };
      }
      throw error;
    }
  }
}
