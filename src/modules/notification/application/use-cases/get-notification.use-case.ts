import { Inject, Injectable } from '@nestjs/common';
import { NOTIFICATION_JOB_REPOSITORY } from '../../domain/notification-job.repository';
import type { NotificationJobRepository } from '../../domain/notification-job.repository';
import type {
  DeliveryAttempt,
  NotificationJobData,
} from '../../domain/notification-job.entity';
import { StoreUnavailableError } from '../../../../shared/domain/errors';

export type GetNotificationResult =
  | { success: true; job: NotificationJobData; attempts: DeliveryAttempt[] }
  | { success: false; error: GetNotificationError };

export type GetNotificationError =
  | { code: 'NOT_FOUND'; message: string }
  | { code: 'STORE_UNAVAILABLE'; message: string };

@Injectable()
export class GetNotificationUseCase {
  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
  ) {}

  async execute(jobId: string): Promise<GetNotificationResult> {
    try {
      const job = await this.jobs.findById(jobId);
      if (!job) {
        return {
          success: false,
          error: {
            code: 'NOT_FOUND',
            message: `Notification with id ${jobId} not found`,
          },
        };
      }

      const attempts = await this.jobs.findAttempts(jobId);
      return { success: true, job: job.toData(), attempts };
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
