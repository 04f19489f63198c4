import { Injectable } from '@nestjs/common';
import { DispatchEngineService } from '../dispatch-engine.service';
import type { NotificationJobData } from '../../domain/notification-job.entity';
import { StoreUnavailableError } from '../../../../shared/domain/errors';

export type RetryNotificationResult =
  | { success: true; job: NotificationJobData }
  | { success: false; error: RetryNotificationError };

export type RetryNotificationError =
  | { code: 'NOT_FOUND'; message: string }
  | { code: 'NOT_RETRYABLE'; message: string }
  | { code: 'ALREADY_DELIVERED'; message: string; jobId: string }
  | { code: 'IN_FLIGHT'; message: string; jobId: string }
  | { code: 'CONFLICT'; message: string }
  | { code: 'STORE_UNAVAILABLE'; message: string };

/**
 * RetryNotification Use Case
 *
 * Operator-triggered second chance for a FAILED job. Refused while another
 * job owns the same notification.
 */
@Injectable()
export class RetryNotificationUseCase {
  constructor(private readonly engine: DispatchEngineService) {}

  async execute(jobId: string): Promise<RetryNotificationResult> {
    try {
      const outcome = await this.engine.retry(jobId);

      switch (outcome.kind) {
        case 'REQUEUED':
          return { success: true, job: outcome.job.toData() };

        case 'NOT_FOUND':
          return this.fail({
            code: 'NOT_FOUND',
            message: `Notification with id ${jobId} not found`,
          });

        case 'NOT_RETRYABLE':
          return this.fail({ code: 'NOT_RETRYABLE', message: outcome.reason });

        case 'DUPLICATE':
          return outcome.disposition === 'ALREADY_DELIVERED'
            ? this.fail({
                code: 'ALREADY_DELIVERED',
                message: `Notification ${outcome.jobId} already delivered this message`,
                jobId: outcome.jobId,
              })
            : this.fail({
                code: 'IN_FLIGHT',
                message: `Notification ${outcome.jobId} is already sending this message`,
                jobId: outcome.jobId,
              });

        case 'CHANGED':
          return this.fail({
            code: 'CONFLICT',
            message: `Notification ${jobId} changed while being retried, try again`,
          });
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        return this.fail({ code: 'STORE_UNAVAILABLE', message: error.message });
      }
      throw error;
    }
  }

  private fail(error: RetryNotificationError): RetryNotificationResult {
    return { success: false, error };
  }
}
