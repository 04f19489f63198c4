import { Inject, Injectable } from '@nestjs/common';
import { NOTIFICATION_JOB_REPOSITORY } from '../../domain/notification-job.repository';
import type { NotificationJobRepository } from '../../domain/notification-job.repository';
import type {
  NotificationJobData,
  NotificationJobState,
} from '../../domain/notification-job.entity';
import { NOTIFICATION_CATALOG } from '../../../template/domain/notification-catalog';
import type { NotificationCatalog } from '../../../template/domain/notification-catalog';
import type { Channel } from '../../../../shared/ports/channel-provider.port';
import { StoreUnavailableError } from '../../../../shared/domain/errors';

export interface ListNotificationsInput {
  channel?: Channel;
  eventType?: string;
  state?: NotificationJobState;
  orderId?: string;
  /** 1-based */
  page: number;
  pageSize: number;
}

export type ListNotificationsResult =
  | {
      success: true;
      items: NotificationJobData[];
      total: number;
      page: number;
      pageSize: number;
    }
  | { success: false; error: ListNotificationsError };

export type ListNotificationsError = {
  code: 'STORE_UNAVAILABLE';
  message: string;
};

/**
 * Filtered, paginated job listing, newest first. An aliased event type
 * filters on its canonical name, the one jobs are stored under.
 */
@Injectable()
export class ListNotificationsUseCase {
  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    @Inject(NOTIFICATION_CATALOG)
    private readonly catalog: NotificationCatalog,
  ) {}

  async execute(input: ListNotificationsInput): Promise<ListNotificationsResult> {
    try {
      const { items, total } = await this.jobs.findMany(
        {
          channel: input.channel,
          eventType:
            input.eventType === undefined
              ? undefined
              : this.catalog.canonicalName(input.eventType),
          state: input.state,
          orderId: input.orderId,
        },
        input.pageSize,
        (input.page - 1) * input.pageSize,
      );

      return {
        success: true,
        items: items.map((job) => job.toData()),
        total,
        page: input.page,
        pageSize: input.pageSize,
      };
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
