import { Module } from '@nestjs/common';
import { NotificationController } from './infrastructure/notification.controller';
import { DispatchEngineService } from './application/dispatch-engine.service';
import { JobQueue } from './application/job-queue';
import { RetryScheduler } from './application/retry.scheduler';
import { TemplateModule } from '../template/template.module';
import { ChannelModule } from '../channel/channel.module';

// Use Cases
import {
  GetNotificationStatsUseCase,
  GetNotificationUseCase,
  ListNotificationsUseCase,
  RetryNotificationUseCase,
  SendNotificationUseCase,
} from './application/use-cases';

// Repositories
import { NOTIFICATION_JOB_REPOSITORY } from './domain/notification-job.repository';
import { IDEMPOTENCY_REPOSITORY } from './domain/idempotency.repository';
import { DrizzleNotificationJobRepository } from './infrastructure/drizzle-notification-job.repository';
import { DrizzleIdempotencyRepository } from './infrastructure/drizzle-idempotency.repository';

// Clock
import { CLOCK } from '../../shared/domain/clock.port';
import { SystemClock } from '../../shared/infrastructure/system-clock';

@Module({
  imports: [TemplateModule, ChannelModule],
  controllers: [NotificationController],
  providers: [
    DispatchEngineService,
    JobQueue,
    RetryScheduler,

    // Clock (infrastructure adapter)
    {
      provide: CLOCK,
      useClass: SystemClock,
    },

    // Repositories (infrastructure adapters)
    {
      provide: NOTIFICATION_JOB_REPOSITORY,
      useClass: DrizzleNotificationJobRepository,
    },
    {
      provide: IDEMPOTENCY_REPOSITORY,
      useClass: DrizzleIdempotencyRepository,
    },

    // Use Cases
    SendNotificationUseCase,
    GetNotificationUseCase,
    ListNotificationsUseCase,
    GetNotificationStatsUseCase,
    RetryNotificationUseCase,
  ],
  exports: [DispatchEngineService, NOTIFICATION_JOB_REPOSITORY],
})
export class NotificationModule {}
