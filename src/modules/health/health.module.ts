import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { NotificationModule } from '../notification/notification.module';
import { ConsumerModule } from '../consumer/consumer.module';

@Module({
  imports: [NotificationModule, ConsumerModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
