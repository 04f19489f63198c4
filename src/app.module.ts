import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import { NotificationModule } from './modules/notification/notification.module';
import { ConsumerModule } from './modules/consumer/consumer.module';
import { HealthModule } from './modules/health/health.module';
import { DatabaseModule } from './shared/infrastructure/database/database.module';
import { SettingsModule } from './shared/config/settings.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(),
    SettingsModule,
    DatabaseModule,
    NotificationModule,
    ConsumerModule,
    HealthModule,
  ],
})
export class AppModule {}
