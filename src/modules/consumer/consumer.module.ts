import { Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventConsumerService } from './application/event-consumer.service';
import { BROKER_CONNECTION } from './domain/broker-connection.port';
import type { BrokerConnection } from './domain/broker-connection.port';
import { AmqpBrokerConnection } from './infrastructure/amqp-broker.connection';
import { NotificationModule } from '../notification/notification.module';
import { loadBrokerSettings } from '../../shared/config/broker.settings';

@Module({
  imports: [NotificationModule],
  providers: [
    {
      provide: BROKER_CONNECTION,
      inject: [ConfigService],
      useFactory: async (
        configService: ConfigService,
      ): Promise<BrokerConnection> => {
        const broker = new AmqpBrokerConnection(
          loadBrokerSettings(configService),
        );
        await broker.connect();
        return broker;
      },
    },
    EventConsumerService,
  ],
  exports: [BROKER_CONNECTION],
})
export class ConsumerModule implements OnApplicationShutdown {
  constructor(
    @Inject(BROKER_CONNECTION) private readonly broker: BrokerConnection,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    await this.broker.close();
  }
}
