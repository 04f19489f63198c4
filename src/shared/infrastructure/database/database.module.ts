import {
  Module,
  Global,
  Inject,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  createDrizzleClient,
  createPostgresClient,
} from './drizzle.client';
import type { PostgresClient } from './drizzle.client';

export const DRIZZLE = Symbol('DRIZZLE');
export const POSTGRES_CLIENT = Symbol('POSTGRES_CLIENT');

export type { DrizzleClient, PostgresClient } from './drizzle.client';

/**
 * Owns the process-wide connection pool.
 * Created once at startup, released after every other module has shut down.
 */
@Global()
@Module({
  providers: [
    {
      provide: POSTGRES_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const connectionString =
          configService.getOrThrow<string>('DATABASE_URL');
        return createPostgresClient(connectionString);
      },
    },
    {
      provide: DRIZZLE,
      inject: [POSTGRES_CLIENT],
      useFactory: (client: PostgresClient) => createDrizzleClient(client),
    },
  ],
  exports: [DRIZZLE],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(POSTGRES_CLIENT) private readonly client: PostgresClient) {}

  async onApplicationShutdown(): Promise<void> {
    await this.client.end({ timeout: 5 });
    this.logger.log('Database connection pool closed');
  }
}
