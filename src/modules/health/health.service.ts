import { Inject, Injectable } from '@nestjs/common';
import { DispatchEngineService } from '../notification/application/dispatch-engine.service';
import { NOTIFICATION_JOB_REPOSITORY } from '../notification/domain/notification-job.repository';
import type { NotificationJobRepository } from '../notification/domain/notification-job.repository';
import { BROKER_CONNECTION } from '../consumer/domain/broker-connection.port';
import type { BrokerConnection } from '../consumer/domain/broker-connection.port';

export interface HealthReport {
  status: 'ok' | 'error';
  engine: 'running' | 'stopped';
  queue: 'connected' | 'disconnected';
  database: 'connected' | 'disconnected';
  timestamp: string;
  error?: string;
}

@Injectable()
export class HealthService {
  constructor(
    private readonly engine: DispatchEngineService,
    @Inject(BROKER_CONNECTION) private readonly broker: BrokerConnection,
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
  ) {}

  async check(): Promise<HealthReport> {
    let databaseError: string | undefined;
    try {
      await this.jobs.ping();
    } catch (error) {
      databaseError = error instanceof Error ? error.message : 'Unknown error';
    }

    const engine = this.engine.isRunning() ? 'running' : 'stopped';
    const queue = this.broker.isConnected() ? 'connected' : 'disconnected';
    const database = databaseError === undefined ? 'connected' : 'disconnected';
    const healthy =
      engine === 'running' && queue === 'connected' && database === 'connected';

    return {
      status: healthy ? 'ok' : 'error',
      engine,
      queue,
      database,
      timestamp: new Date().toISOString(),
      ...(databaseError !== undefined && { error: databaseError }),
    };
  }
}
