import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { BROKER_CONNECTION } from '../domain/broker-connection.port';
import type {
  BrokerConnection,
  BrokerMessage,
  DeliveryDecision,
} from '../domain/broker-connection.port';
import { DispatchEngineService } from '../../notification/application/dispatch-engine.service';
import { InboundEventDto } from '../../notification/application/dto/inbound-event.dto';
import { NOTIFICATION_JOB_REPOSITORY } from '../../notification/domain/notification-job.repository';
import type { NotificationJobRepository } from '../../notification/domain/notification-job.repository';
import { describeValidationErrors } from '../../../shared/validation/validation.pipe';
import {
  InvalidEventError,
  StoreUnavailableError,
  UnknownEventTypeError,
} from '../../../shared/domain/errors';

export const STORE_PING_INTERVAL_MS = 5000;

/**
 * Inbound Event Consumer
 *
 * A message is acknowledged only once its jobs are persisted. Malformed
 * and unknown events are rejected for good; anything else is requeued.
 * While the store is unreachable consumption is paused and the store is
 * pinged until it answers again.
 */
@Injectable()
export class EventConsumerService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(EventConsumerService.name);
  private paused = false;
  private shuttingDown = false;
  private resumeTimer: NodeJS.Timeout | null = null;

  constructor(
    @Inject(BROKER_CONNECTION)
    private readonly broker: BrokerConnection,
    private readonly engine: DispatchEngineService,
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.startConsuming();
  }

  async onModuleDestroy(): Promise<void> {
    this.shuttingDown = true;
    this.clearResume();
    await this.broker.stopConsuming();
    await this.broker.waitForInFlight();
    this.logger.log('Event consumer stopped');
  }

  isPaused(): boolean {
    return this.paused;
  }

  async handleMessage(message: BrokerMessage): Promise<DeliveryDecision> {
    let body: unknown;
    try {
      body = JSON.parse(message.content.toString('utf8'));
    } catch (error) {
      this.logger.error(
        `Rejecting message on ${message.routingKey}: invalid JSON (${error instanceof Error ? error.message : error})`,
      );
      return 'REJECT';
    }

    const dto = plainToInstance(InboundEventDto, body);
    const errors = validateSync(dto, { whitelist: true });
    if (errors.length > 0) {
      this.logger.warn(
        `Rejecting message on ${message.routingKey}: ${describeValidationErrors(errors).join('; ')}`,
      );
      return 'REJECT';
    }

    const eventId = dto.event_id ?? message.messageId;
    if (!eventId) {
      this.logger.warn(
        `Rejecting ${dto.event_type} message: no event_id and no message id`,
      );
      return 'REJECT';
    }

    try {
      const results = await this.engine.submitEvent({
        eventId,
        eventType: dto.event_type,
        payload: dto.payload ?? dto.data ?? {},
        occurredAt: dto.occurred_at ? new Date(dto.occurred_at) : null,
        locale: dto.locale,
      });
      this.logger.log(
        `Received ${dto.event_type} event ${eventId}: ${results.map((r) => `${r.jobId} ${r.disposition}`).join(', ') || 'no recipients'}`,
      );
      return 'ACK';
    } catch (error) {
      return this.decideOnError(eventId, error);
    }
  }

  /**
   * Ping the store and resume consumption when it answers.
   * @returns true when consumption was resumed
   */
  async tryResume(): Promise<boolean> {
    this.clearResume();
    if (!this.paused || this.shuttingDown) {
      return false;
    }

    try {
      await this.jobs.ping();
    } catch (error) {
      this.logger.warn(
        `Store still unavailable (${error instanceof Error ? error.message : error}), consumption stays paused`,
      );
      this.scheduleResume();
      return false;
    }

    try {
      await this.startConsuming();
    } catch (error) {
      this.logger.error(
        `Could not restart the consumer: ${error instanceof Error ? error.message : error}`,
      );
      this.scheduleResume();
      return false;
    }

    this.paused = false;
    this.logger.log('Store reachable again, consumption resumed');
    return true;
  }

  private async startConsuming(): Promise<void> {
    await this.broker.consume((message) => this.handleMessage(message));
  }

  private async decideOnError(
    eventId: string,
    error: unknown,
  ): Promise<DeliveryDecision> {
    if (
      error instanceof InvalidEventError ||
      error instanceof UnknownEventTypeError
    ) {
      this.logger.warn(`Rejecting event ${eventId}: ${error.message}`);
      return 'REJECT';
    }

    if (error instanceof StoreUnavailableError) {
      this.logger.error(`Requeueing event ${eventId}: ${error.message}`);
      await this.pause();
      return 'REQUEUE';
    }

    this.logger.error(
      `Requeueing event ${eventId} after unexpected error: ${error instanceof Error ? error.message : error}`,
    );
    return 'REQUEUE';
  }

  private async pause(): Promise<void> {
    if (this.paused || this.shuttingDown) {
      return;
    }

    this.paused = true;
    this.logger.warn('Pausing consumption until the store is reachable');
    try {
      await this.broker.stopConsuming();
    } catch (error) {
      this.logger.error(
        `Could not cancel the consumer: ${error instanceof Error ? error.message : error}`,
      );
    }
    this.scheduleResume();
  }

  private scheduleResume(): void {
    if (this.shuttingDown) {
      return;
    }

    this.clearResume();
    this.resumeTimer = setTimeout(() => {
      this.tryResume().catch((error: unknown) =>
        this.logger.error(
          `Resuming consumption failed: ${error instanceof Error ? error.message : error}`,
        ),
      );
    }, STORE_PING_INTERVAL_MS);
  }

  private clearResume(): void {
    if (this.resumeTimer) {
      clearTimeout(this.resumeTimer);
      this.resumeTimer = null;
    }
  }
}
