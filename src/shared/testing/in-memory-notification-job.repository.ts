import { emptyJobCounts } from '../../modules/notification/domain/notification-job.repository';
import type {
  JobCounts,
  JobPage,
  NotificationJobFilter,
  NotificationJobRepository,
} from '../../modules/notification/domain/notification-job.repository';
import {
  NotificationJobEntity,
  TERMINAL_STATES,
} from '../../modules/notification/domain/notification-job.entity';
import type {
  DeliveryAttempt,
  NotificationJobData,
} from '../../modules/notification/domain/notification-job.entity';
import { StoreUnavailableError } from '../domain/errors';

/**
 * Process-local stand-in for the Drizzle job repository.
 * Same compare-and-set contract; `available = false` simulates an outage.
 */
export class InMemoryNotificationJobRepository
  implements NotificationJobRepository
{
  available = true;
  private readonly rows = new Map<string, NotificationJobData>();
  private readonly attempts: DeliveryAttempt[] = [];

  async create(job: NotificationJobEntity): Promise<NotificationJobEntity> {
    this.ensureAvailable('jobs.create');
    if (this.rows.has(job.id)) {
      throw new Error(`duplicate job id ${job.id}`);
    }
    this.rows.set(job.id, job.toData());
    return NotificationJobEntity.fromData(job.toData());
  }

  async findById(id: string): Promise<NotificationJobEntity | null> {
    this.ensureAvailable('jobs.findById');
    const row = this.rows.get(id);
    return row ? NotificationJobEntity.fromData({ ...row }) : null;
  }

  async update(job: NotificationJobEntity): Promise<NotificationJobEntity | null> {
    this.ensureAvailable('jobs.update');
    return this.write(job);
  }

  async recordAttempt(
    job: NotificationJobEntity,
    attempt: DeliveryAttempt,
  ): Promise<NotificationJobEntity | null> {
    this.ensureAvailable('jobs.recordAttempt');
    const saved = this.write(job);
    if (saved) {
      this.attempts.push({ ...attempt });
    }
    return saved;
  }

  async findAttempts(jobId: string): Promise<DeliveryAttempt[]> {
    this.ensureAvailable('jobs.findAttempts');
    return this.attempts
      .filter((attempt) => attempt.jobId === jobId)
      .sort((a, b) => a.attemptNo - b.attemptNo);
  }

  async findDueForRetry(
    now: Date,
    limit: number,
  ): Promise<NotificationJobEntity[]> {
    this.ensureAvailable('jobs.findDueForRetry');
    return [...this.rows.values()]
      .filter(
        (row) =>
          row.state === 'RETRYING' &&
          row.nextRetryAt !== null &&
          row.nextRetryAt.getTime() <= now.getTime(),
      )
      .slice(0, limit)
      .map((row) => NotificationJobEntity.fromData({ ...row }));
  }

  async findStalled(
    before: Date,
    limit: number,
  ): Promise<NotificationJobEntity[]> {
    this.ensureAvailable('jobs.findStalled');
    return [...this.rows.values()]
      .filter(
        (row) =>
          !TERMINAL_STATES.includes(row.state) &&
          row.state !== 'RETRYING' &&
          row.updatedAt.getTime() <= before.getTime(),
      )
      .slice(0, limit)
      .map((row) => NotificationJobEntity.fromData({ ...row }));
  }

  async findMany(
    filter: NotificationJobFilter,
    limit: number,
    offset: number,
  ): Promise<JobPage> {
    this.ensureAvailable('jobs.findMany');
    const matching = [...this.rows.values()]
      .filter(
        (row) =>
          (filter.channel === undefined || row.channel === filter.channel) &&
          (filter.eventType === undefined ||
            row.eventType === filter.eventType) &&
          (filter.state === undefined || row.state === filter.state) &&
          (filter.orderId === undefined ||
            row.payload.order_id === filter.orderId),
      )
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          b.id.localeCompare(a.id),
      );

    return {
      items: matching
        .slice(offset, offset + limit)
        .map((row) => NotificationJobEntity.fromData({ ...row })),
      total: matching.length,
    };
  }

  async countByDimension(): Promise<JobCounts> {
    this.ensureAvailable('jobs.countByDimension');
    const counts = emptyJobCounts();
    for (const row of this.rows.values()) {
      counts.total += 1;
      counts.byState[row.state] += 1;
      counts.byChannel[row.channel] += 1;
      counts.byEventType[row.eventType] =
        (counts.byEventType[row.eventType] ?? 0) + 1;
    }
    return counts;
  }

  async ping(): Promise<void> {
    this.ensureAvailable('ping');
  }

  // ============ TEST HELPERS ============

  all(): NotificationJobData[] {
    return [...this.rows.values()];
  }

  private write(job: NotificationJobEntity): NotificationJobEntity | null {
    const stored = this.rows.get(job.id);
    if (!stored || stored.version !== job.version) {
      return null;
    }

    const next = { ...job.toData(), version: stored.version + 1 };
    this.rows.set(job.id, next);
    return NotificationJobEntity.fromData({ ...next });
  }

  private ensureAvailable(operation: string): void {
    if (!this.available) {
      throw new StoreUnavailableError(
        operation,
        new Error('connect ECONNREFUSED 127.0.0.1:5432'),
      );
    }
  }
}
