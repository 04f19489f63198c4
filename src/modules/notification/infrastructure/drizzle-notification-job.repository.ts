import { Injectable, Inject } from '@nestjs/common';
import { and, asc, count, desc, eq, inArray, lte, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { emptyJobCounts } from '../domain/notification-job.repository';
import type {
  JobCounts,
  JobPage,
  NotificationJobFilter,
  NotificationJobRepository,
} from '../domain/notification-job.repository';
import { NotificationJobEntity } from '../domain/notification-job.entity';
import type {
  DeliveryAttempt,
  NotificationJobData,
} from '../domain/notification-job.entity';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import {
  deliveryAttempts,
  notificationJobs,
} from '../../../shared/infrastructure/database/schema';
import type {
  DeliveryAttemptRow,
  NotificationJobRow,
} from '../../../shared/infrastructure/database/schema';
import { withStore } from '../../../shared/infrastructure/database/store-errors';

@Injectable()
export class DrizzleNotificationJobRepository
  implements NotificationJobRepository
{
  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async create(job: NotificationJobEntity): Promise<NotificationJobEntity> {
    return withStore('jobs.create', async () => {
      const [row] = await this.db
        .insert(notificationJobs)
        .values(job.toData())
        .returning();

      return this.toEntity(row);
    });
  }

  async findById(id: string): Promise<NotificationJobEntity | null> {
    return withStore('jobs.findById', async () => {
      const [row] = await this.db
        .select()
        .from(notificationJobs)
        .where(eq(notificationJobs.id, id))
        .limit(1);

      return row ? this.toEntity(row) : null;
    });
  }

  /**
   * UPDATE ... WHERE id = ? AND version = ?; zero rows means someone else
   * moved the job first.
   */
  async update(
    job: NotificationJobEntity,
  ): Promise<NotificationJobEntity | null> {
    return withStore('jobs.update', async () => {
      const data = job.toData();
      const [row] = await this.db
        .update(notificationJobs)
        .set(this.mutableColumns(data))
        .where(
          and(
            eq(notificationJobs.id, data.id),
            eq(notificationJobs.version, data.version),
          ),
        )
        .returning();

      return row ? this.toEntity(row) : null;
    });
  }

  async recordAttempt(
    job: NotificationJobEntity,
    attempt: DeliveryAttempt,
  ): Promise<NotificationJobEntity | null> {
    return withStore('jobs.recordAttempt', () =>
      this.db.transaction(async (tx) => {
        const data = job.toData();
        const [row] = await tx
          .update(notificationJobs)
          .set(this.mutableColumns(data))
          .where(
            and(
              eq(notificationJobs.id, data.id),
              eq(notificationJobs.version, data.version),
            ),
          )
          .returning();

        if (!row) {
          return null;
        }

        await tx.insert(deliveryAttempts).values({
          jobId: attempt.jobId,
          attemptNo: attempt.attemptNo,
          providerResponseCode: attempt.providerResponseCode,
          succeeded: attempt.succeeded,
          errorKind: attempt.errorKind,
          errorMessage: attempt.errorMessage,
          attemptedAt: attempt.attemptedAt,
        });

        return this.toEntity(row);
      }),
    );
  }

  async findAttempts(jobId: string): Promise<DeliveryAttempt[]> {
    return withStore('jobs.findAttempts', async () => {
      const rows = await this.db
        .select()
        .from(deliveryAttempts)
        .where(eq(deliveryAttempts.jobId, jobId))
        .orderBy(asc(deliveryAttempts.attemptNo));

      return rows.map((row) => this.toAttempt(row));
    });
  }

  async findDueForRetry(
    now: Date,
    limit: number,
  ): Promise<NotificationJobEntity[]> {
    return withStore('jobs.findDueForRetry', async () => {
      const rows = await this.db
        .select()
        .from(notificationJobs)
        .where(
          and(
            eq(notificationJobs.state, 'RETRYING'),
            lte(notificationJobs.nextRetryAt, now),
          ),
        )
        .orderBy(asc(notificationJobs.nextRetryAt))
        .limit(limit);

      return rows.map((row) => this.toEntity(row));
    });
  }

  async findStalled(
    before: Date,
    limit: number,
  ): Promise<NotificationJobEntity[]> {
    return withStore('jobs.findStalled', async () => {
      const rows = await this.db
        .select()
        .from(notificationJobs)
        .where(
          and(
            inArray(notificationJobs.state, ['PENDING', 'RENDERING', 'SENDING']),
            lte(notificationJobs.updatedAt, before),
          ),
        )
        .orderBy(asc(notificationJobs.updatedAt))
        .limit(limit);

      return rows.map((row) => this.toEntity(row));
    });
  }

  async findMany(
    filter: NotificationJobFilter,
    limit: number,
    offset: number,
  ): Promise<JobPage> {
    return withStore('jobs.findMany', async () => {
      const where = this.filterCondition(filter);

      const rows = await this.db
        .select()
        .from(notificationJobs)
        .where(where)
        .orderBy(desc(notificationJobs.createdAt), desc(notificationJobs.id))
        .limit(limit)
        .offset(offset);

      const [counted] = await this.db
        .select({ total: count() })
        .from(notificationJobs)
        .where(where);

      return {
        items: rows.map((row) => this.toEntity(row)),
        total: counted?.total ?? 0,
      };
    });
  }

  async countByDimension(): Promise<JobCounts> {
    return withStore('jobs.countByDimension', async () => {
      const counts = emptyJobCounts();

      const byState = await this.db
        .select({
          state: notificationJobs.state,
          count: sql<number>`count(*)::int`,
        })
        .from(notificationJobs)
        .groupBy(notificationJobs.state);

      const byChannel = await this.db
        .select({
          channel: notificationJobs.channel,
          count: sql<number>`count(*)::int`,
        })
        .from(notificationJobs)
        .groupBy(notificationJobs.channel);

      const byEventType = await this.db
        .select({
          eventType: notificationJobs.eventType,
          count: sql<number>`count(*)::int`,
        })
        .from(notificationJobs)
        .groupBy(notificationJobs.eventType);

      for (const row of byState) {
        counts.byState[row.state] = row.count;
        counts.total += row.count;
      }
      for (const row of byChannel) {
        counts.byChannel[row.channel] = row.count;
      }
      for (const row of byEventType) {
        counts.byEventType[row.eventType] = row.count;
      }

      return counts;
    });
  }

  async ping(): Promise<void> {
    await withStore('ping', async () => {
      await this.db.execute(sql`SELECT 1`);
    });
  }

  // ============ MAPPING ============

  private filterCondition(filter: NotificationJobFilter): SQL | undefined {
    const conditions: SQL[] = [];

    if (filter.channel !== undefined) {
      conditions.push(eq(notificationJobs.channel, filter.channel));
    }
    if (filter.eventType !== undefined) {
      conditions.push(eq(notificationJobs.eventType, filter.eventType));
    }
    if (filter.state !== undefined) {
      conditions.push(eq(notificationJobs.state, filter.state));
    }
    if (filter.orderId !== undefined) {
      conditions.push(
        sql`${notificationJobs.payload} ->> 'order_id' = ${filter.orderId}`,
      );
    }

    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  private mutableColumns(data: NotificationJobData) {
    return {
      templateId: data.templateId,
      renderedSubject: data.renderedSubject,
      renderedBody: data.renderedBody,
      state: data.state,
      attemptCount: data.attemptCount,
      maxAttempts: data.maxAttempts,
      lastErrorKind: data.lastErrorKind,
      lastError: data.lastError,
      version: data.version + 1,
      updatedAt: data.updatedAt,
      lastAttemptAt: data.lastAttemptAt,
      nextRetryAt: data.nextRetryAt,
      deliveredAt: data.deliveredAt,
      failedAt: data.failedAt,
    };
  }

  private toEntity(row: NotificationJobRow): NotificationJobEntity {
    return NotificationJobEntity.fromData({ ...row });
  }

  private toAttempt(row: DeliveryAttemptRow): DeliveryAttempt {
    return {
      jobId: row.jobId,
      attemptNo: row.attemptNo,
      providerResponseCode: row.providerResponseCode,
      succeeded: row.succeeded,
      errorKind: row.errorKind,
      errorMessage: row.errorMessage,
      attemptedAt: row.attemptedAt,
    };
  }
}
