import { Injectable, Inject, Logger } from '@nestjs/common';
import { and, eq, lte, or } from 'drizzle-orm';
import type {
  IdempotencyRecord,
  IdempotencyRepository,
  ReservationResult,
} from '../domain/idempotency.repository';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import { idempotencyRecords } from '../../../shared/infrastructure/database/schema';
import type { IdempotencyRecordRow } from '../../../shared/infrastructure/database/schema';
import { withStore } from '../../../shared/infrastructure/database/store-errors';
import { addMilliseconds } from '../../../shared/domain/clock.port';

// insert → take over expired → read; a concurrent delete can empty all three
const MAX_RESERVE_ROUNDS = 3;

/**
 * Idempotency records keyed by dedup_key.
 *
 * Atomicity comes from the primary key: INSERT ... ON CONFLICT DO NOTHING
 * lets exactly one caller create the row, and the expired-row takeover is a
 * single conditional UPDATE.
 */
@Injectable()
export class DrizzleIdempotencyRepository implements IdempotencyRepository {
  private readonly logger = new Logger(DrizzleIdempotencyRepository.name);

  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async checkAndReserve(
    dedupKey: string,
    jobId: string,
    now: Date,
    ttlMs: number,
  ): Promise<ReservationResult> {
    return withStore('idempotency.checkAndReserve', async () => {
      const reservation = {
        jobId,
        status: 'IN_FLIGHT' as const,
        expiresAt: addMilliseconds(now, ttlMs),
        createdAt: now,
        updatedAt: now,
      };

      for (let round = 0; round < MAX_RESERVE_ROUNDS; round++) {
        const [inserted] = await this.db
          .insert(idempotencyRecords)
          .values({ dedupKey, ...reservation })
          .onConflictDoNothing({ target: idempotencyRecords.dedupKey })
          .returning();

        if (inserted) {
          return { outcome: 'FRESH', record: this.toRecord(inserted) };
        }

        const [takenOver] = await this.db
          .update(idempotencyRecords)
          .set(reservation)
          .where(
            and(
              eq(idempotencyRecords.dedupKey, dedupKey),
              lte(idempotencyRecords.expiresAt, now),
            ),
          )
          .returning();

        if (takenOver) {
          this.logger.debug(`Took over expired reservation ${dedupKey}`);
          return { outcome: 'FRESH', record: this.toRecord(takenOver) };
        }

        const [existing] = await this.db
          .select()
          .from(idempotencyRecords)
          .where(eq(idempotencyRecords.dedupKey, dedupKey))
          .limit(1);

        if (existing) {
          const record = this.toRecord(existing);
          return existing.status === 'DELIVERED'
            ? { outcome: 'ALREADY_DELIVERED', record }
            : { outcome: 'IN_FLIGHT', record };
        }
      }

      throw new Error(`Could not reserve ${dedupKey}: record kept changing`);
    });
  }

  async markDelivered(
    dedupKey: string,
    jobId: string,
    now: Date,
    retentionMs: number,
  ): Promise<boolean> {
    return withStore('idempotency.markDelivered', async () => {
      const delivered = {
        jobId,
        status: 'DELIVERED' as const,
        expiresAt: addMilliseconds(now, retentionMs),
        updatedAt: now,
      };

      // The conflicting row is only overwritten by its owner or once expired
      const written = await this.db
        .insert(idempotencyRecords)
        .values({ dedupKey, createdAt: now, ...delivered })
        .onConflictDoUpdate({
          target: idempotencyRecords.dedupKey,
          set: delivered,
          setWhere: or(
            eq(idempotencyRecords.jobId, jobId),
            lte(idempotencyRecords.expiresAt, now),
          ),
        })
        .returning({ dedupKey: idempotencyRecords.dedupKey });

      return written.length > 0;
    });
  }

  async release(dedupKey: string, jobId: string): Promise<void> {
    await withStore('idempotency.release', async () => {
      await this.db
        .delete(idempotencyRecords)
        .where(
          and(
            eq(idempotencyRecords.dedupKey, dedupKey),
            eq(idempotencyRecords.jobId, jobId),
            eq(idempotencyRecords.status, 'IN_FLIGHT'),
          ),
        );
    });
  }

  async purgeExpired(now: Date): Promise<number> {
    return withStore('idempotency.purgeExpired', async () => {
      const removed = await this.db
        .delete(idempotencyRecords)
        .where(lte(idempotencyRecords.expiresAt, now))
        .returning({ dedupKey: idempotencyRecords.dedupKey });

      return removed.length;
    });
  }

  private toRecord(row: IdempotencyRecordRow): IdempotencyRecord {
    return {
      dedupKey: row.dedupKey,
      jobId: row.jobId,
      status: row.status,
      expiresAt: row.expiresAt,
      createdAt: row.createdAt,
    };
  }
}
