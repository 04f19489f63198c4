import type {
  IdempotencyRecord,
  IdempotencyRepository,
  ReservationResult,
} from '../../modules/notification/domain/idempotency.repository';
import { StoreUnavailableError } from '../domain/errors';

/**
 * Process-local stand-in for the idempotency table. Reserve-or-read has no
 * await between its read and its write, which makes it atomic here.
 */
export class InMemoryIdempotencyRepository implements IdempotencyRepository {
  available = true;
  private readonly records = new Map<string, IdempotencyRecord>();

  async checkAndReserve(
    dedupKey: string,
    jobId: string,
    now: Date,
    ttlMs: number,
  ): Promise<ReservationResult> {
    this.ensureAvailable('idempotency.checkAndReserve');
    const existing = this.records.get(dedupKey);

    if (existing && existing.expiresAt.getTime() > now.getTime()) {
      return existing.status === 'DELIVERED'
        ? { outcome: 'ALREADY_DELIVERED', record: { ...existing } }
        : { outcome: 'IN_FLIGHT', record: { ...existing } };
    }

    const record: IdempotencyRecord = {
      dedupKey,
      jobId,
      status: 'IN_FLIGHT',
      expiresAt: new Date(now.getTime() + ttlMs),
      createdAt: now,
    };
    this.records.set(dedupKey, record);
    return { outcome: 'FRESH', record: { ...record } };
  }

  async markDelivered(
    dedupKey: string,
    jobId: string,
    now: Date,
    retentionMs: number,
  ): Promise<boolean> {
    this.ensureAvailable('idempotency.markDelivered');
    const existing = this.records.get(dedupKey);
    if (
      existing &&
      existing.jobId !== jobId &&
      existing.expiresAt.getTime() > now.getTime()
    ) {
      return false;
    }

    this.records.set(dedupKey, {
      dedupKey,
      jobId,
      status: 'DELIVERED',
      expiresAt: new Date(now.getTime() + retentionMs),
      createdAt: existing?.createdAt ?? now,
    });
    return true;
  }

  async release(dedupKey: string, jobId: string): Promise<void> {
    this.ensureAvailable('idempotency.release');
    const existing = this.records.get(dedupKey);
    if (existing?.status === 'IN_FLIGHT' && existing.jobId === jobId) {
      this.records.delete(dedupKey);
    }
  }

  async purgeExpired(now: Date): Promise<number> {
    this.ensureAvailable('idempotency.purgeExpired');
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.expiresAt.getTime() <= now.getTime()) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  // ============ TEST HELPERS ============

  get(dedupKey: string): IdempotencyRecord | undefined {
    return this.records.get(dedupKey);
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
