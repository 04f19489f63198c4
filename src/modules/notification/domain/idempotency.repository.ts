export type IdempotencyStatus = 'IN_FLIGHT' | 'DELIVERED';

export interface IdempotencyRecord {
  dedupKey: string;
  jobId: string;
  status: IdempotencyStatus;
  expiresAt: Date;
  createdAt: Date;
}

export type ReservationResult =
  | { outcome: 'FRESH'; record: IdempotencyRecord }
  | { outcome: 'ALREADY_DELIVERED'; record: IdempotencyRecord }
  | { outcome: 'IN_FLIGHT'; record: IdempotencyRecord };

/**
 * Idempotency Store (Port)
 *
 * `checkAndReserve` is atomic: of N concurrent callers for one key, exactly
 * one sees FRESH. An expired record counts as absent and is taken over.
 */
export interface IdempotencyRepository {
  /**
   * @param jobId the job that will own the key if the reservation is fresh
   * @param ttlMs lifetime of the in-flight reservation
   */
  checkAndReserve(
    dedupKey: string,
    jobId: string,
    now: Date,
    ttlMs: number,
  ): Promise<ReservationResult>;

  /**
   * Record the delivery and keep the key for the retention window. Only the
   * job holding the key, or any job once the record has expired, may do so.
   * @returns false when a live record belongs to another job
   */
  markDelivered(
    dedupKey: string,
    jobId: string,
    now: Date,
    retentionMs: number,
  ): Promise<boolean>;

  /**
   * Drop an in-flight reservation held by `jobId`, so a re-emitted event
   * can be processed again. Delivered records are never released.
   */
  release(dedupKey: string, jobId: string): Promise<void>;

  /**
   * @returns number of records removed
   */
  purgeExpired(now: Date): Promise<number>;
}

export const IDEMPOTENCY_REPOSITORY = Symbol('IDEMPOTENCY_REPOSITORY');
