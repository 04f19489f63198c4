import type {
  DeliveryAttempt,
  NotificationJobEntity,
  NotificationJobState,
} from './notification-job.entity';
import type { Channel } from '../../../shared/ports/channel-provider.port';

/** Every field narrows the result; all absent matches every job */
export interface NotificationJobFilter {
  channel?: Channel;
  eventType?: string;
  state?: NotificationJobState;
  /** Matches the `order_id` payload value */
  orderId?: string;
}

export interface JobPage {
  items: NotificationJobEntity[];
  /** Matches across all pages */
  total: number;
}

export interface JobCounts {
  total: number;
  byState: Record<NotificationJobState, number>;
  byChannel: Record<Channel, number>;
  byEventType: Record<string, number>;
}

export function emptyJobCounts(): JobCounts {
  return {
    total: 0,
    byState: {
      PENDING: 0,
      RENDERING: 0,
      SENDING: 0,
      RETRYING: 0,
      DELIVERED: 0,
      FAILED: 0,
    },
    byChannel: { EMAIL: 0, SMS: 0 },
    byEventType: {},
  };
}

/**
 * NotificationJob Repository Interface (Port)
 *
 * Writes are compare-and-set on `version`: a caller holding a stale copy
 * gets `null` back instead of overwriting someone else's transition.
 * Connectivity failures surface as StoreUnavailableError.
 */
export interface NotificationJobRepository {
  create(job: NotificationJobEntity): Promise<NotificationJobEntity>;

  /**
   * @returns null if not found
   */
  findById(id: string): Promise<NotificationJobEntity | null>;

  /**
   * Persist a mutated job if nobody else wrote it since it was read.
   * @returns the stored job at its new version, or null on a lost race
   */
  update(job: NotificationJobEntity): Promise<NotificationJobEntity | null>;

  /**
   * Same as `update`, plus append the attempt, in one transaction.
   */
  recordAttempt(
    job: NotificationJobEntity,
    attempt: DeliveryAttempt,
  ): Promise<NotificationJobEntity | null>;

  findAttempts(jobId: string): Promise<DeliveryAttempt[]>;

  /**
   * state = RETRYING AND next_retry_at <= now, oldest first
   */
  findDueForRetry(now: Date, limit: number): Promise<NotificationJobEntity[]>;

  /**
   * PENDING/RENDERING/SENDING jobs last touched at or before `before`.
   * RETRYING jobs are excluded: they wait on next_retry_at instead.
   */
  findStalled(before: Date, limit: number): Promise<NotificationJobEntity[]>;

  /**
   * Newest first.
   */
  findMany(
    filter: NotificationJobFilter,
    limit: number,
    offset: number,
  ): Promise<JobPage>;

  /**
   * Job counts grouped by state, channel and event type. Every state and
   * channel is present, at zero when no job has it.
   */
  countByDimension(): Promise<JobCounts>;

  /** Round-trip to the store; throws StoreUnavailableError when unreachable */
  ping(): Promise<void>;
}

export const NOTIFICATION_JOB_REPOSITORY = Symbol(
  'NOTIFICATION_JOB_REPOSITORY',
);
