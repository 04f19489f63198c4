import {
  pgTable,
  uuid,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  uniqueIndex,
  index,
  pgEnum,
} from 'drizzle-orm/pg-core';

// ============ ENUMS ============

export const notificationChannelEnum = pgEnum('notification_channel', [
  'EMAIL',
  'SMS',
]);

export const notificationJobStateEnum = pgEnum('notification_job_state', [
  'PENDING',
  'RENDERING',
  'SENDING', // Claimed by a worker, provider call in progress
  'RETRYING', // Transient failure, waits for next_retry_at
  'DELIVERED',
  'FAILED', // Permanent failure or attempt budget exhausted
]);

export const jobErrorKindEnum = pgEnum('job_error_kind', [
  'UNKNOWN_EVENT_TYPE',
  'TEMPLATE_NOT_FOUND',
  'MISSING_VARIABLE',
  'PERMANENT_FAILURE',
  'RETRYABLE_FAILURE',
  'EXHAUSTED_RETRIES',
]);

export const idempotencyStatusEnum = pgEnum('idempotency_status', [
  'IN_FLIGHT',
  'DELIVERED',
]);

// ============ NOTIFICATION JOBS ============

export const notificationJobs = pgTable(
  'notification_jobs',
  {
    id: uuid('id').primaryKey(),
    sourceEventId: text('source_event_id').notNull(),
    eventType: text('event_type').notNull(),
    channel: notificationChannelEnum('channel').notNull(),
    recipient: text('recipient').notNull(),
    locale: text('locale').notNull(),
    payload: jsonb('payload').$type<Record<string, string>>().notNull(),
    dedupKey: text('dedup_key').notNull(),

    templateId: text('template_id'),
    renderedSubject: text('rendered_subject'),
    renderedBody: text('rendered_body'),

    state: notificationJobStateEnum('state').notNull().default('PENDING'),
    attemptCount: integer('attempt_count').notNull().default(0),
    maxAttempts: integer('max_attempts').notNull().default(5),
    lastErrorKind: jobErrorKindEnum('last_error_kind'),
    lastError: text('last_error'),

    // Optimistic concurrency: every transition bumps the version
    version: integer('version').notNull().default(1),

    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
    lastAttemptAt: timestamp('last_attempt_at', { withTimezone: true }),
    nextRetryAt: timestamp('next_retry_at', { withTimezone: true }),
    deliveredAt: timestamp('delivered_at', { withTimezone: true }),
    failedAt: timestamp('failed_at', { withTimezone: true }),
  },
  (table) => [
    // Retry scanner: state = RETRYING AND next_retry_at <= now
    index('ix_notification_jobs_retry_due').on(table.state, table.nextRetryAt),
    // Stalled job recovery
    index('ix_notification_jobs_state_updated').on(
      table.state,
      table.updatedAt,
    ),
    index('ix_notification_jobs_source_event').on(table.sourceEventId),
    index('ix_notification_jobs_dedup_key').on(table.dedupKey),
    // Listing, newest first
    index('ix_notification_jobs_created').on(table.createdAt),
  ],
);

// ============ DELIVERY ATTEMPTS (append-only audit trail) ============

export const deliveryAttempts = pgTable(
  'delivery_attempts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: uuid('job_id')
      .notNull()
      .references(() => notificationJobs.id, { onDelete: 'cascade' }),
    attemptNo: integer('attempt_no').notNull(),
    providerResponseCode: text('provider_response_code'),
    succeeded: boolean('succeeded').notNull(),
    errorKind: jobErrorKindEnum('error_kind'),
    errorMessage: text('error_message'),
    attemptedAt: timestamp('attempted_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    uniqueIndex('ux_delivery_attempt_no').on(table.jobId, table.attemptNo),
  ],
);

// ============ IDEMPOTENCY ============

/**
 * One row per dedup key (event + channel + recipient).
 * The primary key is what makes reserve-or-read atomic.
 */
export const idempotencyRecords = pgTable(
  'idempotency_records',
  {
    dedupKey: text('dedup_key').primaryKey(),
    jobId: uuid('job_id').notNull(),
    status: idempotencyStatusEnum('status').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('ix_idempotency_expires').on(table.expiresAt)],
);

// ============ TYPE EXPORTS ============

export type NotificationJobRow = typeof notificationJobs.$inferSelect;
export type NewNotificationJobRow = typeof notificationJobs.$inferInsert;

export type DeliveryAttemptRow = typeof deliveryAttempts.$inferSelect;
export type NewDeliveryAttemptRow = typeof deliveryAttempts.$inferInsert;

export type IdempotencyRecordRow = typeof idempotencyRecords.$inferSelect;
