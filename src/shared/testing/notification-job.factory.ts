import { NotificationJobEntity } from '../../modules/notification/domain/notification-job.entity';
import type { NotificationJobData } from '../../modules/notification/domain/notification-job.entity';

export const FIXTURE_TIME = new Date('2026-03-02T10:00:00.000Z');

export function buildJobData(
  overrides: Partial<NotificationJobData> = {},
): NotificationJobData {
  return {
    id: '4f1c2a9e-6b0d-4c1e-9a7f-2d3b5e8c1a00',
    sourceEventId: 'evt-100',
    eventType: 'shipment.shipped',
    channel: 'EMAIL',
    recipient: 'maria@example.com',
    locale: 'en',
    payload: { order_id: 'ORD-1', carrier: 'BlueDart', tracking_no: 'TRK-9' },
    dedupKey: 'dedup-100',
    templateId: null,
    renderedSubject: null,
    renderedBody: null,
    state: 'PENDING',
    attemptCount: 0,
    maxAttempts: 5,
    lastErrorKind: null,
    lastError: null,
    version: 1,
    createdAt: FIXTURE_TIME,
    updatedAt: FIXTURE_TIME,
    lastAttemptAt: null,
    nextRetryAt: null,
    deliveredAt: null,
    failedAt: null,
    ...overrides,
  };
}

export function buildJob(
  overrides: Partial<NotificationJobData> = {},
): NotificationJobEntity {
  return NotificationJobEntity.fromData(buildJobData(overrides));
}
