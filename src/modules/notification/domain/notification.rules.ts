import { createHash } from 'crypto';
import type { Channel } from '../../../shared/ports/channel-provider.port';

/**
 * Domain rules for notification dispatch.
 * Pure functions, no infrastructure dependencies.
 */

// ============ DEDUPLICATION ============

/**
 * Email addresses compare case-insensitively; phone numbers compare on
 * their digits and an optional leading `+`.
 */
export function normalizeRecipient(recipient: string, channel: Channel): string {
  const trimmed = recipient.trim();
  if (channel === 'SMS') {
    const digits = trimmed.replace(/\D/g, '');
    return trimmed.startsWith('+') ? `+${digits}` : digits;
  }
  return trimmed.toLowerCase();
}

/**
 * One logical notification = one (event, channel, recipient) triple.
 */
export function computeDedupKey(
  eventId: string,
  channel: Channel,
  recipient: string,
): string {
  return createHash('sha256')
    .update(`${eventId}:${channel}:${normalizeRecipient(recipient, channel)}`)
    .digest('hex');
}

/**
 * Manual sends without an explicit event id get one derived from their
 * content, so the same request twice is the same notification.
 */
export function deriveManualEventId(
  eventType: string,
  channel: Channel,
  recipient: string,
  payload: Record<string, string>,
): string {
  const canonicalPayload = Object.keys(payload)
    .sort()
    .map((key) => [key, payload[key]]);

  const digest = createHash('sha256')
    .update(
      JSON.stringify([
        eventType,
        channel,
        normalizeRecipient(recipient, channel),
        canonicalPayload,
      ]),
    )
    .digest('hex');

  return `manual:${digest}`;
}

// ============ BACKOFF ============

export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

/** Jitter is drawn from [0, JITTER_RATIO) of the capped delay */
export const JITTER_RATIO = 0.2;

/**
 * Exponential backoff with jitter.
 * raw = min(base * 2^attempt, max); delay = min(raw + U(0, 0.2) * raw, max)
 *
 * Attempt 1: ~2s, 2: ~4s, 3: ~8s, 4: ~16s with a 1s base.
 * Non-decreasing in `attempt` because doubling outgrows a 20% jitter.
 */
export function calculateBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const raw = Math.min(policy.baseMs * Math.pow(2, attempt), policy.maxMs);
  const jitter = random() * JITTER_RATIO * raw;
  return Math.round(Math.min(raw + jitter, policy.maxMs));
}

// ============ LOGGING ============

/**
 * Mask PII before it reaches the logs.
 * Emails keep the first two characters of the local part, phone numbers
 * their last four digits.
 */
export function maskRecipient(recipient: string): string {
  const at = recipient.indexOf('@');
  if (at >= 0) {
    return `${recipient.slice(0, Math.min(2, at))}***${recipient.slice(at)}`;
  }

  const digits = recipient.replace(/\D/g, '');
  return `***${digits.slice(-4)}`;
}
