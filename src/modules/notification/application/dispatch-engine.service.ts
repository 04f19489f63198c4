import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import { JobQueue } from './job-queue';
import { NOTIFICATION_JOB_REPOSITORY } from '../domain/notification-job.repository';
import type { NotificationJobRepository } from '../domain/notification-job.repository';
import { IDEMPOTENCY_REPOSITORY } from '../domain/idempotency.repository';
import type {
  IdempotencyRecord,
  IdempotencyRepository,
} from '../domain/idempotency.repository';
import { NotificationJobEntity } from '../domain/notification-job.entity';
import type {
  JobErrorKind,
  NotificationJobState,
} from '../domain/notification-job.entity';
import {
  calculateBackoffDelay,
  computeDedupKey,
  maskRecipient,
} from '../domain/notification.rules';
import { TemplateResolverService } from '../../template/application/template-resolver.service';
import { NOTIFICATION_CATALOG } from '../../template/domain/notification-catalog';
import type { NotificationCatalog } from '../../template/domain/notification-catalog';
import {
  CHANNEL_PROVIDERS,
  CHANNELS,
} from '../../../shared/ports/channel-provider.port';
import type {
  Channel,
  ChannelMessage,
  ChannelProvider,
  ProviderResult,
} from '../../../shared/ports/channel-provider.port';
import { CLOCK, addMilliseconds } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import { DISPATCH_SETTINGS } from '../../../shared/config/dispatch.settings';
import type { DispatchSettings } from '../../../shared/config/dispatch.settings';
import {
  InvalidEventError,
  MissingVariableError,
  TemplateNotFoundError,
  UnknownEventTypeError,
} from '../../../shared/domain/errors';

// ============ TYPES ============

export interface InboundEvent {
  eventId: string;
  eventType: string;
  payload: Record<string, string>;
  occurredAt: Date | null;
  locale?: string;
}

/**
 * One event aimed at one recipient on one channel.
 */
export interface DispatchRequest {
  eventId: string;
  eventType: string;
  channel: Channel;
  recipient: string;
  payload: Record<string, string>;
  locale?: string;
}

export type SubmitDisposition = 'ACCEPTED' | 'ALREADY_DELIVERED' | 'IN_FLIGHT';

export interface SubmitResult {
  jobId: string;
  disposition: SubmitDisposition;
  state: NotificationJobState;
  dedupKey: string;
}

export type ProcessOutcome =
  | { kind: 'DELIVERED'; jobId: string }
  | { kind: 'RETRY_SCHEDULED'; jobId: string; nextRetryAt: Date }
  | { kind: 'FAILED'; jobId: string; errorKind: JobErrorKind }
  | { kind: 'SKIPPED'; jobId: string; reason: string };

export type RetryOutcome =
  | { kind: 'REQUEUED'; job: NotificationJobEntity }
  | { kind: 'NOT_FOUND'; jobId: string }
  | { kind: 'NOT_RETRYABLE'; jobId: string; reason: string }
  /** Another job holds the dedup key; `jobId` is that job */
  | { kind: 'DUPLICATE'; jobId: string; disposition: SubmitDisposition }
  | { kind: 'CHANGED'; jobId: string };

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^\+?[0-9][0-9\s\-()]{6,19}$/;

// Bounded so a stale IN_FLIGHT record cannot loop forever
const MAX_RESERVATION_ATTEMPTS = 2;

/**
 * Dispatch Engine
 *
 * Turns requests into jobs under the idempotency guard and drives each job
 * through render → send → record. Every write is a version-checked
 * compare-and-set, so a job is only ever advanced by the worker that
 * claimed it, in this process or another.
 */
@Injectable()
export class DispatchEngineService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(DispatchEngineService.name);
  private readonly providers: Map<Channel, ChannelProvider>;

  constructor(
    @Inject(NOTIFICATION_JOB_REPOSITORY)
    private readonly jobs: NotificationJobRepository,
    @Inject(IDEMPOTENCY_REPOSITORY)
    private readonly idempotency: IdempotencyRepository,
    @Inject(CHANNEL_PROVIDERS)
    providers: ChannelProvider[],
    @Inject(NOTIFICATION_CATALOG)
    private readonly catalog: NotificationCatalog,
    private readonly templates: TemplateResolverService,
    private readonly queue: JobQueue,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(DISPATCH_SETTINGS)
    private readonly settings: DispatchSettings,
  ) {
    this.providers = new Map(providers.map((p) => [p.channel, p]));
  }

  onApplicationBootstrap(): void {
    this.queue.start(
      (jobId) => this.processById(jobId).then(() => undefined),
      this.settings.workerConcurrency,
    );
  }

  async beforeApplicationShutdown(): Promise<void> {
    this.logger.log('Dispatch engine draining in-flight jobs...');
    await this.queue.drain();
    this.logger.log('Dispatch engine stopped');
  }

  canonicalEventType(eventType: string): string {
    return this.catalog.canonicalName(eventType);
  }

  isRunning(): boolean {
    return this.queue.isAccepting();
  }

  enqueue(jobId: string): boolean {
    return this.queue.enqueue(jobId);
  }

  // ============ SUBMISSION ============

  /**
   * @throws InvalidEventError for malformed requests
   * @throws UnknownEventTypeError after recording a FAILED job
   * @throws StoreUnavailableError when the stores cannot be reached
   */
  async submit(submitted: DispatchRequest): Promise<SubmitResult> {
    this.validate(submitted);
    const request: DispatchRequest = {
      ...submitted,
      eventType: this.catalog.canonicalName(submitted.eventType),
    };

    const now = this.clock.now();
    const dedupKey = computeDedupKey(
      request.eventId,
      request.channel,
      request.recipient,
    );

    if (!this.catalog.isKnown(request.eventType)) {
      const job = this.newJob(request, dedupKey, randomUUID(), now);
      job.reject(
        'UNKNOWN_EVENT_TYPE',
        `Unknown event type "${request.eventType}"`,
        now,
      );
      await this.jobs.create(job);
      this.logger.warn(
        `Rejected event ${request.eventId}: unknown event type "${request.eventType}" (job ${job.id})`,
      );
      throw new UnknownEventTypeError(request.eventType, job.id);
    }

    for (let i = 0; i < MAX_RESERVATION_ATTEMPTS; i++) {
      const jobId = randomUUID();
      const reservation = await this.idempotency.checkAndReserve(
        dedupKey,
        jobId,
        now,
        this.settings.inFlightTtlMs,
      );

      switch (reservation.outcome) {
        case 'ALREADY_DELIVERED':
          this.logger.log(
            `Duplicate of delivered notification ${reservation.record.jobId} (event ${request.eventId}, ${request.channel})`,
          );
          return {
            jobId: reservation.record.jobId,
            disposition: 'ALREADY_DELIVERED',
            state: 'DELIVERED',
            dedupKey,
          };

        case 'IN_FLIGHT': {
          const existing = await this.resolveInFlight(reservation.record, now);
          if (existing) {
            return { ...existing, dedupKey };
          }
          // Orphaned reservation released, try again
          continue;
        }

        case 'FRESH': {
          const job = this.newJob(request, dedupKey, jobId, now);
          try {
            await this.jobs.create(job);
          } catch (error) {
            await this.idempotency
              .release(dedupKey, jobId)
              .catch((releaseError: unknown) =>
                this.logger.error(
                  `Could not release reservation for job ${jobId}: ${releaseError instanceof Error ? releaseError.message : releaseError}`,
                ),
              );
            throw error;
          }

          this.queue.enqueue(job.id);
          this.logger.log(
            `Accepted ${request.eventType} ${request.channel} notification for ${maskRecipient(request.recipient)} (job ${job.id})`,
          );
          return {
            jobId: job.id,
            disposition: 'ACCEPTED',
            state: job.state,
            dedupKey,
          };
        }
      }
    }

    throw new Error(
      `Could not reserve dedup key for event ${request.eventId} (${request.channel})`,
    );
  }

  /**
   * Fan one inbound event out to every channel it names a recipient for.
   * @returns one result per channel, empty when the event has no recipient
   */
  async submitEvent(event: InboundEvent): Promise<SubmitResult[]> {
    const violations: string[] = [];
    if (!event.eventId.trim()) violations.push('event_id is required');
    if (!event.eventType.trim()) violations.push('event_type is required');
    if (violations.length > 0) {
      throw new InvalidEventError(violations);
    }

    // Unlike a manual send, no FAILED job is stored here: without a route
    // there is no channel or recipient field to build one from. The consumer
    // rejects the message, so only the broker's dead-letter policy keeps it.
    const route = this.catalog.findRoute(event.eventType);
    if (!route) {
      this.logger.warn(
        `Rejected event ${event.eventId}: unknown event type "${event.eventType}"`,
      );
      throw new UnknownEventTypeError(event.eventType);
    }

    const results: SubmitResult[] = [];
    const skipped: string[] = [];

    for (const channel of CHANNELS) {
      const recipientKey = route.recipients[channel];
      const recipient = recipientKey ? event.payload[recipientKey] : undefined;
      if (!recipient) {
        continue;
      }

      try {
        results.push(
          await this.submit({
            eventId: event.eventId,
            eventType: event.eventType,
            channel,
            recipient,
            payload: event.payload,
            locale: event.locale,
          }),
        );
      } catch (error) {
        if (!(error instanceof InvalidEventError)) {
          throw error;
        }
        this.logger.warn(
          `Skipping ${channel} for event ${event.eventId}: ${error.message}`,
        );
        skipped.push(...error.violations);
      }
    }

    if (results.length === 0 && skipped.length > 0) {
      throw new InvalidEventError(skipped);
    }
    if (results.length === 0) {
      this.logger.warn(
        `No recipient provided for ${event.eventType} event ${event.eventId}`,
      );
    }

    return results;
  }

  // ============ PROCESSING ============

  async processById(jobId: string): Promise<ProcessOutcome> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      this.logger.warn(`Job ${jobId} not found, skipping`);
      return { kind: 'SKIPPED', jobId, reason: 'not found' };
    }
    return this.processJob(job);
  }

  /**
   * Advance a job as far as it can go in one pass. Safe to call for any
   * job in any state: work already done or owned elsewhere is skipped.
   */
  async processJob(job: NotificationJobEntity): Promise<ProcessOutcome> {
    const now = this.clock.now();
    const skip = (reason: string): ProcessOutcome => ({
      kind: 'SKIPPED',
      jobId: job.id,
      reason,
    });

    if (job.isTerminal()) {
      return skip(`already ${job.state}`);
    }
    if (job.state === 'RETRYING' && !job.isDueForRetry(now)) {
      return skip('retry not due');
    }
    if (
      (job.state === 'RENDERING' || job.state === 'SENDING') &&
      !job.isStale(now, this.settings.staleAfterMs)
    ) {
      return skip('owned by another worker');
    }

    // 1. Claim
    job.claim(now);
    let current = await this.jobs.update(job);
    if (!current) {
      return skip('lost claim');
    }

    // 2. Render
    if (current.needsRendering()) {
      const rendered = this.render(current);
      if (!rendered.ok) {
        return this.failWithoutAttempt(current, rendered.kind, rendered.message);
      }

      current.applyRendered(
        rendered.templateId,
        rendered.subject,
        rendered.body,
        this.clock.now(),
      );
      current = await this.jobs.update(current);
      if (!current) {
        return skip('lost render');
      }
    }

    // 3. Send
    const result = await this.send(current);

    // 4. Record
    const recordedAt = this.clock.now();
    const attemptNo = current.attemptCount + 1;
    const nextRetryAt =
      result.kind === 'RETRYABLE_FAILURE' && attemptNo < current.maxAttempts
        ? addMilliseconds(
            recordedAt,
            calculateBackoffDelay(attemptNo, {
              baseMs: this.settings.backoffBaseMs,
              maxMs: this.settings.backoffMaxMs,
            }),
          )
        : null;

    const attempt = current.recordOutcome(result, nextRetryAt, recordedAt);
    const saved = await this.jobs.recordAttempt(current, attempt);
    if (!saved) {
      this.logger.warn(
        `Job ${job.id} changed while sending; attempt ${attemptNo} outcome ${result.kind} discarded`,
      );
      return skip('lost record');
    }

    return this.settle(saved, result, recordedAt);
  }

  // ============ MANUAL RETRY ============

  /**
   * Reopen a FAILED job with a fresh attempt budget and queue it again.
   * The job takes its dedup key back first, so it never sends alongside
   * another job delivering the same notification.
   *
   * @throws StoreUnavailableError when the stores cannot be reached
   */
  async retry(jobId: string): Promise<RetryOutcome> {
    const job = await this.jobs.findById(jobId);
    if (!job) {
      return { kind: 'NOT_FOUND', jobId };
    }
    if (job.state !== 'FAILED') {
      return {
        kind: 'NOT_RETRYABLE',
        jobId,
        reason: `Only FAILED notifications can be retried, this one is ${job.state}`,
      };
    }
    if (!this.catalog.isKnown(job.eventType)) {
      return {
        kind: 'NOT_RETRYABLE',
        jobId,
        reason: `Event type "${job.eventType}" has no route`,
      };
    }

    const now = this.clock.now();
    for (let i = 0; i < MAX_RESERVATION_ATTEMPTS; i++) {
      const reservation = await this.idempotency.checkAndReserve(
        job.dedupKey,
        job.id,
        now,
        this.settings.inFlightTtlMs,
      );

      switch (reservation.outcome) {
        case 'ALREADY_DELIVERED':
          return {
            kind: 'DUPLICATE',
            jobId: reservation.record.jobId,
            disposition: 'ALREADY_DELIVERED',
          };

        case 'IN_FLIGHT': {
          // A leftover reservation of this job is released here too
          const existing = await this.resolveInFlight(reservation.record, now);
          if (existing) {
            return {
              kind: 'DUPLICATE',
              jobId: existing.jobId,
              disposition: existing.disposition,
            };
          }
          continue;
        }

        case 'FRESH':
          return this.reopen(job, now);
      }
    }

    return { kind: 'CHANGED', jobId };
  }

  private async reopen(
    job: NotificationJobEntity,
    now: Date,
  ): Promise<RetryOutcome> {
    job.reopen(this.settings.maxAttempts, now);
    const saved = await this.jobs.update(job);
    if (!saved) {
      await this.idempotency.release(job.dedupKey, job.id);
      return { kind: 'CHANGED', jobId: job.id };
    }

    this.queue.enqueue(saved.id);
    this.logger.log(
      `Job ${saved.id} reopened for retry, ${saved.attemptCount}/${saved.maxAttempts} attempts used`,
    );
    return { kind: 'REQUEUED', job: saved };
  }

  // ============ INTERNALS ============

  private validate(request: DispatchRequest): void {
    const violations: string[] = [];

    if (!request.eventId.trim()) violations.push('event_id is required');
    if (!request.eventType.trim()) violations.push('event_type is required');
    if (!CHANNELS.includes(request.channel)) {
      violations.push(`channel must be one of ${CHANNELS.join(', ')}`);
    }

    const recipient = request.recipient.trim();
    if (!recipient) {
      violations.push('recipient is required');
    } else if (request.channel === 'EMAIL' && !EMAIL_PATTERN.test(recipient)) {
      violations.push('recipient must be an email address');
    } else if (request.channel === 'SMS' && !PHONE_PATTERN.test(recipient)) {
      violations.push('recipient must be a phone number');
    }

    if (violations.length > 0) {
      throw new InvalidEventError(violations);
    }
  }

  private newJob(
    request: DispatchRequest,
    dedupKey: string,
    jobId: string,
    now: Date,
  ): NotificationJobEntity {
    return NotificationJobEntity.create(
      {
        id: jobId,
        sourceEventId: request.eventId,
        eventType: request.eventType,
        channel: request.channel,
        recipient: request.recipient.trim(),
        locale: request.locale || this.settings.defaultLocale,
        payload: request.payload,
        dedupKey,
        maxAttempts: this.settings.maxAttempts,
      },
      now,
    );
  }

  /**
   * An IN_FLIGHT record normally points at a live job, or one its owner is
   * about to create. A failed job, or a job still missing after the stale
   * window, leaves an orphan that is released; a delivered job whose record
   * was never promoted gets promoted now.
   *
   * @returns null when the caller should reserve again
   */
  private async resolveInFlight(
    record: IdempotencyRecord,
    now: Date,
  ): Promise<Omit<SubmitResult, 'dedupKey'> | null> {
    const existing = await this.jobs.findById(record.jobId);

    if (!existing) {
      const age = now.getTime() - record.createdAt.getTime();
      if (age < this.settings.staleAfterMs) {
        return { jobId: record.jobId, disposition: 'IN_FLIGHT', state: 'PENDING' };
      }
    }

    if (!existing || existing.state === 'FAILED') {
      this.logger.warn(
        `Releasing orphaned reservation held by job ${record.jobId}`,
      );
      await this.idempotency.release(record.dedupKey, record.jobId);
      return null;
    }

    if (existing.state === 'DELIVERED') {
      await this.idempotency.markDelivered(
        record.dedupKey,
        existing.id,
        now,
        this.settings.retentionMs,
      );
      return {
        jobId: existing.id,
        disposition: 'ALREADY_DELIVERED',
        state: 'DELIVERED',
      };
    }

    // Nudge it along in case the process that owned it has gone
    this.queue.enqueue(existing.id);
    return {
      jobId: existing.id,
      disposition: 'IN_FLIGHT',
      state: existing.state,
    };
  }

  private render(
    job: NotificationJobEntity,
  ):
    | { ok: true; templateId: string; subject: string; body: string }
    | { ok: false; kind: JobErrorKind; message: string } {
    try {
      const template = this.templates.resolve(
        job.eventType,
        job.locale,
        job.channel,
      );
      const { subject, body } = this.templates.render(template, job.payload);
      return { ok: true, templateId: template.id, subject, body };
    } catch (error) {
      if (error instanceof TemplateNotFoundError) {
        return { ok: false, kind: 'TEMPLATE_NOT_FOUND', message: error.message };
      }
      if (error instanceof MissingVariableError) {
        return { ok: false, kind: 'MISSING_VARIABLE', message: error.message };
      }
      throw error;
    }
  }

  private async failWithoutAttempt(
    job: NotificationJobEntity,
    kind: JobErrorKind,
    message: string,
  ): Promise<ProcessOutcome> {
    job.reject(kind, message, this.clock.now());
    const saved = await this.jobs.update(job);
    if (!saved) {
      return { kind: 'SKIPPED', jobId: job.id, reason: 'lost reject' };
    }

    await this.idempotency.release(saved.dedupKey, saved.id);
    this.logger.error(
      `Job ${saved.id} FAILED (${kind}) without contacting the provider: ${message}`,
    );
    return { kind: 'FAILED', jobId: saved.id, errorKind: kind };
  }

  /**
   * One provider call, bounded by the configured timeout. A timeout aborts
   * the call and counts as a retryable failure.
   */
  private async send(job: NotificationJobEntity): Promise<ProviderResult> {
    const provider = this.providers.get(job.channel);
    if (!provider) {
      return {
        kind: 'PERMANENT_FAILURE',
        message: `No provider registered for channel ${job.channel}`,
        responseCode: null,
      };
    }

    const message: ChannelMessage = {
      jobId: job.id,
      to: job.recipient,
      subject: job.renderedSubject ?? '',
      body: job.renderedBody ?? '',
    };
    const timeoutMs = this.settings.providerTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ProviderResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          kind: 'RETRYABLE_FAILURE',
          message: `Provider did not respond within ${timeoutMs}ms`,
          responseCode: 'TIMEOUT',
        });
      }, timeoutMs);
    });

    const attempt = provider
      .send(message, controller.signal)
      .catch((error: unknown): ProviderResult => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `${job.channel} provider threw for job ${job.id}: ${reason}`,
        );
        return { kind: 'RETRYABLE_FAILURE', message: reason, responseCode: null };
      });

    try {
      return await Promise.race([attempt, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async settle(
    job: NotificationJobEntity,
    result: ProviderResult,
    now: Date,
  ): Promise<ProcessOutcome> {
    const target = `${job.channel} to ${maskRecipient(job.recipient)}`;

    switch (job.state) {
      case 'DELIVERED': {
        const recorded = await this.idempotency.markDelivered(
          job.dedupKey,
          job.id,
          now,
          this.settings.retentionMs,
        );
        if (!recorded) {
          this.logger.error(
            `Job ${job.id} delivered but its dedup key is held by another job; the existing record was kept`,
          );
        }
        this.logger.log(
          `Job ${job.id} DELIVERED (${target}) on attempt ${job.attemptCount}`,
        );
        return { kind: 'DELIVERED', jobId: job.id };
      }

      case 'RETRYING': {
        const nextRetryAt = job.nextRetryAt ?? now;
        const inSeconds = Math.round(
          (nextRetryAt.getTime() - now.getTime()) / 1000,
        );
        this.logger.warn(
          `Job ${job.id} failed (attempt ${job.attemptCount}/${job.maxAttempts}, ${target}). Next attempt in ${inSeconds}s. Error: ${job.lastError}`,
        );
        return { kind: 'RETRY_SCHEDULED', jobId: job.id, nextRetryAt };
      }

      default: {
        await this.idempotency.release(job.dedupKey, job.id);
        const errorKind = job.lastErrorKind ?? 'PERMANENT_FAILURE';
        this.logger.error(
          `Job ${job.id} FAILED (${errorKind}) after ${job.attemptCount}/${job.maxAttempts} attempts (${target}), last response ${result.kind}: ${job.lastError}`,
        );
        return { kind: 'FAILED', jobId: job.id, errorKind };
      }
    }
  }
}
