import { InvalidStateTransitionError } from '../../../shared/domain/errors';
import type {
  Channel,
  ProviderResult,
} from '../../../shared/ports/channel-provider.port';

export type NotificationJobState =
  | 'PENDING'
  | 'RENDERING'
  | 'SENDING'
  | 'RETRYING'
  | 'DELIVERED'
  | 'FAILED';

export type JobErrorKind =
  | 'UNKNOWN_EVENT_TYPE'
  | 'TEMPLATE_NOT_FOUND'
  | 'MISSING_VARIABLE'
  | 'PERMANENT_FAILURE'
  | 'RETRYABLE_FAILURE'
  | 'EXHAUSTED_RETRIES';

/**
 * Forward-only transitions. DELIVERED is final; FAILED only reopens to
 * PENDING through an explicit `reopen`.
 */
const ALLOWED_TRANSITIONS: Record<
  NotificationJobState,
  readonly NotificationJobState[]
> = {
  PENDING: ['RENDERING', 'FAILED'],
  RENDERING: ['SENDING', 'FAILED'],
  SENDING: ['DELIVERED', 'RETRYING', 'FAILED'],
  RETRYING: ['SENDING', 'FAILED'],
  DELIVERED: [],
  FAILED: ['PENDING'],
};

export const NOTIFICATION_JOB_STATES: readonly NotificationJobState[] = [
  'PENDING',
  'RENDERING',
  'SENDING',
  'RETRYING',
  'DELIVERED',
  'FAILED',
];

export const TERMINAL_STATES: readonly NotificationJobState[] = [
  'DELIVERED',
  'FAILED',
];

/**
 * NotificationJob data interface (for persistence/transfer)
 */
export interface NotificationJobData {
  id: string;
  sourceEventId: string;
  eventType: string;
  channel: Channel;
  recipient: string;
  locale: string;
  payload: Record<string, string>;
  dedupKey: string;
  templateId: string | null;
  renderedSubject: string | null;
  renderedBody: string | null;
  state: NotificationJobState;
  attemptCount: number;
  maxAttempts: number;
  lastErrorKind: JobErrorKind | null;
  lastError: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  lastAttemptAt: Date | null;
  nextRetryAt: Date | null;
  deliveredAt: Date | null;
  failedAt: Date | null;
}

export interface DeliveryAttempt {
  jobId: string;
  attemptNo: number;
  providerResponseCode: string | null;
  succeeded: boolean;
  errorKind: JobErrorKind | null;
  errorMessage: string | null;
  attemptedAt: Date;
}

export interface NewNotificationJobProps {
  id: string;
  sourceEventId: string;
  eventType: string;
  channel: Channel;
  recipient: string;
  locale: string;
  payload: Record<string, string>;
  dedupKey: string;
  maxAttempts: number;
}

/**
 * NotificationJob Entity - owns the delivery state machine.
 *
 * Every mutation goes through `transitionTo`, so an illegal move throws
 * before anything is persisted. `version` is the value read from the store;
 * the repository bumps it when the mutated entity is written back.
 */
export class NotificationJobEntity {
  readonly id: string;
  readonly sourceEventId: string;
  readonly eventType: string;
  readonly channel: Channel;
  readonly recipient: string;
  readonly locale: string;
  readonly payload: Record<string, string>;
  readonly dedupKey: string;
  readonly version: number;
  readonly createdAt: Date;

  private _templateId: string | null;
  private _renderedSubject: string | null;
  private _renderedBody: string | null;
  private _state: NotificationJobState;
  private _attemptCount: number;
  private _maxAttempts: number;
  private _lastErrorKind: JobErrorKind | null;
  private _lastError: string | null;
  private _updatedAt: Date;
  private _lastAttemptAt: Date | null;
  private _nextRetryAt: Date | null;
  private _deliveredAt: Date | null;
  private _failedAt: Date | null;

  constructor(data: NotificationJobData) {
    this.id = data.id;
    this.sourceEventId = data.sourceEventId;
    this.eventType = data.eventType;
    this.channel = data.channel;
    this.recipient = data.recipient;
    this.locale = data.locale;
    this.payload = data.payload;
    this.dedupKey = data.dedupKey;
    this._maxAttempts = data.maxAttempts;
    this.version = data.version;
    this.createdAt = data.createdAt;
    this._templateId = data.templateId;
    this._renderedSubject = data.renderedSubject;
    this._renderedBody = data.renderedBody;
    this._state = data.state;
    this._attemptCount = data.attemptCount;
    this._lastErrorKind = data.lastErrorKind;
    this._lastError = data.lastError;
    this._updatedAt = data.updatedAt;
    this._lastAttemptAt = data.lastAttemptAt;
    this._nextRetryAt = data.nextRetryAt;
    this._deliveredAt = data.deliveredAt;
    this._failedAt = data.failedAt;
  }

  static create(props: NewNotificationJobProps, now: Date): NotificationJobEntity {
    return new NotificationJobEntity({
      ...props,
      templateId: null,
      renderedSubject: null,
      renderedBody: null,
      state: 'PENDING',
      attemptCount: 0,
      lastErrorKind: null,
      lastError: null,
      version: 1,
      createdAt: now,
      updatedAt: now,
      lastAttemptAt: null,
      nextRetryAt: null,
      deliveredAt: null,
      failedAt: null,
    });
  }

  // ============ GETTERS ============

  get state(): NotificationJobState {
    return this._state;
  }

  get templateId(): string | null {
    return this._templateId;
  }

  get renderedSubject(): string | null {
    return this._renderedSubject;
  }

  get renderedBody(): string | null {
    return this._renderedBody;
  }

  get attemptCount(): number {
    return this._attemptCount;
  }

  get maxAttempts(): number {
    return this._maxAttempts;
  }

  get lastErrorKind(): JobErrorKind | null {
    return this._lastErrorKind;
  }

  get lastError(): string | null {
    return this._lastError;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get lastAttemptAt(): Date | null {
    return this._lastAttemptAt;
  }

  get nextRetryAt(): Date | null {
    return this._nextRetryAt;
  }

  get deliveredAt(): Date | null {
    return this._deliveredAt;
  }

  get failedAt(): Date | null {
    return this._failedAt;
  }

  // ============ QUERIES ============

  isTerminal(): boolean {
    return TERMINAL_STATES.includes(this._state);
  }

  isDueForRetry(now: Date): boolean {
    return (
      this._state === 'RETRYING' &&
      this._nextRetryAt !== null &&
      this._nextRetryAt.getTime() <= now.getTime()
    );
  }

  /**
   * RENDERING/SENDING jobs are owned by whichever worker claimed them.
   * Once untouched for `staleAfterMs` the owner is presumed dead.
   */
  isStale(now: Date, staleAfterMs: number): boolean {
    return now.getTime() - this._updatedAt.getTime() >= staleAfterMs;
  }

  hasAttemptsRemaining(): boolean {
    return this._attemptCount < this._maxAttempts;
  }

  needsRendering(): boolean {
    return this._state === 'PENDING' || this._state === 'RENDERING';
  }

  // ============ DOMAIN METHODS ============

  /**
   * Claim the job for a worker. PENDING moves to RENDERING and RETRYING to
   * SENDING; an abandoned RENDERING/SENDING job keeps its state and is
   * re-stamped so the version check decides the new owner.
   */
  claim(now: Date): void {
    switch (this._state) {
      case 'PENDING':
        this.transitionTo('RENDERING', now);
        return;
      case 'RETRYING':
        this.transitionTo('SENDING', now);
        this._nextRetryAt = null;
        return;
      case 'RENDERING':
      case 'SENDING':
        this._updatedAt = now;
        return;
      default:
        throw new InvalidStateTransitionError(this._state, 'claimed');
    }
  }

  applyRendered(
    templateId: string,
    subject: string,
    body: string,
    now: Date,
  ): void {
    this.transitionTo('SENDING', now);
    this._templateId = templateId;
    this._renderedSubject = subject;
    this._renderedBody = body;
  }

  /**
   * Fail without a delivery attempt (unknown type, template errors).
   */
  reject(kind: JobErrorKind, message: string, now: Date): void {
    this.transitionTo('FAILED', now);
    this._lastErrorKind = kind;
    this._lastError = message;
    this._failedAt = now;
  }

  /**
   * Apply a provider outcome. Always produces exactly one attempt record,
   * which keeps attemptCount equal to the number of stored attempts.
   *
   * @param nextRetryAt when the next attempt is due, or null when the
   *   attempt budget is spent
   */
  recordOutcome(
    result: ProviderResult,
    nextRetryAt: Date | null,
    now: Date,
  ): DeliveryAttempt {
    this._attemptCount += 1;
    this._lastAttemptAt = now;

    switch (result.kind) {
      case 'SUCCESS':
        this.transitionTo('DELIVERED', now);
        this._deliveredAt = now;
        this._lastErrorKind = null;
        this._lastError = null;
        return this.attempt(result.responseCode, true, null, null, now);

      case 'PERMANENT_FAILURE':
        this.reject('PERMANENT_FAILURE', result.message, now);
        return this.attempt(
          result.responseCode,
          false,
          'PERMANENT_FAILURE',
          result.message,
          now,
        );

      case 'RETRYABLE_FAILURE':
        if (nextRetryAt === null || !this.hasAttemptsRemaining()) {
          this.reject('EXHAUSTED_RETRIES', result.message, now);
        } else {
          this.transitionTo('RETRYING', now);
          this._nextRetryAt = nextRetryAt;
          this._lastErrorKind = 'RETRYABLE_FAILURE';
          this._lastError = result.message;
        }
        return this.attempt(
          result.responseCode,
          false,
          'RETRYABLE_FAILURE',
          result.message,
          now,
        );
    }
  }

  /**
   * Hand a stalled SENDING job back to the retry path. No attempt is
   * recorded: whether the provider saw the message is unknown.
   */
  releaseStalled(now: Date): void {
    this.transitionTo('RETRYING', now);
    this._nextRetryAt = now;
  }

  /**
   * Give a FAILED job another round: back to PENDING with `extraAttempts`
   * more on top of those already made. Rendering is dropped so the job
   * picks up the current template.
   */
  reopen(extraAttempts: number, now: Date): void {
    this.transitionTo('PENDING', now);
    this._maxAttempts = this._attemptCount + extraAttempts;
    this._templateId = null;
    this._renderedSubject = null;
    this._renderedBody = null;
    this._lastErrorKind = null;
    this._lastError = null;
    this._nextRetryAt = null;
    this._failedAt = null;
  }

  // ============ GUARDS ============

  ensureCanTransitionTo(next: NotificationJobState): void {
    if (!ALLOWED_TRANSITIONS[this._state].includes(next)) {
      throw new InvalidStateTransitionError(this._state, next);
    }
  }

  private transitionTo(next: NotificationJobState, now: Date): void {
    this.ensureCanTransitionTo(next);
    this._state = next;
    this._updatedAt = now;
  }

  private attempt(
    responseCode: string | null,
    succeeded: boolean,
    errorKind: JobErrorKind | null,
    errorMessage: string | null,
    now: Date,
  ): DeliveryAttempt {
    return {
      jobId: this.id,
      attemptNo: this._attemptCount,
      providerResponseCode: responseCode,
      succeeded,
      errorKind,
      errorMessage,
      attemptedAt: now,
    };
  }

  // ============ PERSISTENCE ============

  toData(): NotificationJobData {
    return {
      id: this.id,
      sourceEventId: this.sourceEventId,
      eventType: this.eventType,
      channel: this.channel,
      recipient: this.recipient,
      locale: this.locale,
      payload: this.payload,
      dedupKey: this.dedupKey,
      templateId: this._templateId,
      renderedSubject: this._renderedSubject,
      renderedBody: this._renderedBody,
      state: this._state,
      attemptCount: this._attemptCount,
      maxAttempts: this._maxAttempts,
      lastErrorKind: this._lastErrorKind,
      lastError: this._lastError,
      version: this.version,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
      lastAttemptAt: this._lastAttemptAt,
      nextRetryAt: this._nextRetryAt,
      deliveredAt: this._deliveredAt,
      failedAt: this._failedAt,
    };
  }

  static fromData(data: NotificationJobData): NotificationJobEntity {
    return new NotificationJobEntity(data);
  }
}
