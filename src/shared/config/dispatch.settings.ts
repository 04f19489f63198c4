import { ConfigService } from '@nestjs/config';

export const DISPATCH_SETTINGS = Symbol('DISPATCH_SETTINGS');

/**
 * Tunables for the dispatch pipeline, resolved once at startup.
 */
export interface DispatchSettings {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  providerTimeoutMs: number;
  workerConcurrency: number;
  retryBatchSize: number;
  /** A RENDERING/SENDING job untouched for this long is considered abandoned */
  staleAfterMs: number;
  inFlightTtlMs: number;
  retentionMs: number;
  defaultLocale: string;
  catalogPath: string;
}

export const DEFAULT_DISPATCH_SETTINGS: DispatchSettings = {
  maxAttempts: 5,
  backoffBaseMs: 1000,
  backoffMaxMs: 300_000,
  providerTimeoutMs: 120_000,
  workerConcurrency: 4,
  retryBatchSize: 100,
  staleAfterMs: 300_000,
  inFlightTtlMs: 24 * 60 * 60 * 1000,
  retentionMs: 7 * 24 * 60 * 60 * 1000,
  defaultLocale: 'en',
  catalogPath: 'templates/notification-catalog.json',
};

export function readPositiveInt(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = typeof raw === 'number' ? raw : parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadDispatchSettings(config: ConfigService): DispatchSettings {
  const defaults = DEFAULT_DISPATCH_SETTINGS;

  const settings: DispatchSettings = {
    maxAttempts: readPositiveInt(
      config,
      'DISPATCH_MAX_ATTEMPTS',
      defaults.maxAttempts,
    ),
    backoffBaseMs: readPositiveInt(
      config,
      'DISPATCH_BACKOFF_BASE_MS',
      defaults.backoffBaseMs,
    ),
    backoffMaxMs: readPositiveInt(
      config,
      'DISPATCH_BACKOFF_MAX_MS',
      defaults.backoffMaxMs,
    ),
    providerTimeoutMs: readPositiveInt(
      config,
      'DISPATCH_PROVIDER_TIMEOUT_MS',
      defaults.providerTimeoutMs,
    ),
    workerConcurrency: readPositiveInt(
      config,
      'DISPATCH_WORKER_CONCURRENCY',
      defaults.workerConcurrency,
    ),
    retryBatchSize: readPositiveInt(
      config,
      'DISPATCH_RETRY_BATCH_SIZE',
      defaults.retryBatchSize,
    ),
    staleAfterMs: readPositiveInt(
      config,
      'DISPATCH_STALE_AFTER_MS',
      defaults.staleAfterMs,
    ),
    inFlightTtlMs: readPositiveInt(
      config,
      'IDEMPOTENCY_IN_FLIGHT_TTL_MS',
      defaults.inFlightTtlMs,
    ),
    retentionMs: readPositiveInt(
      config,
      'IDEMPOTENCY_RETENTION_MS',
      defaults.retentionMs,
    ),
    defaultLocale:
      config.get<string>('NOTIFICATION_DEFAULT_LOCALE') ||
      defaults.defaultLocale,
    catalogPath:
      config.get<string>('NOTIFICATION_CATALOG_PATH') || defaults.catalogPath,
  };

  if (settings.backoffBaseMs > settings.backoffMaxMs) {
    throw new Error(
      'DISPATCH_BACKOFF_BASE_MS must not exceed DISPATCH_BACKOFF_MAX_MS',
    );
  }

  // A worker still waiting on its provider must never look abandoned
  if (settings.staleAfterMs <= settings.providerTimeoutMs) {
    throw new Error(
      `DISPATCH_STALE_AFTER_MS (${settings.staleAfterMs}) must exceed DISPATCH_PROVIDER_TIMEOUT_MS (${settings.providerTimeoutMs})`,
    );
  }

  // A reservation must outlive every attempt of the job that holds it,
  // otherwise a duplicate can take the key over while the job still retries
  const horizon = retryHorizonMs(settings);
  if (settings.inFlightTtlMs < horizon) {
    throw new Error(
      `IDEMPOTENCY_IN_FLIGHT_TTL_MS (${settings.inFlightTtlMs}) must be at least ${horizon}, the longest a job can keep retrying`,
    );
  }

  return settings;
}

/**
 * Upper bound on how long a job stays in flight: every attempt waits at
 * most the backoff cap and then at most the provider timeout.
 */
export function retryHorizonMs(
  settings: Pick<
    DispatchSettings,
    'maxAttempts' | 'backoffMaxMs' | 'providerTimeoutMs'
  >,
): number {
  return (
    settings.maxAttempts * (settings.backoffMaxMs + settings.providerTimeoutMs)
  );
}
