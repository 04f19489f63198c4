/**
 * Port for delivering a rendered notification over one channel.
 *
 * Implementations make exactly one external call per `send` and never retry;
 * retry policy belongs to the dispatch engine.
 */
export type Channel = 'EMAIL' | 'SMS';

export const CHANNELS: readonly Channel[] = ['EMAIL', 'SMS'];

export interface ChannelMessage {
  jobId: string;
  /** Email address or E.164 phone number */
  to: string;
  /** Ignored by channels without a subject line */
  subject: string;
  body: string;
}

export type ProviderResult =
  | { kind: 'SUCCESS'; providerMessageId: string; responseCode: string }
  | { kind: 'RETRYABLE_FAILURE'; message: string; responseCode: string | null }
  | { kind: 'PERMANENT_FAILURE'; message: string; responseCode: string | null };

export type ProviderResultKind = ProviderResult['kind'];

export interface ChannelProvider {
  readonly channel: Channel;

  /**
   * Transport errors are classified into the result, never thrown.
   * The signal aborts when the engine's send timeout elapses.
   */
  send(message: ChannelMessage, signal?: AbortSignal): Promise<ProviderResult>;
}

/** Injection token for `ChannelProvider[]`, one per channel */
export const CHANNEL_PROVIDERS = Symbol('CHANNEL_PROVIDERS');
