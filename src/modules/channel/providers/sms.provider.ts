import { Logger } from '@nestjs/common';
import type {
  ChannelMessage,
  ChannelProvider,
  ProviderResult,
} from '../../../shared/ports/channel-provider.port';
import type { SmsClient } from '../infrastructure/twilio-sms.client';
import { SendAbortedError } from '../infrastructure/send-aborted.error';
import { abortedResult } from './email.provider';
import { maskRecipient } from '../../notification/domain/notification.rules';

/**
 * Twilio error codes for numbers that can never receive the message:
 * invalid 'To' (21211), invalid mobile (21214), region not enabled (21408),
 * unsubscribed (21610), unreachable carrier (21612), not a mobile (21614).
 */
export const PERMANENT_TWILIO_CODES = new Set([
  21211, 21214, 21408, 21610, 21612, 21614,
]);

function numericProperty(error: unknown, key: string): number | null {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'number' ? value : null;
  }
  return null;
}

function stringProperty(error: unknown, key: string): string | null {
  if (typeof error === 'object' && error !== null && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : null;
  }
  return null;
}

/**
 * Twilio REST errors carry an HTTP `status` and a numeric `code`;
 * network failures carry a string `code` and no status.
 */
export function classifySmsError(error: unknown): ProviderResult {
  const message = error instanceof Error ? error.message : String(error);
  const status = numericProperty(error, 'status');
  const twilioCode = numericProperty(error, 'code');

  if (status !== null) {
    const responseCode = String(twilioCode ?? status);

    if (twilioCode !== null && PERMANENT_TWILIO_CODES.has(twilioCode)) {
      return { kind: 'PERMANENT_FAILURE', message, responseCode };
    }
    if (status === 429 || status >= 500) {
      return { kind: 'RETRYABLE_FAILURE', message, responseCode };
    }
    if (status >= 400) {
      return { kind: 'PERMANENT_FAILURE', message, responseCode };
    }
  }

  return {
    kind: 'RETRYABLE_FAILURE',
    message,
    responseCode: stringProperty(error, 'code'),
  };
}

export class SmsProvider implements ChannelProvider {
  readonly channel = 'SMS' as const;
  private readonly logger = new Logger(SmsProvider.name);

  constructor(private readonly client: SmsClient | null) {}

  async send(
    message: ChannelMessage,
    signal?: AbortSignal,
  ): Promise<ProviderResult> {
    if (!this.client) {
      return {
        kind: 'PERMANENT_FAILURE',
        message: 'SMS transport is not configured',
        responseCode: null,
      };
    }

    if (signal?.aborted) {
      return abortedResult('Send aborted before it started');
    }

    try {
      const receipt = await this.client.sendMessage(
        {
          to: message.to,
          from: this.client.from,
          body: message.body,
        },
        signal,
      );

      if (signal?.aborted) {
        this.logger.warn(
          `SMS for job ${message.jobId} was accepted after its attempt timed out`,
        );
      }

      this.logger.log(
        `SMS sent to ${maskRecipient(message.to)} for job ${message.jobId}: ${receipt.sid}`,
      );
      return {
        kind: 'SUCCESS',
        providerMessageId: receipt.sid,
        responseCode: receipt.status,
      };
    } catch (error) {
      if (error instanceof SendAbortedError || signal?.aborted) {
        return abortedResult(
          error instanceof Error ? error.message : String(error),
        );
      }
      return classifySmsError(error);
    }
  }
}
