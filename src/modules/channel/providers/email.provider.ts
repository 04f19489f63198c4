import { Logger } from '@nestjs/common';
import type {
  ChannelMessage,
  ChannelProvider,
  ProviderResult,
} from '../../../shared/ports/channel-provider.port';
import type { MailTransport } from '../infrastructure/mail.transport';
import { SendAbortedError } from '../infrastructure/send-aborted.error';
import { maskRecipient } from '../../notification/domain/notification.rules';

// Message-level rejections: resending the same envelope cannot succeed
const PERMANENT_CODES = new Set(['EENVELOPE', 'EMESSAGE']);

function readProperty(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * Map a nodemailer error onto the provider contract.
 *
 * | signal                          | kind      |
 * |---------------------------------|-----------|
 * | SMTP 5xx, EENVELOPE, EMESSAGE   | permanent |
 * | SMTP 4xx                        | retryable |
 * | connection/socket/DNS/timeout   | retryable |
 * | anything else                   | retryable |
 */
export function classifyEmailError(error: unknown): ProviderResult {
  const message = error instanceof Error ? error.message : String(error);
  const smtpCode = readProperty(error, 'responseCode');
  const code = readProperty(error, 'code');

  if (typeof smtpCode === 'number') {
    const responseCode = String(smtpCode);
    if (smtpCode >= 500) {
      return { kind: 'PERMANENT_FAILURE', message, responseCode };
    }
    return { kind: 'RETRYABLE_FAILURE', message, responseCode };
  }

  if (typeof code === 'string') {
    if (PERMANENT_CODES.has(code)) {
      return { kind: 'PERMANENT_FAILURE', message, responseCode: code };
    }
    return { kind: 'RETRYABLE_FAILURE', message, responseCode: code };
  }

  return { kind: 'RETRYABLE_FAILURE', message, responseCode: null };
}

export function abortedResult(message: string): ProviderResult {
  return { kind: 'RETRYABLE_FAILURE', message, responseCode: 'TIMEOUT' };
}

export class EmailProvider implements ChannelProvider {
  readonly channel = 'EMAIL' as const;
  private readonly logger = new Logger(EmailProvider.name);

  constructor(
    private readonly transport: MailTransport,
    private readonly from: string,
  ) {}

  async send(
    message: ChannelMessage,
    signal?: AbortSignal,
  ): Promise<ProviderResult> {
    if (signal?.aborted) {
      return abortedResult('Send aborted before it started');
    }

    try {
      const receipt = await this.transport.sendMail(
        {
          from: this.from,
          to: message.to,
          subject: message.subject,
          text: message.body,
        },
        signal,
      );

      if (signal?.aborted) {
        this.logger.warn(
          `Email for job ${message.jobId} was accepted after its attempt timed out`,
        );
      }

      if (receipt.rejected.length > 0) {
        return {
          kind: 'PERMANENT_FAILURE',
          message: `Recipient rejected: ${receipt.rejected.map(maskRecipient).join(', ')}`,
          responseCode: receipt.response,
        };
      }

      this.logger.log(
        `Email sent to ${maskRecipient(message.to)} for job ${message.jobId}: ${receipt.messageId}`,
      );
      return {
        kind: 'SUCCESS',
        providerMessageId: receipt.messageId,
        responseCode: receipt.response ?? '250',
      };
    } catch (error) {
      if (error instanceof SendAbortedError || signal?.aborted) {
        return abortedResult(
          error instanceof Error ? error.message : String(error),
        );
      }
      return classifyEmailError(error);
    }
  }
}
