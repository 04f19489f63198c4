import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import { SendAbortedError } from './send-aborted.error';

export interface OutgoingMail {
  from: string;
  to: string;
  subject: string;
  text: string;
}

export interface MailReceipt {
  messageId: string;
  /** Addresses the server refused */
  rejected: string[];
  response: string | null;
}

export interface MailTransport {
  readonly kind: 'smtp' | 'json';
  /** Rejects without sending when the signal is already aborted */
  sendMail(mail: OutgoingMail, signal?: AbortSignal): Promise<MailReceipt>;
}


class NodemailerMailTransport implements MailTransport {
  constructor(
    readonly kind: 'smtp' | 'json',
    private readonly transporter: nodemailer.Transporter,
  ) {}

  async sendMail(
    mail: OutgoingMail,
    signal?: AbortSignal,
  ): Promise<MailReceipt> {
    // An SMTP session cannot be cancelled once started; the socket limits
    // set in createMailTransport end a stalled one
    if (signal?.aborted) {
      throw new SendAbortedError();
    }

    const info = await this.transporter.sendMail(mail);
    const rejected: unknown[] = Array.isArray(info.rejected) ? info.rejected : [];

    return {
      messageId: String(info.messageId),
      rejected: rejected.map((address) => String(address)),
      response: typeof info.response === 'string' ? info.response : null,
    };
  }
}

/**
 * SMTP settings from EMAIL_HOST/PORT/USER/PASSWORD, or null when any is
 * missing. Connection, greeting and socket limits are all `timeoutMs`, so a
 * stalled server fails the send within the dispatch timeout.
 */
export function smtpTransportOptions(
  config: ConfigService,
  timeoutMs: number,
): SMTPTransport.Options | null {
  const host = config.get<string>('EMAIL_HOST');
  const port = parseInt(config.get<string>('EMAIL_PORT') ?? '587', 10);
  const user = config.get<string>('EMAIL_USER');
  const password = config.get<string>('EMAIL_PASSWORD');

  if (!host || !user || !password) {
    return null;
  }

  return {
    host,
    port,
    secure: port === 465, // true for 465, false for other ports
    auth: { user, pass: password },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  };
}

/**
 * SMTP when configured; otherwise a JSON transport that only serialises
 * the message, for local runs.
 */
export function createMailTransport(
  config: ConfigService,
  timeoutMs: number,
): MailTransport {
  const logger = new Logger('MailTransport');
  const smtp = smtpTransportOptions(config, timeoutMs);

  if (smtp) {
    logger.log(`Using SMTP transport ${smtp.host}:${smtp.port}`);
    return new NodemailerMailTransport(
      'smtp',
      nodemailer.createTransport(smtp),
    );
  }

  logger.warn('SMTP is not configured, emails will be logged only');
  return new NodemailerMailTransport(
    'json',
    nodemailer.createTransport({ jsonTransport: true }),
  );
}
