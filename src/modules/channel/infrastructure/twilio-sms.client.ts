import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import twilio from 'twilio';
import { SendAbortedError } from './send-aborted.error';

export interface OutgoingSms {
  to: string;
  from: string;
  body: string;
}

export interface SmsReceipt {
  sid: string;
  status: string;
}

export interface SmsClient {
  readonly from: string;
  /** Rejects without sending when the signal is already aborted */
  sendMessage(sms: OutgoingSms, signal?: AbortSignal): Promise<SmsReceipt>;
}

class TwilioSmsClient implements SmsClient {
  private readonly client: ReturnType<typeof twilio>;

  constructor(
    accountSid: string,
    authToken: string,
    readonly from: string,
    timeoutMs: number,
  ) {
    this.client = twilio(accountSid, authToken, { timeout: timeoutMs });
  }

  async sendMessage(
    sms: OutgoingSms,
    signal?: AbortSignal,
  ): Promise<SmsReceipt> {
    if (signal?.aborted) {
      throw new SendAbortedError();
    }
    const message = await this.client.messages.create(sms);
    return { sid: message.sid, status: message.status };
  }
}

/**
 * @param timeoutMs HTTP timeout of the Twilio REST client
 * @returns null when Twilio credentials are incomplete
 */
export function createTwilioSmsClient(
  config: ConfigService,
  timeoutMs: number,
): SmsClient | null {
  const accountSid = config.get<string>('TWILIO_ACCOUNT_SID');
  const authToken = config.get<string>('TWILIO_AUTH_TOKEN');
  const from = config.get<string>('TWILIO_FROM');

  if (!accountSid || !authToken || !from) {
    new Logger('TwilioSmsClient').warn(
      'Twilio credentials not configured, SMS sends will fail permanently',
    );
    return null;
  }

  return new TwilioSmsClient(accountSid, authToken, from, timeoutMs);
}
