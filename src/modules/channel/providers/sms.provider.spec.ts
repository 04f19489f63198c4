import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SmsProvider, classifySmsError } from './sms.provider';
import type { SmsClient } from '../infrastructure/twilio-sms.client';
import { SendAbortedError } from '../infrastructure/send-aborted.error';

function twilioError(
  message: string,
  props: Record<string, unknown>,
): Error {
  return Object.assign(new Error(message), props);
}

const message = {
  jobId: 'job-1',
  to: '+15550001234',
  subject: '',
  body: 'Your order #ORD-1 has been shipped',
};

describe('classifySmsError', () => {
  it.each([
    [{ status: 400, code: 21211 }, 'PERMANENT_FAILURE', '21211'],
    [{ status: 400, code: 21614 }, 'PERMANENT_FAILURE', '21614'],
    [{ status: 400, code: 21610 }, 'PERMANENT_FAILURE', '21610'],
    [{ status: 401, code: 20003 }, 'PERMANENT_FAILURE', '20003'],
    [{ status: 429, code: 20429 }, 'RETRYABLE_FAILURE', '20429'],
    [{ status: 503 }, 'RETRYABLE_FAILURE', '503'],
    [{ code: 'ECONNRESET' }, 'RETRYABLE_FAILURE', 'ECONNRESET'],
  ])('should classify %o as %s', (props, kind, responseCode) => {
    expect(classifySmsError(twilioError('twilio failed', props))).toEqual({
      kind,
      message: 'twilio failed',
      responseCode,
    });
  });
});

describe('SmsProvider', () => {
  let client: { from: string; sendMessage: ReturnType<typeof vi.fn> };
  let provider: SmsProvider;

  beforeEach(() => {
    client = { from: '+15550009999', sendMessage: vi.fn() };
    const smsClient: SmsClient = client;
    provider = new SmsProvider(smsClient);
  });

  it('should send from the configured number and report the sid', async () => {
    client.sendMessage.mockResolvedValue({ sid: 'SM123', status: 'queued' });

    const result = await provider.send(message);

    expect(client.sendMessage).toHaveBeenCalledWith(
      {
        to: '+15550001234',
        from: '+15550009999',
        body: 'Your order #ORD-1 has been shipped',
      },
      undefined,
    );
    expect(result).toEqual({
      kind: 'SUCCESS',
      providerMessageId: 'SM123',
      responseCode: 'queued',
    });
  });

  it('should classify an invalid number as permanent', async () => {
    client.sendMessage.mockRejectedValue(
      twilioError("The 'To' number is not a valid phone number.", {
        status: 400,
        code: 21211,
      }),
    );

    const result = await provider.send(message);

    expect(result.kind).toBe('PERMANENT_FAILURE');
    expect(client.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('should fail permanently without a configured client', async () => {
    const unconfigured = new SmsProvider(null);

    expect(await unconfigured.send(message)).toEqual({
      kind: 'PERMANENT_FAILURE',
      message: 'SMS transport is not configured',
      responseCode: null,
    });
  });

  it('should report an aborted send as a retryable timeout', async () => {
    const controller = new AbortController();
    client.sendMessage.mockImplementation(async () => {
      controller.abort();
      throw new SendAbortedError();
    });

    expect(await provider.send(message, controller.signal)).toEqual({
      kind: 'RETRYABLE_FAILURE',
      message: 'Send aborted by the dispatch timeout',
      responseCode: 'TIMEOUT',
    });
  });
});
