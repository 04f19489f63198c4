import { describe, it, expect } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { createMailTransport, smtpTransportOptions } from './mail.transport';
import { SendAbortedError } from './send-aborted.error';

const smtpConfig = {
  EMAIL_HOST: 'smtp.test.local',
  EMAIL_PORT: '465',
  EMAIL_USER: 'mailer',
  EMAIL_PASSWORD: 'test-secret',
};

const mail = {
  from: 'noreply@test.local',
  to: 'a@x.com',
  subject: 'Order shipped',
  text: 'Your order is on its way',
};

describe('smtpTransportOptions', () => {
  it('should bound every SMTP phase by the dispatch timeout', () => {
    expect(smtpTransportOptions(new ConfigService(smtpConfig), 15_000)).toEqual(
      {
        host: 'smtp.test.local',
        port: 465,
        secure: true,
        auth: { user: 'mailer', pass: 'test-secret' },
        connectionTimeout: 15_000,
        greetingTimeout: 15_000,
        socketTimeout: 15_000,
      },
    );
  });

  it('should return null when credentials are missing', () => {
    expect(
      smtpTransportOptions(
        new ConfigService({ EMAIL_HOST: 'smtp.test.local' }),
        15_000,
      ),
    ).toBeNull();
  });
});

describe('createMailTransport', () => {
  it('should fall back to the JSON transport without SMTP settings', async () => {
    const transport = createMailTransport(new ConfigService({}), 1000);

    const receipt = await transport.sendMail(mail);

    expect(transport.kind).toBe('json');
    expect(receipt.rejected).toEqual([]);
    expect(receipt.response).toBeNull();
  });

  it('should refuse to start a send whose signal is already aborted', async () => {
    const transport = createMailTransport(new ConfigService({}), 1000);
    const controller = new AbortController();
    controller.abort();

    await expect(
      transport.sendMail(mail, controller.signal),
    ).rejects.toBeInstanceOf(SendAbortedError);
  });
});
