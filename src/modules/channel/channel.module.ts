import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CHANNEL_PROVIDERS } from '../../shared/ports/channel-provider.port';
import type { ChannelProvider } from '../../shared/ports/channel-provider.port';
import { DISPATCH_SETTINGS } from '../../shared/config/dispatch.settings';
import type { DispatchSettings } from '../../shared/config/dispatch.settings';
import { createMailTransport } from './infrastructure/mail.transport';
import { createTwilioSmsClient } from './infrastructure/twilio-sms.client';
import { EmailProvider } from './providers/email.provider';
import { SmsProvider } from './providers/sms.provider';

const DEFAULT_EMAIL_FROM = 'noreply@notifications.local';

@Module({
  providers: [
    {
      provide: CHANNEL_PROVIDERS,
      inject: [ConfigService, DISPATCH_SETTINGS],
      useFactory: (
        configService: ConfigService,
        settings: DispatchSettings,
      ): ChannelProvider[] => {
        const timeoutMs = settings.providerTimeoutMs;
        const providers = [
          new EmailProvider(
            createMailTransport(configService, timeoutMs),
            configService.get<string>('EMAIL_FROM') || DEFAULT_EMAIL_FROM,
          ),
          new SmsProvider(createTwilioSmsClient(configService, timeoutMs)),
        ];
        new Logger('ChannelModule').log(
          `Channel providers ready: ${providers.map((p) => p.channel).join(', ')}`,
        );
        return providers;
      },
    },
  ],
  exports: [CHANNEL_PROVIDERS],
})
export class ChannelModule {}
