import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DISPATCH_SETTINGS, loadDispatchSettings } from './dispatch.settings';

@Global()
@Module({
  providers: [
    {
      provide: DISPATCH_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadDispatchSettings(configService),
    },
  ],
  exports: [DISPATCH_SETTINGS],
})
export class SettingsModule {}
