import { Module } from '@nestjs/common';
import { TemplateResolverService } from './application/template-resolver.service';
import { NOTIFICATION_CATALOG } from './domain/notification-catalog';
import { loadNotificationCatalog } from './infrastructure/catalog.loader';
import { DISPATCH_SETTINGS } from '../../shared/config/dispatch.settings';
import type { DispatchSettings } from '../../shared/config/dispatch.settings';

@Module({
  providers: [
    // Catalog is read and validated once at startup
    {
      provide: NOTIFICATION_CATALOG,
      inject: [DISPATCH_SETTINGS],
      useFactory: (settings: DispatchSettings) =>
        loadNotificationCatalog(settings.catalogPath),
    },
    TemplateResolverService,
  ],
  exports: [NOTIFICATION_CATALOG, TemplateResolverService],
})
export class TemplateModule {}
