import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import Mustache from 'mustache';
import { NotificationCatalogFileDto } from '../application/dto/notification-catalog.dto';
import { NotificationCatalog } from '../domain/notification-catalog';
import type { EventRoute } from '../domain/notification-catalog';
import { describeValidationErrors } from '../../../shared/validation/validation.pipe';

/**
 * Build a catalog from parsed JSON. Throws with every violation listed,
 * including template syntax errors, so a broken catalog stops startup.
 */
export function parseNotificationCatalog(raw: unknown): NotificationCatalog {
  const dto = plainToInstance(NotificationCatalogFileDto, raw);
  const errors = validateSync(dto, { whitelist: true });
  if (errors.length > 0) {
    throw new Error(
      `Invalid notification catalog: ${describeValidationErrors(errors).join('; ')}`,
    );
  }

  const routes: EventRoute[] = dto.events.map((event) => {
    const recipients: EventRoute['recipients'] = {};
    if (event.recipients.EMAIL) recipients.EMAIL = event.recipients.EMAIL;
    if (event.recipients.SMS) recipients.SMS = event.recipients.SMS;

    if (Object.keys(recipients).length === 0) {
      throw new Error(
        `Invalid notification catalog: ${event.eventType} declares no recipient key`,
      );
    }

    return {
      eventType: event.eventType,
      aliases: event.aliases ?? [],
      recipients,
      templates: event.templates.map((template) => {
        for (const source of [template.subject, template.body]) {
          try {
            Mustache.parse(source);
          } catch (error) {
            throw new Error(
              `Invalid notification catalog: template ${template.id} does not parse: ${error instanceof Error ? error.message : String(error)}`,
            );
          }
        }

        return {
          id: template.id,
          locale: template.locale,
          channel: template.channel ?? null,
          subject: template.subject,
          body: template.body,
        };
      }),
    };
  });

  return new NotificationCatalog(routes);
}

export function loadNotificationCatalog(path: string): NotificationCatalog {
  const absolutePath = isAbsolute(path) ? path : resolve(process.cwd(), path);
  const content = readFileSync(absolutePath, 'utf8');
  return parseNotificationCatalog(JSON.parse(content));
}
