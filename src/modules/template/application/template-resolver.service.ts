import { Inject, Injectable } from '@nestjs/common';
import Mustache from 'mustache';
import {
  MissingVariableError,
  TemplateNotFoundError,
} from '../../../shared/domain/errors';
import type { Channel } from '../../../shared/ports/channel-provider.port';
import { NOTIFICATION_CATALOG } from '../domain/notification-catalog';
import type {
  NotificationCatalog,
  TemplateDefinition,
} from '../domain/notification-catalog';
import { DISPATCH_SETTINGS } from '../../../shared/config/dispatch.settings';
import type { DispatchSettings } from '../../../shared/config/dispatch.settings';

export interface RenderedMessage {
  subject: string;
  body: string;
}

// Token types whose value is interpolated at the top level
const VARIABLE_TOKENS = new Set(['name', '&', '{']);

function languageOf(locale: string): string {
  return locale.split(/[-_]/)[0];
}

/**
 * Names of the variables a template cannot render without.
 * Variables nested in sections are conditional, so they are optional.
 */
export function requiredVariables(source: string): string[] {
  return Mustache.parse(source)
    .filter((token) => VARIABLE_TOKENS.has(token[0]))
    .map((token) => token[1]);
}

/**
 * Template Resolver
 *
 * Resolution order, first match wins:
 * (locale, channel), (locale, any), (language, channel), (language, any),
 * (default, channel), (default, any).
 */
@Injectable()
export class TemplateResolverService {
  constructor(
    @Inject(NOTIFICATION_CATALOG)
    private readonly catalog: NotificationCatalog,
    @Inject(DISPATCH_SETTINGS)
    private readonly settings: DispatchSettings,
  ) {}

  /**
   * @throws TemplateNotFoundError
   */
  resolve(
    eventType: string,
    locale: string,
    channel: Channel | null = null,
  ): TemplateDefinition {
    const route = this.catalog.findRoute(eventType);
    if (!route) {
      throw new TemplateNotFoundError(eventType, locale);
    }

    const locales = [
      ...new Set(
        [locale, languageOf(locale), this.settings.defaultLocale].map((l) =>
          l.toLowerCase(),
        ),
      ),
    ];
    const channels: (Channel | null)[] = channel ? [channel, null] : [null];

    for (const candidateLocale of locales) {
      for (const candidateChannel of channels) {
        const match = route.templates.find(
          (template) =>
            template.locale.toLowerCase() === candidateLocale &&
            template.channel === candidateChannel,
        );
        if (match) {
          return match;
        }
      }
    }

    throw new TemplateNotFoundError(eventType, locale);
  }

  /**
   * Plain-text output: values are inserted verbatim, never HTML-escaped.
   * @throws MissingVariableError when a required variable is absent or empty
   */
  render(
    template: TemplateDefinition,
    payload: Record<string, string>,
  ): RenderedMessage {
    const required = new Set([
      ...requiredVariables(template.subject),
      ...requiredVariables(template.body),
    ]);
    const missing = [...required].filter(
      (name) => payload[name] === undefined || payload[name] === '',
    );
    if (missing.length > 0) {
      throw new MissingVariableError(template.id, missing);
    }

    const options = { escape: (value: unknown) => String(value) };
    return {
      subject: Mustache.render(template.subject, payload, {}, options),
      body: Mustache.render(template.body, payload, {}, options),
    };
  }
}
