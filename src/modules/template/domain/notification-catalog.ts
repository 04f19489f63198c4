import type { Channel } from '../../../shared/ports/channel-provider.port';

export interface TemplateDefinition {
  id: string;
  locale: string;
  /** null = usable for any channel */
  channel: Channel | null;
  subject: string;
  body: string;
}

/**
 * How one event type fans out: which payload key holds the recipient for
 * each channel, and which templates render it.
 */
export interface EventRoute {
  eventType: string;
  aliases: string[];
  recipients: Partial<Record<Channel, string>>;
  templates: TemplateDefinition[];
}

/**
 * Read-only registry of known event types, keyed by type and alias.
 */
export class NotificationCatalog {
  private readonly byType = new Map<string, EventRoute>();

  constructor(readonly routes: readonly EventRoute[]) {
    for (const route of routes) {
      for (const name of [route.eventType, ...route.aliases]) {
        if (this.byType.has(name)) {
          throw new Error(`Event type "${name}" is declared more than once`);
        }
        this.byType.set(name, route);
      }
    }
  }

  findRoute(eventType: string): EventRoute | null {
    return this.byType.get(eventType) ?? null;
  }

  /**
   * The primary name of a known type or alias; unknown names pass through.
   */
  canonicalName(eventType: string): string {
    return this.findRoute(eventType)?.eventType ?? eventType;
  }

  isKnown(eventType: string): boolean {
    return this.byType.has(eventType);
  }

  get eventTypes(): string[] {
    return [...this.byType.keys()];
  }
}

export const NOTIFICATION_CATALOG = Symbol('NOTIFICATION_CATALOG');
