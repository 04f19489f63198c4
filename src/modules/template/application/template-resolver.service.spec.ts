import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'path';
import {
  TemplateResolverService,
  requiredVariables,
} from './template-resolver.service';
import {
  loadNotificationCatalog,
  parseNotificationCatalog,
} from '../infrastructure/catalog.loader';
import {
  MissingVariableError,
  TemplateNotFoundError,
} from '../../../shared/domain/errors';
import { DEFAULT_DISPATCH_SETTINGS } from '../../../shared/config/dispatch.settings';

const catalog = parseNotificationCatalog({
  events: [
    {
      eventType: 'order.confirmed',
      aliases: ['order_confirmed'],
      recipients: { EMAIL: 'customer_email', SMS: 'customer_phone' },
      templates: [
        {
          id: 'en-any',
          locale: 'en',
          subject: 'Order {{order_id}}',
          body: 'Hi {{name}}',
        },
        {
          id: 'en-sms',
          locale: 'en',
          channel: 'SMS',
          subject: '',
          body: 'Order {{order_id}} confirmed',
        },
        {
          id: 'pt-email',
          locale: 'pt',
          channel: 'EMAIL',
          subject: 'Pedido {{order_id}}',
          body: 'Olá {{name}}',
        },
        {
          id: 'pt-br-any',
          locale: 'pt-BR',
          subject: 'Pedido {{order_id}}',
          body: 'Oi {{name}}',
        },
      ],
    },
  ],
});

describe('TemplateResolverService', () => {
  let resolver: TemplateResolverService;

  beforeEach(() => {
    resolver = new TemplateResolverService(catalog, DEFAULT_DISPATCH_SETTINGS);
  });

  describe('resolve', () => {
    it('should prefer an exact locale and channel match', () => {
      expect(resolver.resolve('order.confirmed', 'en', 'SMS').id).toBe('en-sms');
    });

    it('should take a channel-agnostic template for the exact locale before falling back by language', () => {
      expect(resolver.resolve('order.confirmed', 'pt-BR', 'EMAIL').id).toBe(
        'pt-br-any',
      );
    });

    it('should fall back from region to language', () => {
      expect(resolver.resolve('order.confirmed', 'pt_PT', 'EMAIL').id).toBe(
        'pt-email',
      );
    });

    it('should fall back to the default locale', () => {
      expect(resolver.resolve('order.confirmed', 'fr', 'EMAIL').id).toBe(
        'en-any',
      );
    });

    it('should resolve aliases to the same route', () => {
      expect(resolver.resolve('order_confirmed', 'en', 'SMS').id).toBe(
        'en-sms',
      );
    });

    it('should throw TemplateNotFoundError for unknown event types', () => {
      expect(() => resolver.resolve('order.lost', 'en', 'EMAIL')).toThrow(
        TemplateNotFoundError,
      );
    });

    it('should throw TemplateNotFoundError when no locale in the chain matches', () => {
      const strict = new TemplateResolverService(catalog, {
        ...DEFAULT_DISPATCH_SETTINGS,
        defaultLocale: 'de',
      });

      expect(() => strict.resolve('order.confirmed', 'fr', 'EMAIL')).toThrow(
        'No template for event type "order.confirmed" (locale: fr)',
      );
    });
  });

  describe('render', () => {
    it('should interpolate without HTML escaping', () => {
      const template = resolver.resolve('order.confirmed', 'en', 'EMAIL');

      expect(
        resolver.render(template, { order_id: 'A&B', name: '<Asha>' }),
      ).toEqual({ subject: 'Order A&B', body: 'Hi <Asha>' });
    });

    it('should report every missing or empty required variable', () => {
      const template = resolver.resolve('order.confirmed', 'en', 'EMAIL');

      try {
        resolver.render(template, { name: '' });
        expect.unreachable('render should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(MissingVariableError);
        if (error instanceof MissingVariableError) {
          expect(error.templateId).toBe('en-any');
          expect(error.missing).toEqual(['order_id', 'name']);
        }
      }
    });

    it('should treat variables inside sections as optional', () => {
      const template = {
        id: 'optional',
        locale: 'en',
        channel: null,
        subject: 'Track',
        body: 'Track: {{#url}}{{url}}{{/url}}{{^url}}N/A{{/url}}',
      };

      expect(resolver.render(template, {}).body).toBe('Track: N/A');
      expect(resolver.render(template, { url: 'https://t.example/1' }).body).toBe(
        'Track: https://t.example/1',
      );
    });
  });

  it('should list only top-level variables as required', () => {
    expect(
      requiredVariables('{{a}} {{{b}}} {{&c}} {{#d}}{{e}}{{/d}}'),
    ).toEqual(['a', 'b', 'c']);
  });

  it('should render the shipped catalog templates verbatim', () => {
    const shipped = loadNotificationCatalog(
      join(__dirname, '../../../../templates/notification-catalog.json'),
    );
    const shippedResolver = new TemplateResolverService(
      shipped,
      DEFAULT_DISPATCH_SETTINGS,
    );

    const sms = shippedResolver.resolve('shipment.shipped', 'en', 'SMS');
    expect(
      shippedResolver.render(sms, {
        order_id: 'ORD-7',
        carrier: 'BlueDart',
        tracking_no: 'BD123',
      }),
    ).toEqual({
      subject: '',
      body: 'Your order #ORD-7 has been shipped via BlueDart. Track: BD123',
    });
    expect(shipped.findRoute('order_shipped')?.eventType).toBe(
      'shipment.shipped',
    );
  });
});

describe('parseNotificationCatalog', () => {
  it('should reject a catalog with invalid entries', () => {
    expect(() =>
      parseNotificationCatalog({
        events: [
          {
            eventType: 'order.confirmed',
            recipients: { EMAIL: 'customer_email' },
            templates: [{ id: 't', locale: 'en', channel: 'FAX', subject: '', body: 'x' }],
          },
        ],
      }),
    ).toThrow('Invalid notification catalog: events.0.templates.0.channel');
  });

  it('should reject templates that do not parse', () => {
    expect(() =>
      parseNotificationCatalog({
        events: [
          {
            eventType: 'order.confirmed',
            recipients: { EMAIL: 'customer_email' },
            templates: [{ id: 'broken', locale: 'en', subject: '', body: '{{#a}}x' }],
          },
        ],
      }),
    ).toThrow('template broken does not parse');
  });

  it('should reject duplicate event types', () => {
    const event = {
      eventType: 'order.confirmed',
      recipients: { EMAIL: 'customer_email' },
      templates: [{ id: 't', locale: 'en', subject: '', body: 'x' }],
    };

    expect(() => parseNotificationCatalog({ events: [event, event] })).toThrow(
      'Event type "order.confirmed" is declared more than once',
    );
  });
});
