import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { EventConsumerService } from './event-consumer.service';
import { BROKER_CONNECTION } from '../domain/broker-connection.port';
import { DispatchEngineService } from '../../notification/application/dispatch-engine.service';
import { NOTIFICATION_JOB_REPOSITORY } from '../../notification/domain/notification-job.repository';
import { FakeBrokerConnection } from '../../../shared/testing/fake-broker-connection';
import { InMemoryNotificationJobRepository } from '../../../shared/testing/in-memory-notification-job.repository';
import {
  InvalidEventError,
  StoreUnavailableError,
  UnknownEventTypeError,
} from '../../../shared/domain/errors';

const mockEngine = {
  submitEvent: vi.fn(),
};

const accepted = [
  {
    jobId: 'job-1',
    disposition: 'ACCEPTED',
    state: 'PENDING',
    dedupKey: 'key-1',
  },
];

describe('EventConsumerService', () => {
  let consumer: EventConsumerService;
  let broker: FakeBrokerConnection;
  let jobs: InMemoryNotificationJobRepository;

  beforeEach(async () => {
    vi.clearAllMocks();
    broker = new FakeBrokerConnection();
    jobs = new InMemoryNotificationJobRepository();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        EventConsumerService,
        { provide: BROKER_CONNECTION, useValue: broker },
        { provide: DispatchEngineService, useValue: mockEngine },
        { provide: NOTIFICATION_JOB_REPOSITORY, useValue: jobs },
      ],
    }).compile();

    consumer = module.get<EventConsumerService>(EventConsumerService);
    await consumer.onApplicationBootstrap();
  });

  afterEach(async () => {
    await consumer.onModuleDestroy();
  });

  describe('acknowledged messages', () => {
    it('should ack once the event is submitted', async () => {
      mockEngine.submitEvent.mockResolvedValue(accepted);

      const decision = await broker.deliver({
        event_type: 'shipment.shipped',
        event_id: 'e1',
        payload: { order_id: 1042, customer_email: 'maria@example.com' },
        source: 'shipping-service',
      });

      expect(decision).toBe('ACK');
      expect(mockEngine.submitEvent).toHaveBeenCalledWith({
        eventId: 'e1',
        eventType: 'shipment.shipped',
        payload: { order_id: '1042', customer_email: 'maria@example.com' },
        occurredAt: null,
        locale: undefined,
      });
    });

    it('should accept `data` and fall back to the AMQP message id', async () => {
      mockEngine.submitEvent.mockResolvedValue(accepted);

      const decision = await broker.deliver(
        {
          event_type: 'order.confirmed',
          data: { order_id: 'ORD-1' },
          occurred_at: '2026-03-02T10:00:00.000Z',
          locale: 'es',
        },
        { messageId: 'msg-7', routingKey: 'order.confirmed' },
      );

      expect(decision).toBe('ACK');
      expect(mockEngine.submitEvent).toHaveBeenCalledWith({
        eventId: 'msg-7',
        eventType: 'order.confirmed',
        payload: { order_id: 'ORD-1' },
        occurredAt: new Date('2026-03-02T10:00:00.000Z'),
        locale: 'es',
      });
    });

    it('should ack an event that names no recipient', async () => {
      mockEngine.submitEvent.mockResolvedValue([]);

      const decision = await broker.deliver({
        event_type: 'order.confirmed',
        event_id: 'e2',
        payload: {},
      });

      expect(decision).toBe('ACK');
    });
  });

  describe('rejected messages', () => {
    it('should reject a body that is not JSON', async () => {
      expect(await broker.deliver('{not json')).toBe('REJECT');
      expect(mockEngine.submitEvent).not.toHaveBeenCalled();
    });

    it('should reject a message without event_type', async () => {
      expect(
        await broker.deliver({ event_id: 'e1', payload: { order_id: 'ORD-1' } }),
      ).toBe('REJECT');
      expect(mockEngine.submitEvent).not.toHaveBeenCalled();
    });

    it('should reject a message without any event id', async () => {
      expect(
        await broker.deliver({ event_type: 'order.confirmed', payload: {} }),
      ).toBe('REJECT');
      expect(mockEngine.submitEvent).not.toHaveBeenCalled();
    });

    it('should reject a payload that is not an object', async () => {
      expect(
        await broker.deliver({
          event_type: 'order.confirmed',
          event_id: 'e1',
          payload: 'ORD-1',
        }),
      ).toBe('REJECT');
    });

    it('should reject unknown event types', async () => {
      mockEngine.submitEvent.mockRejectedValue(
        new UnknownEventTypeError('inventory.restocked'),
      );

      expect(
        await broker.deliver({
          event_type: 'inventory.restocked',
          event_id: 'e1',
          payload: {},
        }),
      ).toBe('REJECT');
    });

    it('should reject events whose recipients are all invalid', async () => {
      mockEngine.submitEvent.mockRejectedValue(
        new InvalidEventError(['recipient must be an email address']),
      );

      expect(
        await broker.deliver({
          event_type: 'order.confirmed',
          event_id: 'e1',
          payload: { customer_email: 'nobody' },
        }),
      ).toBe('REJECT');
    });
  });

  describe('requeued messages', () => {
    it('should requeue and pause while the store is unavailable', async () => {
      mockEngine.submitEvent.mockRejectedValue(
        new StoreUnavailableError('jobs.create', new Error('ECONNREFUSED')),
      );

      const decision = await broker.deliver({
        event_type: 'order.confirmed',
        event_id: 'e1',
        payload: {},
      });

      expect(decision).toBe('REQUEUE');
      expect(consumer.isPaused()).toBe(true);
      expect(broker.consuming).toBe(false);
    });

    it('should resume only once the store answers again', async () => {
      mockEngine.submitEvent.mockRejectedValue(
        new StoreUnavailableError('jobs.create', new Error('ECONNREFUSED')),
      );
      await broker.deliver({
        event_type: 'order.confirmed',
        event_id: 'e1',
        payload: {},
      });

      jobs.available = false;
      expect(await consumer.tryResume()).toBe(false);
      expect(consumer.isPaused()).toBe(true);

      jobs.available = true;
      expect(await consumer.tryResume()).toBe(true);
      expect(consumer.isPaused()).toBe(false);
      expect(broker.consuming).toBe(true);
    });

    it('should requeue on an unexpected error without pausing', async () => {
      mockEngine.submitEvent.mockRejectedValue(new Error('boom'));

      const decision = await broker.deliver({
        event_type: 'order.confirmed',
        event_id: 'e1',
        payload: {},
      });

      expect(decision).toBe('REQUEUE');
      expect(consumer.isPaused()).toBe(false);
      expect(broker.consuming).toBe(true);
    });
  });

  it('should stop consuming on module destroy', async () => {
    await consumer.onModuleDestroy();

    expect(broker.consuming).toBe(false);
  });
});
