import { Logger } from '@nestjs/common';
import { connect } from 'amqplib';
import type { Channel, ConsumeMessage } from 'amqplib';
import type {
  BrokerConnection,
  DeliveryDecision,
  MessageHandler,
} from '../domain/broker-connection.port';
import type { BrokerSettings } from '../../../shared/config/broker.settings';

type AmqpConnection = Awaited<ReturnType<typeof connect>>;

/**
 * Topic exchanges the upstream services publish to, with the routing keys
 * this service subscribes to.
 */
export const EVENT_BINDINGS: Readonly<Record<string, readonly string[]>> = {
  order_events: ['order.confirmed', 'order.cancelled', 'order.delivered'],
  payment_events: ['payment.succeeded', 'payment.failed', 'payment.refunded'],
  shipping_events: ['shipment.shipped', 'shipment.delivered'],
};

const CONNECT_ATTEMPTS = 3;
const RECONNECT_BASE_MS = 5000;
const RECONNECT_MAX_MS = 60_000;

/**
 * RabbitMQ subscription over amqplib.
 *
 * Declares the queue and its bindings, consumes with manual acks and
 * reconnects with exponential backoff when the connection drops. After a
 * reconnect the consumer is restored if it was active.
 */
export class AmqpBrokerConnection implements BrokerConnection {
  private readonly logger = new Logger(AmqpBrokerConnection.name);
  private connection: AmqpConnection | null = null;
  private channel: Channel | null = null;
  private consumerTag: string | null = null;
  private handler: MessageHandler | null = null;
  private wantsToConsume = false;
  private closing = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly settings: BrokerSettings) {}

  /**
   * @throws the last connection error once every attempt has failed
   */
  async connect(): Promise<void> {
    let delay = RECONNECT_BASE_MS;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.open();
        return;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        if (attempt >= CONNECT_ATTEMPTS) {
          this.logger.error(
            `Cannot connect to RabbitMQ after ${attempt} attempts: ${reason}`,
          );
          throw error;
        }
        this.logger.warn(
          `RabbitMQ connection attempt ${attempt}/${CONNECT_ATTEMPTS} failed (${reason}), retrying in ${delay / 1000}s`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
        delay *= 2;
      }
    }
  }

  async consume(handler: MessageHandler): Promise<void> {
    this.handler = handler;
    this.wantsToConsume = true;
    await this.startConsumer();
  }

  async stopConsuming(): Promise<void> {
    this.wantsToConsume = false;
    const { channel, consumerTag } = this;
    this.consumerTag = null;

    if (channel && consumerTag) {
      await channel.cancel(consumerTag);
      this.logger.log(`Stopped consuming from ${this.settings.queue}`);
    }
  }

  async waitForInFlight(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    const connection = this.connection;
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;

    if (connection) {
      await connection.close();
      this.logger.log('RabbitMQ connection closed');
    }
  }

  // ============ CONNECTION ============

  private async open(): Promise<void> {
    this.logger.log(`Connecting to RabbitMQ at ${redactUrl(this.settings.url)}`);
    const connection = await connect(this.settings.url);

    connection.on('error', (error: Error) => {
      this.logger.error(`RabbitMQ connection error: ${error.message}`);
    });
    connection.on('close', () => this.handleConnectionLost());

    const channel = await connection.createChannel();
    await channel.prefetch(this.settings.prefetch);
    await channel.assertQueue(this.settings.queue, { durable: true });

    for (const [exchange, routingKeys] of Object.entries(EVENT_BINDINGS)) {
      await channel.assertExchange(exchange, 'topic', { durable: true });
      for (const routingKey of routingKeys) {
        await channel.bindQueue(this.settings.queue, exchange, routingKey);
      }
    }

    this.connection = connection;
    this.channel = channel;
    this.logger.log(
      `RabbitMQ ready: queue ${this.settings.queue} bound to ${Object.keys(EVENT_BINDINGS).join(', ')} (prefetch ${this.settings.prefetch})`,
    );
  }

  private handleConnectionLost(): void {
    this.channel = null;
    this.connection = null;
    this.consumerTag = null;

    if (this.closing) {
      return;
    }
    this.logger.warn('RabbitMQ connection lost, reconnecting...');
    this.scheduleReconnect(RECONNECT_BASE_MS);
  }

  private scheduleReconnect(delay: number): void {
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open()
        .then(() => this.startConsumer())
        .catch((error: unknown) => {
          const next = Math.min(delay * 2, RECONNECT_MAX_MS);
          this.logger.error(
            `RabbitMQ reconnect failed: ${error instanceof Error ? error.message : error}. Next try in ${next / 1000}s`,
          );
          this.scheduleReconnect(next);
        });
    }, delay);
  }

  // ============ CONSUMING ============

  private async startConsumer(): Promise<void> {
    const { channel, handler } = this;
    if (!channel || !handler || !this.wantsToConsume || this.consumerTag) {
      return;
    }

    const reply = await channel.consume(
      this.settings.queue,
      (message) => this.track(this.dispatch(channel, handler, message)),
      { noAck: false },
    );
    this.consumerTag = reply.consumerTag;
    this.logger.log(`Consuming from ${this.settings.queue}`);
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  private async dispatch(
    channel: Channel,
    handler: MessageHandler,
    message: ConsumeMessage | null,
  ): Promise<void> {
    if (!message) {
      this.logger.warn(`Consumer on ${this.settings.queue} cancelled by the broker`);
      this.consumerTag = null;
      return;
    }

    let decision: DeliveryDecision;
    try {
      const messageId: unknown = message.properties.messageId;
      decision = await handler({
        content: message.content,
        messageId: typeof messageId === 'string' && messageId ? messageId : null,
        routingKey: message.fields.routingKey,
        redelivered: message.fields.redelivered,
      });
    } catch (error) {
      this.logger.error(
        `Message handler threw: ${error instanceof Error ? error.message : error}`,
      );
      decision = 'REQUEUE';
    }

    try {
      if (decision === 'ACK') {
        channel.ack(message);
      } else {
        channel.nack(message, false, decision === 'REQUEUE');
      }
    } catch (error) {
      // Channel gone: the broker redelivers unacked messages on its own
      this.logger.warn(
        `Could not settle message (${decision}): ${error instanceof Error ? error.message : error}`,
      );
    }
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/([^:@/]+):([^@/]+)@/, '//$1:***@');
}
