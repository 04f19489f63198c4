export const BROKER_CONNECTION = Symbol('BROKER_CONNECTION');

export interface BrokerMessage {
  content: Buffer;
  /** AMQP `message_id` property, when the producer set one */
  messageId: string | null;
  routingKey: string;
  redelivered: boolean;
}

/**
 * ACK: done. REJECT: drop (or dead-letter). REQUEUE: hand back for redelivery.
 */
export type DeliveryDecision = 'ACK' | 'REJECT' | 'REQUEUE';

export type MessageHandler = (message: BrokerMessage) => Promise<DeliveryDecision>;

/**
 * Port for the inbound event subscription.
 * A message is settled only after its handler resolves.
 */
export interface BrokerConnection {
  consume(handler: MessageHandler): Promise<void>;
  stopConsuming(): Promise<void>;
  /** Resolves once every delivered message has been settled */
  waitForInFlight(): Promise<void>;
  isConnected(): boolean;
  close(): Promise<void>;
}
