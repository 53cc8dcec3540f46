/**
 * Consumer Types
 * The handler contract and the delivery source a Consumer runs against.
 */

export type AcknowledgementType = 'ack' | 'nack' | 'reject';

export interface HandlerAcknowledgement {
  acknowledgement: AcknowledgementType;
  requeue: boolean;
}

export interface Handler {
  readonly queueName: string;
  readonly consumerTag: string;
  readonly autoAck: boolean;
  readonly exclusive: boolean;
  readonly mustStopOnAckError: boolean;
  readonly mustStopOnNackError: boolean;
  readonly mustStopOnRejectError: boolean;
  /** Let deliveries already handed out finish before the source is closed */
  readonly waitToConsumeInflight: boolean;
  receiveMessage(signal: AbortSignal, payload: Buffer): Promise<HandlerAcknowledgement>;
}

export interface Delivery {
  deliveryTag: number;
  body: Buffer;
  ack(): Promise<void>;
  nack(requeue: boolean): Promise<void>;
  reject(requeue: boolean): Promise<void>;
}

export interface ConsumeOptions {
  autoAck: boolean;
  exclusive: boolean;
}

/**
 * Anything that can hand out deliveries for a queue: a broker channel, an
 * in-memory queue, a test double.
 */
export interface DeliverySource {
  consume(queue: string, consumerTag: string, options: ConsumeOptions): AsyncIterable<Delivery>;
  /** Stop handing out new deliveries for this consumer */
  cancel(consumerTag: string): Promise<void>;
  close(): Promise<void>;
}

export interface ConsumerConfig {
  verbose?: boolean;
}
