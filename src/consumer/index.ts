/**
 * Consumer
 * Exports the handler-driven consumer and its contracts
 */

export { Consumer, ConsumerError } from './consumer.js';
export type {
  AcknowledgementType,
  HandlerAcknowledgement,
  Handler,
  Delivery,
  ConsumeOptions,
  DeliverySource,
  ConsumerConfig,
} from './types.js';
