/**
 * Consumer
 * Feeds deliveries from a DeliverySource through a Handler, settling each one
 * according to the handler's answer, until the run signal aborts.
 */

import { TaskGroup, toWaitError } from '../group/index.js';
import type { GroupMessage } from '../group/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type {
  ConsumerConfig,
  Delivery,
  DeliverySource,
  Handler,
  HandlerAcknowledgement,
} from './types.js';

export class ConsumerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConsumerError';
  }
}

export class Consumer {
  private readonly source: DeliverySource;
  private readonly handler: Handler;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  private closed = false;

  constructor(source: DeliverySource, handler: Handler, config: ConsumerConfig = {}) {
    this.source = source;
    this.handler = handler;
    this.verbose = config.verbose ?? false;
    this.logger = createLogger(`Consumer:${handler.consumerTag}`, this.verbose);
  }

  /**
   * Consume until the delivery stream ends or a failure stops it. Aborting
   * `signal` shuts the consumer down; the source is closed before returning.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw toWaitError(signal);
    }
    this.closed = false;

    const deliveries = this.source.consume(this.handler.queueName, this.handler.consumerTag, {
      autoAck: this.handler.autoAck,
      exclusive: this.handler.exclusive,
    });
    const group = new TaskGroup({ name: `consumer:${this.handler.consumerTag}`, verbose: this.verbose });
    group.on('group-message', (message: GroupMessage) => {
      if (message.type === 'task-error') {
        void this.closeAfterFailure();
      }
    });

    group.go(
      async () => {
        await this.handleDeliveries(signal, deliveries);
        // stream ended: release the shutdown watcher
        group.cancel();
      },
      (groupSignal) => this.shutdownOnAbort(signal, groupSignal),
    );

    try {
      await group.wait();
    } finally {
      await this.closeSource();
      this.logger.info('handler stopped');
    }
  }

  private async handleDeliveries(
    signal: AbortSignal,
    deliveries: AsyncIterable<Delivery>,
  ): Promise<void> {
    for await (const delivery of deliveries) {
      this.logger.debug(`msg delivered (tag: ${delivery.deliveryTag}, body: ${delivery.body.toString()})`);

      let acknowledgement: HandlerAcknowledgement;
      try {
        acknowledgement = await this.handler.receiveMessage(signal, delivery.body);
      } catch (error) {
        throw new ConsumerError('handler returned error', { cause: error });
      }

      if (this.handler.autoAck) {
        continue;
      }

      await this.settle(delivery, acknowledgement);
    }
  }

  private async settle(delivery: Delivery, { acknowledgement, requeue }: HandlerAcknowledgement) {
    try {
      switch (acknowledgement) {
        case 'ack':
          await delivery.ack();
          break;
        case 'nack':
          await delivery.nack(requeue);
          break;
        case 'reject':
          await delivery.reject(requeue);
          break;
      }
    } catch (error) {
      this.logger.error(`failed to ${acknowledgement} message ${delivery.deliveryTag}`, error);

      if (this.mustStopOn(acknowledgement)) {
        throw new ConsumerError(`stop consuming due to ${acknowledgement} error`, { cause: error });
      }
      return;
    }

    this.logger.debug(`${acknowledgement} message ${delivery.deliveryTag} (requeue: ${requeue})`);
  }

  private mustStopOn(acknowledgement: HandlerAcknowledgement['acknowledgement']): boolean {
    switch (acknowledgement) {
      case 'ack':
        return this.handler.mustStopOnAckError;
      case 'nack':
        return this.handler.mustStopOnNackError;
      case 'reject':
        return this.handler.mustStopOnRejectError;
    }
  }

  /**
   * Resolves once the group is done. If the run signal aborts first, stop the
   * flow of new deliveries and, unless in-flight work should finish, close the
   * source right away.
   */
  private async shutdownOnAbort(signal: AbortSignal, groupSignal: AbortSignal): Promise<void> {
    const shutdown = await firstAbort(signal, groupSignal);
    if (!shutdown) return;

    this.logger.info('Received run cancel. Going to stop consuming.');
    try {
      await this.source.cancel(this.handler.consumerTag);
    } catch (error) {
      // the stream will not end by itself now
      this.logger.error('failed to cancel consumer', error);
      await this.closeSource();
      return;
    }

    if (!this.handler.waitToConsumeInflight) {
      await this.closeSource();
    }
  }

  /**
   * Close the source after a task failure so the delivery stream ends.
   */
  private async closeAfterFailure(): Promise<void> {
    try {
      await this.closeSource();
    } catch (error) {
      this.logger.error('failed to close source', error);
    }
  }

  private async closeSource(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.source.close();
  }
}

/**
 * Resolves true when `signal` aborts, false when `groupSignal` aborts first.
 */
function firstAbort(signal: AbortSignal, groupSignal: AbortSignal): Promise<boolean> {
  if (signal.aborted || groupSignal.aborted) {
    return Promise.resolve(signal.aborted);
  }

  return new Promise((resolve) => {
    const done = (shutdown: boolean) => {
      signal.removeEventListener('abort', onShutdown);
      groupSignal.removeEventListener('abort', onDone);
      resolve(shutdown);
    };
    const onShutdown = () => done(true);
    const onDone = () => done(false);

    signal.addEventListener('abort', onShutdown, { once: true });
    groupSignal.addEventListener('abort', onDone, { once: true });
  });
}
