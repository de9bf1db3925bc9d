/**
 * Control channel over Google Cloud Pub/Sub: reconfiguration commands arrive
 * on a subscription, status notifications go out on a topic.
 */

import { PubSub, type Subscription } from '@google-cloud/pubsub';
import type { Publisher, Subscriber } from '../../../shared/types/channel.js';
import { AsyncQueue } from '../../../shared/lib/async-queue.js';
import { formatError } from '../../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../../shared/lib/logger.js';

const log: Logger = createLogger('PubSub');

export function createPubSub(projectId?: string): PubSub {
  return projectId ? new PubSub({ projectId }) : new PubSub();
}

/** The parts of a Pub/Sub message the control channel uses. */
export interface ControlMessage {
  readonly id: string;
  readonly data: Buffer;
  ack(): void;
  nack(): void;
}

export interface ControlSubscription {
  onMessage(handler: (message: ControlMessage) => void): void;
  onError(handler: (error: Error) => void): void;
  close(): Promise<void>;
}

export function openSubscription(pubsub: PubSub, subscriptionName: string): ControlSubscription {
  const subscription: Subscription = pubsub.subscription(subscriptionName, {
    flowControl: { maxMessages: 1, allowExcessMessages: false },
  });
  return {
    onMessage: (handler) => {
      subscription.on('message', handler);
    },
    onError: (handler) => {
      subscription.on('error', handler);
    },
    close: async () => {
      subscription.removeAllListeners('message');
      await subscription.close();
    },
  };
}

/**
 * Messages are acknowledged when they are read. Anything still buffered on
 * close is nacked so Pub/Sub redelivers it to the next subscriber.
 */
export class PubSubSubscriber implements Subscriber {
  private readonly queue = new AsyncQueue<ControlMessage>();

  constructor(
    private readonly subscription: ControlSubscription,
    private readonly name = 'control',
  ) {
    subscription.onMessage((message) => {
      if (!this.queue.push(message)) {
        message.nack();
      }
    });
    subscription.onError((error) => {
      log.error('Subscription error', { subscription: this.name, error: formatError(error) });
    });
  }

  async receive(timeoutMs?: number): Promise<string | null> {
    const message = await this.queue.shift(timeoutMs);
    if (!message) return null;
    message.ack();
    return message.data.toString('utf8');
  }

  async close(): Promise<void> {
    this.queue.close();
    const pending = this.queue.drain();
    for (const message of pending) {
      message.nack();
    }
    if (pending.length > 0) {
      log.info(`Returned ${pending.length} unread control message(s)`, { subscription: this.name });
    }
    await this.subscription.close();
  }
}

export class PubSubPublisher implements Publisher {
  constructor(
    private readonly pubsub: PubSub,
    private readonly topicName: string,
  ) {}

  async publish(message: string): Promise<void> {
    const id = await this.pubsub.topic(this.topicName).publishMessage({ data: Buffer.from(message, 'utf8') });
    log.debug('Notification published', { topic: this.topicName, id });
  }
}
