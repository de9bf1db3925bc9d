/**
 * In-process channel implementations. Used by the tests and by single-process
 * runs where the server and its workers share one event loop.
 */

import { AsyncQueue } from './async-queue.js';
import type {
  IncomingRequest,
  Publisher,
  ReplyChannel,
  RequestChannel,
  Subscriber,
} from '../types/channel.js';

interface Exchange {
  replies: AsyncQueue<string>;
  abandoned: boolean;
}

/**
 * A request/reply pair: any number of clients, one serving side, requests
 * delivered in arrival order.
 */
export class InProcessRequestReply {
  private readonly requests = new AsyncQueue<IncomingRequest>();

  /** Serving side. */
  readonly server: ReplyChannel = {
    receive: (timeoutMs?: number) => this.requests.shift(timeoutMs),
    close: async () => {
      this.requests.close();
    },
  };

  /** A new client connected to this channel. */
  connect(): RequestChannel {
    return new InProcessRequestChannel(this.requests);
  }
}

class InProcessRequestChannel implements RequestChannel {
  private outstanding: Exchange | null = null;
  private closed = false;

  constructor(private readonly requests: AsyncQueue<IncomingRequest>) {}

  async send(payload: string): Promise<boolean> {
    if (this.closed || this.outstanding) return false;
    const exchange: Exchange = { replies: new AsyncQueue<string>(), abandoned: false };
    const delivered = this.requests.push({
      payload,
      reply: async (body: string) => !exchange.abandoned && exchange.replies.push(body),
    });
    if (!delivered) return false;
    this.outstanding = exchange;
    return true;
  }

  async receive(timeoutMs: number): Promise<string | null> {
    const exchange = this.outstanding;
    if (!exchange) return null;
    const reply = await exchange.replies.shift(timeoutMs);
    if (reply !== null) {
      this.outstanding = null;
    }
    return reply;
  }

  get awaitingReply(): boolean {
    return this.outstanding !== null;
  }

  cancel(): void {
    if (!this.outstanding) return;
    this.outstanding.abandoned = true;
    this.outstanding.replies.close();
    this.outstanding = null;
  }

  async close(): Promise<void> {
    this.cancel();
    this.closed = true;
  }
}

/** Publish/subscribe topic with any number of subscribers. */
export class InProcessTopic implements Publisher {
  private readonly subscribers = new Set<AsyncQueue<string>>();
  readonly published: string[] = [];

  async publish(message: string): Promise<void> {
    this.published.push(message);
    for (const queue of this.subscribers) {
      queue.push(message);
    }
  }

  /** Messages published before subscribing are not seen. */
  subscribe(): Subscriber {
    const queue = new AsyncQueue<string>();
    this.subscribers.add(queue);
    return {
      receive: (timeoutMs?: number) => queue.shift(timeoutMs),
      close: async () => {
        queue.close();
        this.subscribers.delete(queue);
      },
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }
}
