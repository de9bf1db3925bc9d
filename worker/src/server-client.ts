/**
 * Client side of the server's HTTP request/reply channels.
 *
 * `send` starts the POST; `receive` waits for its response for at most the
 * given time and may be called again while the exchange is outstanding.
 */

import type { RequestChannel } from '../../shared/types/channel.js';
import { formatError } from '../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';

type Waited = { body: string | null } | { timedOut: true };

export class HttpRequestChannel implements RequestChannel {
  private outstanding: Promise<string | null> | null = null;
  private controller: AbortController | null = null;
  private closed = false;
  private readonly log: Logger;

  constructor(
    readonly url: string,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('ServerClient');
  }

  async send(payload: string): Promise<boolean> {
    if (this.closed || this.outstanding) return false;
    const controller = new AbortController();
    this.controller = controller;
    this.outstanding = fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: payload,
      signal: controller.signal,
    })
      .then(async (res) => {
        if (!res.ok) {
          this.log.warn(`Server answered ${res.status}`, { url: this.url });
          return null;
        }
        return await res.text();
      })
      .catch((err: unknown) => {
        if (!controller.signal.aborted) {
          this.log.warn('Request failed', { url: this.url, error: formatError(err) });
        }
        return null;
      });
    return true;
  }

  async receive(timeoutMs: number): Promise<string | null> {
    const exchange = this.outstanding;
    if (!exchange) return null;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<Waited>((resolve) => {
      timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
    });
    const result = await Promise.race([exchange.then((body): Waited => ({ body })), timeout]);
    clearTimeout(timer);

    if ('timedOut' in result) return null;
    if (this.outstanding === exchange) {
      this.outstanding = null;
      this.controller = null;
    }
    return result.body;
  }

  get awaitingReply(): boolean {
    return this.outstanding !== null;
  }

  cancel(): void {
    this.controller?.abort();
    this.controller = null;
    this.outstanding = null;
  }

  async close(): Promise<void> {
    this.cancel();
    this.closed = true;
  }
}
