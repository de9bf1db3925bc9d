/**
 * Serving side of a request/reply channel over HTTP.
 *
 * Each POST to the route is one request; its text body is the payload and
 * the response body is the reply. The response is held open until the server
 * replies, so the HTTP exchange maps onto one request/reply exchange.
 */

import type { Server } from 'http';
import express, { type Request, type Response, type NextFunction } from 'express';
import type { IncomingRequest, ReplyChannel } from '../../../shared/types/channel.js';
import { AsyncQueue } from '../../../shared/lib/async-queue.js';
import { createLogger, type Logger } from '../../../shared/lib/logger.js';

export class HttpReplyChannel implements ReplyChannel {
  private readonly app = express();
  private readonly requests = new AsyncQueue<IncomingRequest>();
  private readonly log: Logger;
  private server: Server | null = null;

  constructor(
    readonly route: string,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('Http');
    this.app.use(express.text({ type: '*/*', limit: '1mb' }));
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.log.debug(`${req.method} ${req.path}`);
      next();
    });
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', route: this.route });
    });
    this.app.post(this.route, (req: Request, res: Response) => this.accept(req, res));
  }

  /** Start listening; resolves with the bound port (useful with port 0). */
  listen(port: number, host = '0.0.0.0'): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        const address = server.address();
        resolve(typeof address === 'object' && address !== null ? address.port : port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  receive(timeoutMs?: number): Promise<IncomingRequest | null> {
    return this.requests.shift(timeoutMs);
  }

  async close(): Promise<void> {
    this.requests.close();
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private accept(req: Request, res: Response): void {
    const payload = typeof req.body === 'string' ? req.body : '';
    let clientGone = false;
    res.on('close', () => {
      if (!res.writableFinished) clientGone = true;
    });

    const queued = this.requests.push({
      payload,
      reply: (body: string, timeoutMs: number) => this.respond(res, body, timeoutMs, () => clientGone),
    });
    if (!queued) {
      res.status(503).type('text/plain').send('closed');
    }
  }

  private respond(res: Response, body: string, timeoutMs: number, clientGone: () => boolean): Promise<boolean> {
    if (clientGone() || res.headersSent) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        res.destroy();
        resolve(false);
      }, timeoutMs);
      const settle = (delivered: boolean) => {
        clearTimeout(timer);
        resolve(delivered);
      };
      res.once('finish', () => settle(true));
      res.once('close', () => settle(res.writableFinished));
      res.status(200).type('text/plain').send(body);
    });
  }
}
