import type { Publisher, Subscriber } from '../../shared/types/channel.js';
import type { ReconfigRequest } from '../../shared/types/run-config.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';
import { notify, primServerStatus } from './notifications.js';
import { parseReconfigCommand } from './reconfig.js';

export interface ReconfigurationListenerOptions {
  /** Opens the control subscription; called each time the server parks. */
  connect: () => Subscriber | Promise<Subscriber>;
  notifications: Publisher;
  /** Omit to wait without a bound. */
  waitTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Waits for control input while the server is parked in Idle.
 *
 * Subscribes first and then announces that it awaits input, so a driver
 * reacting to the announcement cannot publish before anyone listens.
 * Invalid commands are reported and the wait goes on.
 */
export class ReconfigurationListener {
  private readonly log: Logger;

  constructor(private readonly options: ReconfigurationListenerOptions) {
    this.log = options.logger ?? createLogger('Control');
  }

  /** The next valid request, or null when nothing arrived. */
  async awaitRequest(): Promise<ReconfigRequest | null> {
    const subscriber = await this.options.connect();
    try {
      await notify(this.options.notifications, primServerStatus('AWAITING INPUT'), this.log);
      this.log.info('Waiting for control input');
      for (;;) {
        const message = await subscriber.receive(this.options.waitTimeoutMs);
        if (message === null) {
          this.log.info('Nothing received on control channel');
          return null;
        }
        this.log.info('Control message received', { message });
        const parsed = parseReconfigCommand(message);
        if (parsed.success) {
          return parsed.request;
        }
        this.log.error('Invalid control command', { message, error: parsed.error });
        await notify(this.options.notifications, primServerStatus('INVALID COMMAND'), this.log);
      }
    } finally {
      await subscriber.close();
    }
  }
}
