import type { Publisher } from '../../shared/types/channel.js';
import { simStatusString } from '../../shared/types/messages.js';
import { formatError } from '../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';

/** Publisher used when no notification topic is configured: notifications go to the log. */
export class LogPublisher implements Publisher {
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = logger ?? createLogger('Notifications');
  }

  async publish(message: string): Promise<void> {
    this.log.info(message);
  }
}

/**
 * Publish a status notification. Notifications are informational, so a
 * failing publisher is logged and otherwise ignored.
 */
export async function notify(publisher: Publisher, message: string, logger: Logger): Promise<void> {
  try {
    await publisher.publish(message);
  } catch (err) {
    logger.warn('Could not publish notification', { message, error: formatError(err) });
  }
}

export const serverNotification = (message: string) => `SERVER : ${message}`;

export const primServerStatus = (message: string) => simStatusString('PRIMSERVER', 'STATUS', message);
