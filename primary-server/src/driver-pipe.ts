import * as fs from 'fs';
import { formatError } from '../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';

/**
 * Side channel to the process driving the server: the ordinal of every event
 * that starts being served is written to an inherited file descriptor as a
 * 4-byte little-endian integer. Best effort; write failures are only logged.
 * Writes are synchronous so ordinals reach the driver in serving order.
 */
export class DriverPipe {
  private readonly log: Logger;

  constructor(
    readonly fd: number,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('DriverPipe');
  }

  notifyEventStarted(eventId: number): void {
    const buffer = Buffer.alloc(4);
    buffer.writeInt32LE(eventId, 0);
    try {
      fs.writeSync(this.fd, buffer);
    } catch (err) {
      this.log.warn('Could not notify driver of new event', { fd: this.fd, eventId, error: formatError(err) });
    }
  }
}

/** Read the pipe handle from the environment value, if one was assigned. */
export function openDriverPipe(fd: number | undefined, logger?: Logger): DriverPipe | null {
  const log = logger ?? createLogger('DriverPipe');
  if (fd === undefined) {
    log.info('No driver pipe assigned');
    return null;
  }
  log.info(`Assigned pipe handle ${fd}`);
  return new DriverPipe(fd, log);
}
