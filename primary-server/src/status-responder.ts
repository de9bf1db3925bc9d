import type { ReplyChannel } from '../../shared/types/channel.js';
import { encodeStatus } from '../../shared/types/messages.js';
import { LifecycleState } from '../../shared/types/state-machine.js';
import { formatError } from '../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';

export interface StatusResponderOptions {
  pollTimeoutMs?: number;
  replyTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Answers state probes on the status channel with the current lifecycle
 * state. Only reads the state; runs until the server stops.
 */
export class StatusResponder {
  private readonly log: Logger;
  private readonly pollTimeoutMs: number;
  private readonly replyTimeoutMs: number;
  private stopping = false;
  private loop: Promise<void> | null = null;
  private answered = 0;

  constructor(
    private readonly channel: ReplyChannel,
    private readonly readState: () => LifecycleState,
    options: StatusResponderOptions = {},
  ) {
    this.log = options.logger ?? createLogger('Status');
    this.pollTimeoutMs = options.pollTimeoutMs ?? 500;
    this.replyTimeoutMs = options.replyTimeoutMs ?? 500;
  }

  get requestsAnswered(): number {
    return this.answered;
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.serve();
  }

  /** Ask the loop to end and wait for it. */
  async stop(): Promise<void> {
    this.stopping = true;
    await this.loop;
    this.loop = null;
  }

  private async serve(): Promise<void> {
    this.log.info('Status responder started');
    while (!this.stopping && this.readState() !== LifecycleState.Stopped) {
      try {
        const request = await this.channel.receive(this.pollTimeoutMs);
        if (!request) continue;
        const state = this.readState();
        if (await request.reply(encodeStatus(state), this.replyTimeoutMs)) {
          this.answered++;
        } else {
          this.log.warn('Status reply not delivered', { state });
        }
      } catch (err) {
        this.log.error('Status channel error', { error: formatError(err) });
      }
    }
    this.log.info('Status responder finished', { answered: this.answered });
  }
}
