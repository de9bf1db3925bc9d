/**
 * Job Server: serves chunks of generated events to workers.
 *
 * One serving loop handles work-channel requests strictly in arrival order.
 * Event generation runs as a single background task (see GenerationSlot) that
 * the loop joins only when it has handed out every part of the current event;
 * the next event is generated while the parts of the current one are served.
 *
 * Lifecycle:
 *   Initializing → WaitingEvent (first event of the cycle is being generated)
 *   WaitingEvent → ReadyToServe (first event available)
 *   any          → Idle (a work request found no more events)
 *   Idle         → Initializing (service mode, reconfigured) | Stopped
 */

import type { IncomingRequest, Publisher, ReplyChannel } from '../../shared/types/channel.js';
import { emptyEvent, type PrimaryChunk, type PrimaryEvent } from '../../shared/types/chunk.js';
import {
  CONFIG_REQUEST,
  decodeRequest,
  encodeReply,
  type WorkReply,
} from '../../shared/types/messages.js';
import { applyOverrides, type RunConfig, type RunConfigOverrides } from '../../shared/types/run-config.js';
import { LifecycleState, canTransition, stateName } from '../../shared/types/state-machine.js';
import { GenerationError, formatError } from '../../shared/lib/errors.js';
import { formatDuration } from '../../shared/lib/format.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';
import { RandomSource } from '../../shared/lib/random.js';
import type { DriverPipe } from './driver-pipe.js';
import { GenerationSlot } from './generation-slot.js';
import { GeneratorCoordinator } from './generator-coordinator.js';
import type { PrimaryGenerator } from './generators/index.js';
import { LogPublisher, notify, serverNotification } from './notifications.js';
import { buildChunk, buildExhaustionChunk } from './partition.js';
import type { ReconfigurationListener } from './reconfig-listener.js';

export interface JobServerOptions {
  config: RunConfig;
  work: ReplyChannel;
  /** Park in Idle and wait for reconfiguration instead of finishing. */
  asService?: boolean;
  coordinator?: GeneratorCoordinator;
  random?: RandomSource;
  notifications?: Publisher;
  /** Required in service mode; without one an idle service stops. */
  listener?: ReconfigurationListener | null;
  driverPipe?: DriverPipe | null;
  replyTimeoutMs?: number;
  logger?: Logger;
}

export interface Cursor {
  eventCounter: number;
  partCounter: number;
  needNewEvent: boolean;
}

export class JobServer {
  private state: LifecycleState = LifecycleState.Initializing;
  private config: RunConfig;
  private initialSeed: number;

  private eventCounter = 0;
  private partCounter = 0;
  private needNewEvent = true;

  private generator: PrimaryGenerator | null = null;
  private currentEvent: PrimaryEvent = emptyEvent();
  private producedEvent: PrimaryEvent | null = null;
  /** Set once the first event of the current cycle has been produced. */
  private cycleReady = false;
  private readonly slot: GenerationSlot;

  /** Chunk whose reply was not delivered; handed to the next work request. */
  private undelivered: PrimaryChunk | null = null;
  private fault: GenerationError | null = null;
  private closing = false;

  private readonly work: ReplyChannel;
  private readonly asService: boolean;
  private readonly coordinator: GeneratorCoordinator;
  private readonly random: RandomSource;
  private readonly notifications: Publisher;
  private readonly listener: ReconfigurationListener | null;
  private readonly driverPipe: DriverPipe | null;
  private readonly replyTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: JobServerOptions) {
    this.config = { ...options.config };
    this.initialSeed = options.config.seed;
    this.work = options.work;
    this.asService = options.asService ?? false;
    this.log = options.logger ?? createLogger('JobServer');
    this.coordinator = options.coordinator ?? new GeneratorCoordinator();
    this.random = options.random ?? new RandomSource();
    this.notifications = options.notifications ?? new LogPublisher(this.log);
    this.listener = options.listener ?? null;
    this.driverPipe = options.driverPipe ?? null;
    this.replyTimeoutMs = options.replyTimeoutMs ?? 5000;
    this.slot = new GenerationSlot((error) => {
      this.log.error('Event generation failed', { error: error.message });
    });
  }

  getState(): LifecycleState {
    return this.state;
  }

  /** Snapshot of the run configuration of the current cycle. */
  getConfig(): RunConfig {
    return { ...this.config };
  }

  get cursor(): Cursor {
    return { eventCounter: this.eventCounter, partCounter: this.partCounter, needNewEvent: this.needNewEvent };
  }

  /** The generation failure that stopped the server, if any. */
  get failure(): GenerationError | null {
    return this.fault;
  }

  /** Seed the random source and start setting up the generator. */
  async init(): Promise<void> {
    await notify(this.notifications, serverNotification('INITIALIZING'), this.log);
    this.adoptSeed(this.config.seed);
    this.log.info('Initializing', {
      generator: this.config.generator,
      trigger: this.config.trigger,
      nEvents: this.config.nEvents,
      chunkSize: this.config.chunkSize,
      seed: this.initialSeed,
    });
    this.startGeneration(true);
  }

  /**
   * Serve one step of the loop: one work-channel request, or, when parked in
   * Idle as a service, one wait for control input.
   *
   * @returns whether more work may exist
   */
  async serveOnce(receiveTimeoutMs?: number): Promise<boolean> {
    if (this.state === LifecycleState.Stopped) return false;
    if (this.state === LifecycleState.Idle && this.asService) {
      return this.awaitReconfiguration();
    }

    const request = await this.work.receive(receiveTimeoutMs);
    if (request) {
      await this.handleRequest(request);
    }
    return this.moreWorkMayExist();
  }

  /** Serve until there is no more work or the server is closed. */
  async run(): Promise<void> {
    while (!this.closing && (await this.serveOnce())) {
      // next request
    }
    this.log.info(`Serving loop finished in state ${stateName(this.state)}`);
  }

  async handleRequest(request: IncomingRequest): Promise<void> {
    const decoded = decodeRequest(request.payload);
    if (!decoded.success) {
      this.log.warn('Protocol violation on work channel', { error: decoded.error });
      await this.send(request, { kind: 'error', code: 'unknown-request', message: decoded.error });
      return;
    }

    if (decoded.token === CONFIG_REQUEST) {
      this.log.debug('Config requested');
      await this.send(request, { kind: 'config', config: this.getConfig() });
      return;
    }

    let chunk: PrimaryChunk;
    try {
      chunk = await this.handleWorkRequest();
    } catch (err) {
      if (!(err instanceof GenerationError)) throw err;
      this.fault = err;
      this.transition(LifecycleState.Stopped);
      await this.send(request, { kind: 'error', code: 'generation-failed', message: err.message });
      return;
    }

    const delivered = await this.send(request, { kind: 'chunk', chunk });
    if (!delivered && chunk.info.nparts > 0) {
      this.undelivered = chunk;
    }
  }

  /** Next chunk to hand out, advancing the cursor. Throws GenerationError when no event could be produced. */
  async handleWorkRequest(): Promise<PrimaryChunk> {
    if (this.undelivered) {
      const chunk = this.undelivered;
      this.undelivered = null;
      this.log.info('Redelivering chunk', { eventId: chunk.info.eventId, part: chunk.info.part });
      return chunk;
    }

    if (this.needNewEvent) {
      if (this.eventCounter >= this.config.nEvents) {
        this.transition(LifecycleState.Idle);
        return buildExhaustionChunk(
          this.currentEvent,
          this.config.nEvents,
          this.initialSeed + this.eventCounter,
        );
      }
      await this.takeProducedEvent();
      this.partCounter = 0;
      this.eventCounter++;
      this.needNewEvent = false;
    }

    const chunk = buildChunk(this.currentEvent, {
      eventId: this.eventCounter,
      maxEvents: this.config.nEvents,
      partIndex: this.partCounter,
      chunkSize: this.config.chunkSize,
      seed: this.initialSeed + this.eventCounter,
    });
    if (chunk.info.part === 1) {
      this.driverPipe?.notifyEventStarted(this.eventCounter);
    }
    this.log.debug('Serving chunk', {
      eventId: chunk.info.eventId,
      part: chunk.info.part,
      nparts: chunk.info.nparts,
      particles: chunk.particles.length,
    });

    this.partCounter++;
    if (this.partCounter >= chunk.info.nparts) {
      this.needNewEvent = true;
      if (this.eventCounter < this.config.nEvents) {
        this.startGeneration(false);
      }
    }
    return chunk;
  }

  /**
   * Start a new generation cycle with `overrides` applied. Only valid from Idle.
   * Without a seed override the random source is re-seeded with a derived seed.
   */
  async reInit(overrides: RunConfigOverrides): Promise<void> {
    const failure = await this.slot.settle();
    if (failure) {
      this.log.warn('Discarding failed generation of the previous cycle', { error: failure.message });
    }
    if (!this.transition(LifecycleState.Initializing)) {
      return;
    }
    this.config = applyOverrides(this.config, { ...overrides, seed: overrides.seed ?? -1 });
    this.adoptSeed(this.config.seed);
    this.eventCounter = 0;
    this.partCounter = 0;
    this.needNewEvent = true;
    this.cycleReady = false;
    this.producedEvent = null;
    this.undelivered = null;
    this.log.info('Reconfigured', { ...overrides, seed: this.initialSeed });
    this.startGeneration(true);
  }

  /** Stop serving: closes the work channel and waits for in-flight generation. */
  async close(): Promise<void> {
    this.closing = true;
    this.transition(LifecycleState.Stopped);
    await this.work.close();
    const failure = await this.slot.settle();
    if (failure) {
      this.log.warn('Generation in flight at shutdown failed', { error: failure.message });
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private moreWorkMayExist(): boolean {
    if (this.state === LifecycleState.Stopped) return false;
    return !(this.state === LifecycleState.Idle && !this.asService);
  }

  private async awaitReconfiguration(): Promise<boolean> {
    if (!this.listener) {
      this.log.warn('Idle service without a control channel, stopping');
      this.transition(LifecycleState.Stopped);
      return false;
    }
    const request = await this.listener.awaitRequest();
    if (!request || request.kind === 'stop') {
      this.log.info(request ? 'Stop requested' : 'No control input, stopping');
      this.transition(LifecycleState.Stopped);
      return false;
    }
    await this.reInit(request.overrides);
    return true;
  }

  /** `requested` may be negative; the config snapshot reports the seed in use. */
  private adoptSeed(requested: number): void {
    this.initialSeed = this.random.setSeed(requested);
    this.config.seed = this.initialSeed;
  }

  private transition(to: LifecycleState): boolean {
    if (this.state === to) return true;
    if (!canTransition(this.state, to)) {
      this.log.warn(`Refused state change ${stateName(this.state)} -> ${stateName(to)}`);
      return false;
    }
    this.log.info(`State ${stateName(this.state)} -> ${stateName(to)}`);
    this.state = to;
    return true;
  }

  private startGeneration(initGenerator: boolean): void {
    const config = this.config;
    this.slot.start(async () => {
      const generator =
        initGenerator || !this.generator ? await this.coordinator.initialize(config) : this.generator;
      this.generator = generator;
      if (!this.cycleReady && this.state === LifecycleState.Initializing) {
        this.transition(LifecycleState.WaitingEvent);
      }
      const startTime = Date.now();
      const event = await this.coordinator.produceEvent(generator, this.random);
      this.log.info(`Event generated in ${formatDuration(Date.now() - startTime)}`, {
        particles: event.particles.length,
        trials: event.header.trials,
      });
      this.producedEvent = event;
      if (this.state === LifecycleState.WaitingEvent) {
        this.transition(LifecycleState.ReadyToServe);
      }
      this.cycleReady = true;
    });
  }

  private async takeProducedEvent(): Promise<void> {
    await this.slot.join();
    if (!this.producedEvent) {
      throw new GenerationError('No event was produced');
    }
    this.currentEvent = this.producedEvent;
    this.producedEvent = null;
  }

  private async send(request: IncomingRequest, reply: WorkReply): Promise<boolean> {
    const startTime = Date.now();
    let delivered: boolean;
    try {
      delivered = await request.reply(encodeReply(reply), this.replyTimeoutMs);
    } catch (err) {
      this.log.warn('Reply failed', { kind: reply.kind, error: formatError(err) });
      return false;
    }
    if (!delivered) {
      this.log.warn(`Reply not delivered within ${this.replyTimeoutMs}ms`, { kind: reply.kind });
    } else {
      this.log.debug(`Reply sent in ${formatDuration(Date.now() - startTime)}`, { kind: reply.kind });
    }
    return delivered;
  }
}
