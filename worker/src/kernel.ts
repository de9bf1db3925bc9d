/**
 * Worker kernel: the client loop of a simulation worker.
 *
 * Each cycle optionally probes the server status, requests one chunk, hands
 * it to the transport engine and repeats until the server signals that no
 * more work will come.
 */

import type { RequestChannel } from '../../shared/types/channel.js';
import { isExhaustionSignal, type PrimaryChunk } from '../../shared/types/chunk.js';
import {
  CONFIG_REQUEST,
  WORK_REQUEST,
  decodeReply,
  decodeStatus,
} from '../../shared/types/messages.js';
import type { RunConfig } from '../../shared/types/run-config.js';
import { LifecycleState, acceptsWorkRequests, stateName } from '../../shared/types/state-machine.js';
import { ConfigurationError, ServerUnavailableError, formatError } from '../../shared/lib/errors.js';
import { formatDuration, residentMemoryMb } from '../../shared/lib/format.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';
import { sleep } from '../../shared/lib/retry.js';
import type { TransportEngine } from './transport-engine.js';

/** Receive attempts per work request before the exchange is abandoned. */
export const RECEIVE_ATTEMPTS = 3;

export type KernelOutcome =
  | 'processed'
  /** Server not ready to hand out work */
  | 'idle'
  /** No reply from the server this cycle */
  | 'unreachable'
  | 'exhausted'
  | 'failed';

export type WorkerResult = 'exhausted' | 'failed' | 'gave-up' | 'stopped';

export interface WorkerSummary {
  id: string;
  result: WorkerResult;
  chunksProcessed: number;
  particlesProcessed: number;
}

/**
 * One-shot configuration query, done before any engine is built.
 * Throws ServerUnavailableError when nothing comes back, ConfigurationError
 * when the answer is not a RunConfig.
 */
export async function querySimConfig(channel: RequestChannel, timeoutMs: number): Promise<RunConfig> {
  if (!(await channel.send(CONFIG_REQUEST, timeoutMs))) {
    throw new ServerUnavailableError('Could not send config request');
  }
  const raw = await channel.receive(timeoutMs);
  if (raw === null) {
    const timedOut = channel.awaitingReply;
    channel.cancel();
    throw new ServerUnavailableError(timedOut ? `No config reply within ${timeoutMs}ms` : 'Config request failed');
  }
  const decoded = decodeReply(raw);
  if (!decoded.success) {
    throw new ConfigurationError(`Invalid config reply: ${decoded.error}`);
  }
  if (decoded.reply.kind !== 'config') {
    throw new ConfigurationError(`Expected a config reply, got "${decoded.reply.kind}"`);
  }
  return decoded.reply.config;
}

/** Current server state, or null when the status channel does not answer. */
export async function probeStatus(channel: RequestChannel, timeoutMs: number): Promise<LifecycleState | null> {
  if (!(await channel.send('status', timeoutMs))) return null;
  const raw = await channel.receive(timeoutMs);
  if (raw === null) {
    channel.cancel();
    return null;
  }
  return decodeStatus(raw);
}

export interface SimWorkerOptions {
  id: string;
  work: RequestChannel;
  /** Status pre-check is skipped without one. */
  status?: RequestChannel | null;
  engine: TransportEngine;
  requestTimeoutMs?: number;
  statusTimeoutMs?: number;
  idleBackoffMs?: number;
  /** Consecutive idle or unreachable cycles before the worker gives up. */
  maxIdleCycles?: number;
  logger?: Logger;
}

export class SimWorker {
  readonly id: string;
  private readonly work: RequestChannel;
  private readonly status: RequestChannel | null;
  private readonly engine: TransportEngine;
  private readonly requestTimeoutMs: number;
  private readonly statusTimeoutMs: number;
  private readonly idleBackoffMs: number;
  private readonly maxIdleCycles: number;
  private readonly log: Logger;

  private chunksProcessed = 0;
  private particlesProcessed = 0;
  private stopping = false;

  constructor(options: SimWorkerOptions) {
    this.id = options.id;
    this.work = options.work;
    this.status = options.status ?? null;
    this.engine = options.engine;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 100_000;
    this.statusTimeoutMs = options.statusTimeoutMs ?? 2000;
    this.idleBackoffMs = options.idleBackoffMs ?? 2000;
    this.maxIdleCycles = options.maxIdleCycles ?? 30;
    this.log = options.logger ?? createLogger(`Worker ${options.id}`);
  }

  /** One cycle: probe, request, process. */
  async kernel(): Promise<KernelOutcome> {
    if (this.status) {
      const state = await probeStatus(this.status, this.statusTimeoutMs);
      if (state === null) {
        this.log.warn('Status probe got no answer');
        return 'unreachable';
      }
      if (!acceptsWorkRequests(state)) {
        this.log.debug(`Server is ${stateName(state)}, skipping cycle`);
        return 'idle';
      }
    }

    if (!(await this.work.send(WORK_REQUEST, this.requestTimeoutMs))) {
      this.log.warn('Could not send work request');
      return 'unreachable';
    }

    let raw: string | null = null;
    for (let attempt = 1; attempt <= RECEIVE_ATTEMPTS && raw === null; attempt++) {
      raw = await this.work.receive(this.requestTimeoutMs);
      if (raw !== null) break;
      if (!this.work.awaitingReply) {
        this.log.warn('Work request failed before a reply arrived');
        return 'unreachable';
      }
      this.log.warn(`No reply to work request (attempt ${attempt}/${RECEIVE_ATTEMPTS})`);
    }
    if (raw === null) {
      this.work.cancel();
      return 'unreachable';
    }

    const decoded = decodeReply(raw);
    if (!decoded.success) {
      this.log.error('Undecodable work reply', { error: decoded.error });
      return 'failed';
    }
    const reply = decoded.reply;
    if (reply.kind === 'error') {
      this.log.error(`Server refused work request: ${reply.message}`, { code: reply.code });
      return 'failed';
    }
    if (reply.kind !== 'chunk') {
      this.log.error(`Unexpected "${reply.kind}" reply to work request`);
      return 'failed';
    }
    if (isExhaustionSignal(reply.chunk)) {
      this.log.info('No more work');
      return 'exhausted';
    }
    return this.process(reply.chunk);
  }

  /** Run cycles until the server has no more work, something fails, or the server stays unavailable. */
  async run(): Promise<WorkerSummary> {
    let idleCycles = 0;
    while (!this.stopping) {
      const outcome = await this.kernel();
      if (outcome === 'processed') {
        idleCycles = 0;
        continue;
      }
      if (outcome === 'exhausted' || outcome === 'failed') {
        return this.summary(outcome);
      }
      idleCycles++;
      if (idleCycles >= this.maxIdleCycles) {
        this.log.warn(`Giving up after ${idleCycles} cycles without work`);
        return this.summary('gave-up');
      }
      await sleep(this.idleBackoffMs);
    }
    return this.summary('stopped');
  }

  /** Finish the current cycle and leave the run loop. */
  stop(): void {
    this.stopping = true;
  }

  async close(): Promise<void> {
    await this.work.close();
    await this.status?.close();
    await this.engine.close();
  }

  private async process(chunk: PrimaryChunk): Promise<KernelOutcome> {
    const { eventId, part, nparts, seed } = chunk.info;
    const startTime = Date.now();
    this.log.info(`TIME-STAMP event ${eventId} part ${part}/${nparts} received`, {
      particles: chunk.particles.length,
    });
    try {
      this.engine.setSeed(seed);
      await this.engine.process(chunk);
    } catch (err) {
      this.log.error(`Processing of event ${eventId} part ${part} failed`, { error: formatError(err) });
      return 'failed';
    }
    this.chunksProcessed++;
    this.particlesProcessed += chunk.particles.length;
    this.log.info(`TIME-STAMP event ${eventId} part ${part}/${nparts} done in ${formatDuration(Date.now() - startTime)}`);
    this.log.info(`MEM-STAMP ${residentMemoryMb()} MB`);
    return 'processed';
  }

  private summary(result: WorkerResult): WorkerSummary {
    return {
      id: this.id,
      result,
      chunksProcessed: this.chunksProcessed,
      particlesProcessed: this.particlesProcessed,
    };
  }
}
