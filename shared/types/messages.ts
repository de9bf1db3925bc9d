/**
 * Wire messages of the work and status channels.
 *
 * Payloads are JSON text. Request tokens are a closed enumeration validated
 * at decode time; an unknown token is answered with an error reply.
 */

import { z } from 'zod';
import type { RunConfig } from './run-config.js';
import type { EventHeader, Particle, PrimaryChunk, SubEventInfo } from './chunk.js';
import { isLifecycleState, type LifecycleState } from './state-machine.js';
import { LOG_LEVELS } from '../lib/logger.js';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const CONFIG_REQUEST = 'config-request';
export const WORK_REQUEST = 'work-request';

export const requestTokenSchema = z.enum([CONFIG_REQUEST, WORK_REQUEST]);

export type RequestToken = z.infer<typeof requestTokenSchema>;

export function decodeRequest(payload: string):
  { success: true; token: RequestToken } | { success: false; error: string } {
  const result = requestTokenSchema.safeParse(payload.trim());
  if (result.success) {
    return { success: true, token: result.data };
  }
  const shown = payload.length > 40 ? `${payload.slice(0, 40)}...` : payload;
  return { success: false, error: `Unknown request "${shown}"` };
}

// ---------------------------------------------------------------------------
// Replies
// ---------------------------------------------------------------------------

const logLevelSchema = z.enum(LOG_LEVELS);

export const runConfigSchema: z.ZodType<RunConfig> = z.object({
  generator: z.string().min(1),
  trigger: z.string().min(1),
  mcEngine: z.string().min(1),
  chunkSize: z.number().int().min(1),
  seed: z.number().int(),
  nEvents: z.number().int().min(0),
  embedIntoFile: z.string().optional(),
  extKinFile: z.string().optional(),
  configFile: z.string().optional(),
  configKeyValues: z.string().optional(),
  logVerbosity: logLevelSchema,
});

const vertexSchema = z.object({ x: z.number(), y: z.number(), z: z.number() });

export const particleSchema: z.ZodType<Particle> = z.object({
  pdg: z.number().int(),
  px: z.number(),
  py: z.number(),
  pz: z.number(),
  e: z.number(),
  vx: z.number(),
  vy: z.number(),
  vz: z.number(),
  t: z.number(),
});

export const eventHeaderSchema: z.ZodType<EventHeader> = z.object({
  generator: z.string(),
  trigger: z.string(),
  nPrimaries: z.number().int().min(0),
  vertex: vertexSchema,
  trials: z.number().int().min(0),
  embeddedEventIndex: z.number().int().min(0).optional(),
});

const subEventInfoSchema: z.ZodType<SubEventInfo> = z.object({
  eventId: z.number().int(),
  maxEvents: z.number().int(),
  part: z.number().int().min(0),
  nparts: z.number().int().min(0),
  seed: z.number().int(),
  index: z.number().int().min(0),
  header: eventHeaderSchema,
});

export const chunkSchema: z.ZodType<PrimaryChunk> = z.object({
  info: subEventInfoSchema,
  particles: z.array(particleSchema),
});

export const ERROR_CODES = ['unknown-request', 'generation-failed'] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export type WorkReply =
  | { kind: 'config'; config: RunConfig }
  | { kind: 'chunk'; chunk: PrimaryChunk }
  | { kind: 'error'; code: ErrorCode; message: string };

const workReplySchema: z.ZodType<WorkReply> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('config'), config: runConfigSchema }),
  z.object({ kind: z.literal('chunk'), chunk: chunkSchema }),
  z.object({ kind: z.literal('error'), code: z.enum(ERROR_CODES), message: z.string() }),
]);

export function encodeReply(reply: WorkReply): string {
  return JSON.stringify(reply);
}

/**
 * Decode a work-channel reply.
 * Returns { success: true, reply } on a valid message, { success: false, error } otherwise.
 */
export function decodeReply(raw: string):
  { success: true; reply: WorkReply } | { success: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { success: false, error: 'Reply is not valid JSON' };
  }
  const result = workReplySchema.safeParse(json);
  if (result.success) {
    return { success: true, reply: result.data };
  }
  const messages = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).filter(Boolean);
  return { success: false, error: messages.join('; ') || 'Invalid reply' };
}

// ---------------------------------------------------------------------------
// Status channel
// ---------------------------------------------------------------------------

/** The status reply is the lifecycle state as a single integer. */
export function encodeStatus(state: LifecycleState): string {
  return String(state);
}

export function decodeStatus(raw: string): LifecycleState | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return isLifecycleState(value) ? value : null;
}

// ---------------------------------------------------------------------------
// Control channel notifications
// ---------------------------------------------------------------------------

/** "<component> : STATUS : <message>" */
export function simStatusString(component: string, kind: string, message: string): string {
  return `${component} : ${kind} : ${message}`;
}
