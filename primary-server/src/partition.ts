/**
 * Chunk partitioning of one event.
 *
 * Parts are cut back to front: part 1 holds the last `chunkSize` particles of
 * the event, part 2 the `chunkSize` before those, and so on. Downstream
 * consumers rely on this ordering.
 */

import type { PrimaryChunk, PrimaryEvent, SubEventInfo } from '../../shared/types/chunk.js';
import { EXHAUSTED_EVENT_ID } from '../../shared/types/chunk.js';

export interface PartRange {
  /** First particle index (inclusive) */
  start: number;
  /** Last particle index (exclusive) */
  end: number;
}

/** Number of parts of an event; at least 1, even for an empty event. */
export function countParts(nParticles: number, chunkSize: number): number {
  return Math.max(1, Math.ceil(nParticles / chunkSize));
}

/** Particle range of the 0-based part `partIndex`. */
export function partRange(nParticles: number, chunkSize: number, partIndex: number): PartRange {
  const clamp = (value: number) => Math.min(nParticles, Math.max(0, value));
  return {
    start: clamp(nParticles - (partIndex + 1) * chunkSize),
    end: clamp(nParticles - partIndex * chunkSize),
  };
}

export interface ChunkPosition {
  eventId: number;
  maxEvents: number;
  /** 0-based part index */
  partIndex: number;
  chunkSize: number;
  seed: number;
}

export function buildChunk(event: PrimaryEvent, position: ChunkPosition): PrimaryChunk {
  const n = event.particles.length;
  const { start, end } = partRange(n, position.chunkSize, position.partIndex);
  const info: SubEventInfo = {
    eventId: position.eventId,
    maxEvents: position.maxEvents,
    part: position.partIndex + 1,
    nparts: countParts(n, position.chunkSize),
    seed: position.seed,
    index: start,
    header: { ...event.header },
  };
  return { info, particles: event.particles.slice(start, end) };
}

/** The terminal chunk: no particles, ordinal -1, no part. */
export function buildExhaustionChunk(event: PrimaryEvent, maxEvents: number, seed: number): PrimaryChunk {
  return {
    info: {
      eventId: EXHAUSTED_EVENT_ID,
      maxEvents,
      part: 0,
      nparts: 0,
      seed,
      index: 0,
      header: { ...event.header },
    },
    particles: [],
  };
}

/** All chunks of one event in serving order. */
export function partitionEvent(
  event: PrimaryEvent,
  options: Omit<ChunkPosition, 'partIndex'>,
): PrimaryChunk[] {
  const nparts = countParts(event.particles.length, options.chunkSize);
  return Array.from({ length: nparts }, (_, partIndex) => buildChunk(event, { ...options, partIndex }));
}
