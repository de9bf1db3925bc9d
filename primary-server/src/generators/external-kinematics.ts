/**
 * Generators replaying kinematics from a file.
 *
 *   extkin    JSON: { "events": [[particle, ...], ...] } or a bare array of events
 *   extkinO2  NDJSON: one event per line, either [particle, ...] or { "particles": [...] }
 *
 * The file is read on init, so a fresh instance always sees the current file.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { Particle } from '../../../shared/types/chunk.js';
import { particleSchema } from '../../../shared/types/messages.js';
import { ConfigurationError, GenerationError, formatError } from '../../../shared/lib/errors.js';
import type { EventSource } from './types.js';

const eventSchema = z.union([
  z.array(particleSchema),
  z.object({ particles: z.array(particleSchema) }).transform((event) => event.particles),
]);

const kinematicsFileSchema = z.union([
  z.array(eventSchema),
  z.object({ events: z.array(eventSchema) }).transform((file) => file.events),
]);

export type KinematicsFormat = 'json' | 'ndjson';

export function parseKinematics(text: string, format: KinematicsFormat, source: string): Particle[][] {
  if (format === 'json') {
    const result = kinematicsFileSchema.safeParse(parseJson(text, source));
    if (!result.success) {
      throw new ConfigurationError(`Invalid kinematics file ${source}: ${result.error.issues[0]?.message ?? 'unknown error'}`);
    }
    return result.data;
  }
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line, i) => {
      const result = eventSchema.safeParse(parseJson(line, `${source}:${i + 1}`));
      if (!result.success) {
        throw new ConfigurationError(`Invalid event on line ${i + 1} of ${source}`);
      }
      return result.data;
    });
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid JSON: ${formatError(err)}`, { cause: err });
  }
}

export class ExternalKinematicsGenerator implements EventSource {
  private events: Particle[][] = [];
  private next = 0;

  constructor(
    readonly name: string,
    private readonly file: string,
    private readonly format: KinematicsFormat,
  ) {}

  async init(): Promise<void> {
    let text: string;
    try {
      text = await fs.readFile(this.file, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Cannot read kinematics file ${this.file}: ${formatError(err)}`, { cause: err });
    }
    this.events = parseKinematics(text, this.format, this.file);
    this.next = 0;
  }

  async generate(): Promise<Particle[]> {
    const event = this.events[this.next];
    if (event === undefined) {
      throw new GenerationError(`Kinematics file ${this.file} exhausted after ${this.events.length} events`);
    }
    this.next++;
    return event.map((particle) => ({ ...particle }));
  }
}
