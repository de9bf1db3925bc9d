/**
 * The generator the server drives: an event source plus trigger selection,
 * interaction vertex and optional embedding into a background stream.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { EventHeader, Particle, PrimaryEvent, Vertex } from '../../../shared/types/chunk.js';
import { eventHeaderSchema } from '../../../shared/types/messages.js';
import type { RandomSource } from '../../../shared/lib/random.js';
import { ConfigurationError, GenerationError, formatError } from '../../../shared/lib/errors.js';
import type { EventSource, Trigger } from './types.js';

const backgroundFileSchema = z.union([
  z.array(eventHeaderSchema),
  z.object({ headers: z.array(eventHeaderSchema) }).transform((file) => file.headers),
]);

export interface VertexSpread {
  sigmaX: number;
  sigmaY: number;
  sigmaZ: number;
}

export interface PrimaryGeneratorOptions {
  maxTrials: number;
  vertex: VertexSpread;
}

export class PrimaryGenerator {
  private background: EventHeader[] | null = null;
  private nextBackground = 0;
  private initialized = false;

  constructor(
    readonly source: EventSource,
    readonly trigger: Trigger,
    private readonly options: PrimaryGeneratorOptions,
  ) {}

  get name(): string {
    return this.source.name;
  }

  /** Take the interaction vertex of each event from the headers of a background stream. */
  async embedInto(file: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(file, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Cannot load background events from ${file}: ${formatError(err)}`, { cause: err });
    }
    const result = backgroundFileSchema.safeParse(json);
    if (!result.success || result.data.length === 0) {
      throw new ConfigurationError(`Background file ${file} holds no event headers`);
    }
    this.background = result.data;
    this.nextBackground = 0;
  }

  async init(): Promise<void> {
    await this.source.init();
    this.initialized = true;
  }

  async generateEvent(random: RandomSource): Promise<PrimaryEvent> {
    if (!this.initialized) {
      throw new GenerationError(`Generator ${this.name} used before init`);
    }
    let particles: Particle[] = [];
    let trials = 0;
    do {
      if (trials === this.options.maxTrials) {
        throw new GenerationError(
          `Trigger ${this.trigger.name} rejected ${trials} consecutive events from ${this.name}`,
        );
      }
      particles = await this.source.generate(random);
      trials++;
    } while (!this.trigger.accept(particles));

    const { vertex, backgroundIndex } = this.drawVertex(random);
    const header: EventHeader = {
      generator: this.name,
      trigger: this.trigger.name,
      nPrimaries: particles.length,
      vertex,
      trials,
    };
    if (backgroundIndex !== undefined) {
      header.embeddedEventIndex = backgroundIndex;
    }
    const { x, y, z } = vertex;
    for (const particle of particles) {
      particle.vx += x;
      particle.vy += y;
      particle.vz += z;
    }
    return { header, particles };
  }

  private drawVertex(random: RandomSource): { vertex: Vertex; backgroundIndex?: number } {
    if (this.background) {
      const backgroundIndex = this.nextBackground % this.background.length;
      this.nextBackground++;
      return { vertex: { ...this.background[backgroundIndex].vertex }, backgroundIndex };
    }
    const { sigmaX, sigmaY, sigmaZ } = this.options.vertex;
    return {
      vertex: {
        x: sigmaX > 0 ? random.nextGaussian(0, sigmaX) : 0,
        y: sigmaY > 0 ? random.nextGaussian(0, sigmaY) : 0,
        z: sigmaZ > 0 ? random.nextGaussian(0, sigmaZ) : 0,
      },
    };
  }
}
