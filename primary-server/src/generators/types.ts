import type { Particle } from '../../../shared/types/chunk.js';
import type { RunConfig } from '../../../shared/types/run-config.js';
import type { RandomSource } from '../../../shared/lib/random.js';
import type { GeneratorParams } from '../params.js';

/** Produces the particles of one event. Latency is generator dependent. */
export interface EventSource {
  readonly name: string;
  /** One-time setup; may be expensive. */
  init(): Promise<void>;
  generate(random: RandomSource): Promise<Particle[]>;
}

export type EventSourceBuilder = (config: RunConfig, params: GeneratorParams) => EventSource;

export interface Trigger {
  readonly name: string;
  accept(particles: readonly Particle[]): boolean;
}
