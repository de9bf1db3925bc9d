/**
 * Generator Coordinator: owns the generator cache and produces events.
 *
 * Generator setup can be expensive, so instances are cached for the process
 * lifetime and reused when a later generation cycle asks for the same
 * generator. The cache key combines the generator name with a hash of every
 * setting the instance was built from (trigger, embedding source and the
 * generator, trigger and vertex parameters), so a reconfiguration that only
 * changes parameters gets a fresh instance. External-kinematics generators
 * are never cached: their input file may change between cycles.
 */

import { createHash } from 'crypto';
import type { PrimaryEvent } from '../../shared/types/chunk.js';
import { isExternalKinematics, type RunConfig } from '../../shared/types/run-config.js';
import type { RandomSource } from '../../shared/lib/random.js';
import { ConfigurationError, toGenerationError } from '../../shared/lib/errors.js';
import { createLogger, type Logger } from '../../shared/lib/logger.js';
import { formatDuration } from '../../shared/lib/format.js';
import {
  BUILTIN_GENERATORS,
  PrimaryGenerator,
  createTrigger,
  type EventSourceBuilder,
} from './generators/index.js';
import { integerParam, loadParams, numberParam, scopedParams, type GeneratorParams } from './params.js';

export function generatorCacheKey(config: RunConfig, params: GeneratorParams): string {
  const scoped = scopedParams(params, config.generator, 'trigger', 'vertex');
  const material = JSON.stringify([
    config.generator,
    config.trigger,
    config.embedIntoFile ?? '',
    Object.entries(scoped).sort(([a], [b]) => a.localeCompare(b)),
  ]);
  const digest = createHash('sha256').update(material).digest('hex');
  return `${config.generator}:${digest.slice(0, 12)}`;
}

export interface GeneratorCoordinatorOptions {
  builders?: Readonly<Record<string, EventSourceBuilder>>;
  logger?: Logger;
}

export class GeneratorCoordinator {
  private readonly cache = new Map<string, PrimaryGenerator>();
  private readonly builders: Readonly<Record<string, EventSourceBuilder>>;
  private readonly log: Logger;

  constructor(options: GeneratorCoordinatorOptions = {}) {
    this.builders = options.builders ?? BUILTIN_GENERATORS;
    this.log = options.logger ?? createLogger('Generators');
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /** Return a ready generator for `config`, from the cache when allowed. */
  async initialize(config: RunConfig): Promise<PrimaryGenerator> {
    const params = await loadParams(config.configFile, config.configKeyValues);
    const cacheable = !isExternalKinematics(config.generator);
    const key = generatorCacheKey(config, params);

    if (cacheable) {
      const cached = this.cache.get(key);
      if (cached) {
        this.log.info(`Found cached generator for ${config.generator}`, { key });
        return cached;
      }
    }

    const builder = this.builders[config.generator];
    if (!builder) {
      throw new ConfigurationError(
        `Unknown generator "${config.generator}" (known: ${Object.keys(this.builders).join(', ')})`,
      );
    }

    const startTime = Date.now();
    const generator = new PrimaryGenerator(builder(config, params), createTrigger(config.trigger, params), {
      maxTrials: integerParam(params, 'trigger.maxTrials', 100),
      vertex: {
        sigmaX: numberParam(params, 'vertex.sigmaX', 0),
        sigmaY: numberParam(params, 'vertex.sigmaY', 0),
        sigmaZ: numberParam(params, 'vertex.sigmaZ', 0),
      },
    });
    if (config.embedIntoFile) {
      await generator.embedInto(config.embedIntoFile);
    }
    await generator.init();

    if (cacheable) {
      this.cache.set(key, generator);
    }
    this.log.info(`Generator ${config.generator} set up in ${formatDuration(Date.now() - startTime)}`, {
      key,
      cached: cacheable,
    });
    return generator;
  }

  /**
   * Produce one fresh event. Resolves once the generator is done; any failure
   * surfaces as a GenerationError.
   */
  async produceEvent(generator: PrimaryGenerator, random: RandomSource): Promise<PrimaryEvent> {
    try {
      return await generator.generateEvent(random);
    } catch (err) {
      throw toGenerationError(err);
    }
  }
}
