import type { Particle } from '../../../shared/types/chunk.js';
import { ConfigurationError } from '../../../shared/lib/errors.js';
import { integerParam, type GeneratorParams } from '../params.js';
import type { Trigger } from './types.js';

export const TRIGGER_NAMES = ['none', 'multiplicity'] as const;

export function createTrigger(name: string, params: GeneratorParams): Trigger {
  switch (name) {
    case 'none':
      return { name, accept: () => true };
    case 'multiplicity': {
      const minParticles = integerParam(params, 'trigger.minParticles', 1);
      return {
        name,
        accept: (particles: readonly Particle[]) => particles.length >= minParticles,
      };
    }
    default:
      throw new ConfigurationError(`Unknown trigger "${name}" (known: ${TRIGGER_NAMES.join(', ')})`);
  }
}
