/**
 * Box gun: a fixed number of particles of one species with momentum,
 * pseudorapidity and azimuth drawn uniformly from configured ranges.
 */

import type { Particle } from '../../../shared/types/chunk.js';
import type { RandomSource } from '../../../shared/lib/random.js';
import { ConfigurationError } from '../../../shared/lib/errors.js';
import { integerParam, numberParam, type GeneratorParams } from '../params.js';
import type { EventSource } from './types.js';

// GeV
const PARTICLE_MASSES: Record<number, number> = {
  11: 0.000511,
  13: 0.105658,
  22: 0,
  211: 0.13957,
  321: 0.493677,
  2112: 0.939565,
  2212: 0.938272,
};

const YIELD_EVERY = 1000;

export interface BoxSettings {
  pdg: number;
  number: number;
  pMin: number;
  pMax: number;
  etaMin: number;
  etaMax: number;
  /** degrees */
  phiMin: number;
  phiMax: number;
}

export const BOX_PRESETS: Record<string, BoxSettings> = {
  boxgen: { pdg: 211, number: 10, pMin: 1, pMax: 1, etaMin: -1, etaMax: 1, phiMin: 0, phiMax: 360 },
  fwmugen: { pdg: 13, number: 1, pMin: 100, pMax: 100, etaMin: -4, etaMax: -2.5, phiMin: 0, phiMax: 360 },
  fwpigen: { pdg: -211, number: 10, pMin: 7, pMax: 7, etaMin: -4, etaMax: -2.5, phiMin: 0, phiMax: 360 },
};

export function massOf(pdg: number): number {
  const mass = PARTICLE_MASSES[Math.abs(pdg)];
  if (mass === undefined) {
    throw new ConfigurationError(`No mass known for PDG code ${pdg}`);
  }
  return mass;
}

export function readBoxSettings(name: string, params: GeneratorParams): BoxSettings {
  const preset = BOX_PRESETS[name] ?? BOX_PRESETS.boxgen;
  const settings: BoxSettings = {
    pdg: integerParam(params, `${name}.pdg`, preset.pdg),
    number: integerParam(params, `${name}.number`, preset.number),
    pMin: numberParam(params, `${name}.pMin`, preset.pMin),
    pMax: numberParam(params, `${name}.pMax`, preset.pMax),
    etaMin: numberParam(params, `${name}.etaMin`, preset.etaMin),
    etaMax: numberParam(params, `${name}.etaMax`, preset.etaMax),
    phiMin: numberParam(params, `${name}.phiMin`, preset.phiMin),
    phiMax: numberParam(params, `${name}.phiMax`, preset.phiMax),
  };
  if (settings.number < 0) throw new ConfigurationError(`${name}.number must not be negative`);
  if (settings.pMin > settings.pMax) throw new ConfigurationError(`${name}.pMin exceeds ${name}.pMax`);
  if (settings.etaMin > settings.etaMax) throw new ConfigurationError(`${name}.etaMin exceeds ${name}.etaMax`);
  massOf(settings.pdg);
  return settings;
}

export class BoxGenerator implements EventSource {
  private readonly mass: number;

  constructor(readonly name: string, private readonly settings: BoxSettings) {
    this.mass = massOf(settings.pdg);
  }

  async init(): Promise<void> {}

  async generate(random: RandomSource): Promise<Particle[]> {
    const { pdg, number, pMin, pMax, etaMin, etaMax, phiMin, phiMax } = this.settings;
    const particles: Particle[] = [];
    for (let i = 0; i < number; i++) {
      // keep the event loop responsive for large multiplicities
      if (i % YIELD_EVERY === 0) await new Promise<void>((resolve) => setImmediate(resolve));
      const p = random.nextInRange(pMin, pMax);
      const eta = random.nextInRange(etaMin, etaMax);
      const phi = (random.nextInRange(phiMin, phiMax) * Math.PI) / 180;
      const pt = p / Math.cosh(eta);
      particles.push({
        pdg,
        px: pt * Math.cos(phi),
        py: pt * Math.sin(phi),
        pz: pt * Math.sinh(eta),
        e: Math.sqrt(p * p + this.mass * this.mass),
        vx: 0,
        vy: 0,
        vz: 0,
        t: 0,
      });
    }
    return particles;
  }
}
