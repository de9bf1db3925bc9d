/**
 * Transport engines consume one chunk of primaries at a time.
 *
 * The reference engine propagates every primary on a straight line from its
 * vertex to the first surface of a closed cylinder around the beam axis and
 * records the crossing point, smeared by the detector resolution, as a hit.
 * Neutrinos and primaries at rest leave no hit.
 */

import * as fs from 'fs/promises';
import type { Particle, PrimaryChunk } from '../../shared/types/chunk.js';
import { ConfigurationError } from '../../shared/lib/errors.js';
import { RandomSource } from '../../shared/lib/random.js';

export const KNOWN_ENGINES = ['TGeant3', 'TGeant4', 'TFluka', 'O2TrivialMCEngine'] as const;

const NEUTRINOS = new Set([12, 14, 16]);

export interface Hit {
  x: number;
  y: number;
  z: number;
  surface: 'barrel' | 'endcap';
}

export interface ChunkSummary {
  eventId: number;
  part: number;
  nparts: number;
  seed: number;
  primaries: number;
  barrelHits: number;
  endcapHits: number;
  /** Energy of the primaries that reached the detector, GeV */
  depositedEnergy: number;
}

export interface TransportEngine {
  readonly name: string;
  setSeed(seed: number): void;
  process(chunk: PrimaryChunk): Promise<ChunkSummary>;
  close(): Promise<void>;
}

/** Destination of per-chunk summaries. */
export interface SummarySink {
  write(summary: ChunkSummary): Promise<void>;
}

/** Appends one JSON line per chunk. */
export class NdjsonFileSink implements SummarySink {
  constructor(readonly file: string) {}

  async write(summary: ChunkSummary): Promise<void> {
    await fs.appendFile(this.file, JSON.stringify(summary) + '\n', 'utf-8');
  }
}

export interface DetectorGeometry {
  /** cm */
  radius: number;
  /** cm */
  halfLength: number;
  /** Gaussian smearing of hit coordinates, cm */
  resolution: number;
}

export const DEFAULT_GEOMETRY: DetectorGeometry = { radius: 100, halfLength: 250, resolution: 0.1 };

/** Crossing of a straight track from the particle vertex with the cylinder, or null. */
export function traceToSurface(particle: Particle, geometry: DetectorGeometry): Hit | null {
  if (NEUTRINOS.has(Math.abs(particle.pdg))) return null;
  const p = Math.hypot(particle.px, particle.py, particle.pz);
  if (p === 0) return null;
  const { radius, halfLength } = geometry;
  const { vx: x0, vy: y0, vz: z0 } = particle;
  if (Math.hypot(x0, y0) >= radius || Math.abs(z0) >= halfLength) return null;

  const dx = particle.px / p;
  const dy = particle.py / p;
  const dz = particle.pz / p;

  const a = dx * dx + dy * dy;
  if (a > 0) {
    const b = 2 * (x0 * dx + y0 * dy);
    const c = x0 * x0 + y0 * y0 - radius * radius;
    const t = (-b + Math.sqrt(b * b - 4 * a * c)) / (2 * a);
    const z = z0 + t * dz;
    if (Math.abs(z) <= halfLength) {
      return { x: x0 + t * dx, y: y0 + t * dy, z, surface: 'barrel' };
    }
  }
  const t = (Math.sign(dz) * halfLength - z0) / dz;
  return { x: x0 + t * dx, y: y0 + t * dy, z: Math.sign(dz) * halfLength, surface: 'endcap' };
}

export class SummaryTransportEngine implements TransportEngine {
  private readonly random = new RandomSource();
  readonly hits: Hit[] = [];

  constructor(
    readonly name: string,
    private readonly sink: SummarySink | null = null,
    private readonly geometry: DetectorGeometry = DEFAULT_GEOMETRY,
  ) {}

  setSeed(seed: number): void {
    this.random.setSeed(seed);
  }

  async process(chunk: PrimaryChunk): Promise<ChunkSummary> {
    this.hits.length = 0;
    let depositedEnergy = 0;
    for (const particle of chunk.particles) {
      const hit = traceToSurface(particle, this.geometry);
      if (!hit) continue;
      this.hits.push(this.smear(hit));
      depositedEnergy += particle.e;
    }
    const summary: ChunkSummary = {
      eventId: chunk.info.eventId,
      part: chunk.info.part,
      nparts: chunk.info.nparts,
      seed: chunk.info.seed,
      primaries: chunk.particles.length,
      barrelHits: this.hits.filter((hit) => hit.surface === 'barrel').length,
      endcapHits: this.hits.filter((hit) => hit.surface === 'endcap').length,
      depositedEnergy,
    };
    await this.sink?.write(summary);
    return summary;
  }

  async close(): Promise<void> {
    this.hits.length = 0;
  }

  private smear(hit: Hit): Hit {
    const sigma = this.geometry.resolution;
    if (sigma <= 0) return hit;
    return {
      ...hit,
      x: this.random.nextGaussian(hit.x, sigma),
      y: this.random.nextGaussian(hit.y, sigma),
      z: this.random.nextGaussian(hit.z, sigma),
    };
  }
}

/** Engine for the `mcEngine` named in the run configuration. */
export function createTransportEngine(mcEngine: string, sink: SummarySink | null = null): TransportEngine {
  if (!KNOWN_ENGINES.some((name) => name === mcEngine)) {
    throw new ConfigurationError(`Unknown transport engine "${mcEngine}" (known: ${KNOWN_ENGINES.join(', ')})`);
  }
  return new SummaryTransportEngine(mcEngine, sink);
}
