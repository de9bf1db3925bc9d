/**
 * Run configuration shared by the primary server (owner) and the workers
 * (which fetch a snapshot with a config request before building their engine).
 */

import type { LogLevel } from '../lib/logger.js';

export interface RunConfig {
  /** Generator kind, e.g. "boxgen", "extkin" */
  generator: string;
  /** Event trigger applied after generation, "none" to accept every event */
  trigger: string;
  /** Transport engine the workers should construct */
  mcEngine: string;
  /** Maximum number of primaries per chunk */
  chunkSize: number;
  /** Initial seed of the run; per-event seeds are derived from it */
  seed: number;
  /** Number of events to serve in this generation cycle */
  nEvents: number;
  /** Background event headers to embed the generated events into */
  embedIntoFile?: string;
  /** Kinematics input for the external-kinematics generators */
  extKinFile?: string;
  /** JSON file with generator parameters */
  configFile?: string;
  /** "scope.key=value;..." parameter overrides, applied after configFile */
  configKeyValues?: string;
  logVerbosity: LogLevel;
}

/** Fields a control message may override when reconfiguring a parked server. */
export type RunConfigOverrides = Partial<
  Pick<
    RunConfig,
    | 'generator'
    | 'trigger'
    | 'chunkSize'
    | 'seed'
    | 'nEvents'
    | 'embedIntoFile'
    | 'extKinFile'
    | 'configFile'
    | 'configKeyValues'
  >
>;

export type ReconfigRequest =
  | { kind: 'stop' }
  | { kind: 'reconfigure'; overrides: RunConfigOverrides };

/** Generators whose input may change between uses; never served from the generator cache. */
export const EXTERNAL_KINEMATICS_GENERATORS: readonly string[] = ['extkin', 'extkinO2'];

export function isExternalKinematics(generator: string): boolean {
  return EXTERNAL_KINEMATICS_GENERATORS.includes(generator);
}

/**
 * Build the configuration of the next generation cycle.
 * Unset overrides keep the current value; the result is a new object.
 */
export function applyOverrides(current: RunConfig, overrides: RunConfigOverrides): RunConfig {
  const next: RunConfig = { ...current };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(next, { [key]: value });
    }
  }
  return next;
}
