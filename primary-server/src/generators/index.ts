import type { RunConfig } from '../../../shared/types/run-config.js';
import { ConfigurationError } from '../../../shared/lib/errors.js';
import { BOX_PRESETS, BoxGenerator, readBoxSettings } from './box-generator.js';
import { ExternalKinematicsGenerator } from './external-kinematics.js';
import type { EventSourceBuilder } from './types.js';
import type { GeneratorParams } from '../params.js';

export type { EventSource, EventSourceBuilder, Trigger } from './types.js';
export { PrimaryGenerator } from './primary-generator.js';
export type { PrimaryGeneratorOptions, VertexSpread } from './primary-generator.js';
export { createTrigger, TRIGGER_NAMES } from './triggers.js';

function requireKinematicsFile(config: RunConfig): string {
  if (!config.extKinFile) {
    throw new ConfigurationError(`Generator ${config.generator} needs an external kinematics file (EXTKIN_FILE)`);
  }
  return config.extKinFile;
}

const boxBuilder: EventSourceBuilder = (config: RunConfig, params: GeneratorParams) =>
  new BoxGenerator(config.generator, readBoxSettings(config.generator, params));

export const BUILTIN_GENERATORS: Readonly<Record<string, EventSourceBuilder>> = {
  ...Object.fromEntries(Object.keys(BOX_PRESETS).map((name) => [name, boxBuilder])),
  extkin: (config) => new ExternalKinematicsGenerator(config.generator, requireKinematicsFile(config), 'json'),
  extkinO2: (config) => new ExternalKinematicsGenerator(config.generator, requireKinematicsFile(config), 'ndjson'),
};
