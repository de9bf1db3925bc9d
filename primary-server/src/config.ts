/**
 * Primary server configuration from the environment.
 *
 * Variables (defaults in parentheses):
 *   GENERATOR (boxgen), TRIGGER (none), MC_ENGINE (TGeant4), CHUNK_SIZE (500),
 *   SEED (-1, derive one), N_EVENTS (2), EMBED_INTO_FILE, EXTKIN_FILE,
 *   CONFIG_FILE, CONFIG_KEY_VALUES, LOG_LEVEL (info), AS_SERVICE (false),
 *   SERVER_TO_DRIVER_PIPE, WORK_PORT (25005), STATUS_PORT (25006),
 *   BIND_HOST (0.0.0.0), REPLY_TIMEOUT_MS (5000), CONTROL_SUBSCRIPTION,
 *   NOTIFY_TOPIC, GOOGLE_CLOUD_PROJECT
 */

import { z } from 'zod';
import type { RunConfig } from '../../shared/types/run-config.js';
import { booleanFlag, parseEnv, type Env } from '../../shared/lib/env.js';
import { LOG_LEVELS } from '../../shared/lib/logger.js';

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

const serverEnvSchema = z.object({
  GENERATOR: z.string().default('boxgen'),
  TRIGGER: z.string().default('none'),
  MC_ENGINE: z.string().default('TGeant4'),
  CHUNK_SIZE: z.coerce.number().int().min(1).default(500),
  SEED: z.coerce.number().int().default(-1),
  N_EVENTS: z.coerce.number().int().min(0).default(2),
  EMBED_INTO_FILE: z.string().optional(),
  EXTKIN_FILE: z.string().optional(),
  CONFIG_FILE: z.string().optional(),
  CONFIG_KEY_VALUES: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  AS_SERVICE: booleanFlag.default('false'),
  SERVER_TO_DRIVER_PIPE: z.coerce.number().int().min(0).optional(),
  WORK_PORT: port(25005),
  STATUS_PORT: port(25006),
  BIND_HOST: z.string().default('0.0.0.0'),
  REPLY_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  CONTROL_SUBSCRIPTION: z.string().optional(),
  NOTIFY_TOPIC: z.string().optional(),
  GOOGLE_CLOUD_PROJECT: z.string().optional(),
});

export interface ServerSettings {
  asService: boolean;
  driverPipeFd?: number;
  workPort: number;
  statusPort: number;
  bindHost: string;
  replyTimeoutMs: number;
  controlSubscription?: string;
  notifyTopic?: string;
  projectId?: string;
}

export interface ServerConfig {
  run: RunConfig;
  settings: ServerSettings;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const parsed = parseEnv(serverEnvSchema, env);
  return {
    run: {
      generator: parsed.GENERATOR,
      trigger: parsed.TRIGGER,
      mcEngine: parsed.MC_ENGINE,
      chunkSize: parsed.CHUNK_SIZE,
      seed: parsed.SEED,
      nEvents: parsed.N_EVENTS,
      embedIntoFile: parsed.EMBED_INTO_FILE,
      extKinFile: parsed.EXTKIN_FILE,
      configFile: parsed.CONFIG_FILE,
      configKeyValues: parsed.CONFIG_KEY_VALUES,
      logVerbosity: parsed.LOG_LEVEL,
    },
    settings: {
      asService: parsed.AS_SERVICE,
      driverPipeFd: parsed.SERVER_TO_DRIVER_PIPE,
      workPort: parsed.WORK_PORT,
      statusPort: parsed.STATUS_PORT,
      bindHost: parsed.BIND_HOST,
      replyTimeoutMs: parsed.REPLY_TIMEOUT_MS,
      controlSubscription: parsed.CONTROL_SUBSCRIPTION,
      notifyTopic: parsed.NOTIFY_TOPIC,
      projectId: parsed.GOOGLE_CLOUD_PROJECT,
    },
  };
}
