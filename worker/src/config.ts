import { z } from 'zod';
import { parseEnv, type Env } from '../../shared/lib/env.js';

const workerEnvSchema = z.object({
  PRIMARY_SERVER_URL: z.string().url().default('http://localhost:25005/primary-get'),
  PRIMARY_STATUS_URL: z.string().url().optional(),
  WORKER_NAME: z.string().optional(),
  WORKER_COUNT: z.coerce.number().int().min(1).default(1),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(100_000),
  STATUS_TIMEOUT_MS: z.coerce.number().int().min(1).default(2000),
  IDLE_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  MAX_IDLE_CYCLES: z.coerce.number().int().min(1).default(30),
  SIMDATA_FILE: z.string().optional(),
});

export interface WorkerSettings {
  serverUrl: string;
  statusUrl?: string;
  workerName?: string;
  workerCount: number;
  requestTimeoutMs: number;
  statusTimeoutMs: number;
  idleBackoffMs: number;
  maxIdleCycles: number;
  simDataFile?: string;
}

export function loadWorkerSettings(env: Env = process.env): WorkerSettings {
  const parsed = parseEnv(workerEnvSchema, env);
  return {
    serverUrl: parsed.PRIMARY_SERVER_URL,
    statusUrl: parsed.PRIMARY_STATUS_URL,
    workerName: parsed.WORKER_NAME,
    workerCount: parsed.WORKER_COUNT,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    statusTimeoutMs: parsed.STATUS_TIMEOUT_MS,
    idleBackoffMs: parsed.IDLE_BACKOFF_MS,
    maxIdleCycles: parsed.MAX_IDLE_CYCLES,
    simDataFile: parsed.SIMDATA_FILE,
  };
}
