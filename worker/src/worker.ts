import 'dotenv/config';

/**
 * Simulation worker
 *
 * 1. Loads config from Google Secret Manager (if GOOGLE_CLOUD_PROJECT set) and env
 * 2. Fetches the run configuration from the primary server (fatal on failure)
 * 3. Starts WORKER_COUNT kernels, each with its own channels and transport engine
 * 4. Each kernel requests and processes chunks until the server has no more work
 */

import * as os from 'os';
import { ServerUnavailableError, formatError } from '../../shared/lib/errors.js';
import { createLogger, setLogLevel } from '../../shared/lib/logger.js';
import { withRetry } from '../../shared/lib/retry.js';
import { loadConfigFromSecretManager } from '../../shared/lib/secret-config.js';
import { loadWorkerSettings, type WorkerSettings } from './config.js';
import { SimWorker, querySimConfig, type WorkerSummary } from './kernel.js';
import { HttpRequestChannel } from './server-client.js';
import { NdjsonFileSink, createTransportEngine } from './transport-engine.js';

const SECRET_NAME = 'sim-worker-config';
const SHUTDOWN_TIMEOUT_MS = 30_000;

const log = createLogger('Worker');

const workers: SimWorker[] = [];

// ============================================================================
// Worker Naming
// ============================================================================

/**
 * Get the worker's display name.
 * Priority: WORKER_NAME env var > hostname
 */
function getWorkerName(settings: WorkerSettings): string {
  const envName = settings.workerName?.trim();
  if (envName && envName.length > 0) return envName;
  return os.hostname();
}

// ============================================================================
// Shutdown Handler
// ============================================================================

let isShuttingDown = false;

function handleShutdown(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`Received ${signal}, finishing current chunks...`);
  for (const worker of workers) {
    worker.stop();
  }

  setTimeout(() => {
    log.error('Forced shutdown after timeout');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS).unref();
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<number> {
  await loadConfigFromSecretManager(SECRET_NAME);
  const settings = loadWorkerSettings();
  const name = getWorkerName(settings);

  log.info('Worker starting...', {
    name,
    server: settings.serverUrl,
    status: settings.statusUrl ?? null,
    kernels: settings.workerCount,
  });

  const configChannel = new HttpRequestChannel(settings.serverUrl);
  const startTime = Date.now();
  const runConfig = await withRetry(
    () => querySimConfig(configChannel, settings.requestTimeoutMs),
    {
      maxAttempts: 3,
      label: 'Config request',
      retryable: (error) => error instanceof ServerUnavailableError,
      logger: log,
    },
  ).finally(() => configChannel.close());
  setLogLevel(runConfig.logVerbosity);
  log.info(`Run configuration received in ${Date.now() - startTime}ms`, {
    generator: runConfig.generator,
    mcEngine: runConfig.mcEngine,
    nEvents: runConfig.nEvents,
  });

  const sink = settings.simDataFile ? new NdjsonFileSink(settings.simDataFile) : null;
  for (let index = 0; index < settings.workerCount; index++) {
    workers.push(
      new SimWorker({
        id: `${name}/${index}`,
        work: new HttpRequestChannel(settings.serverUrl),
        status: settings.statusUrl ? new HttpRequestChannel(settings.statusUrl) : null,
        engine: createTransportEngine(runConfig.mcEngine, sink),
        requestTimeoutMs: settings.requestTimeoutMs,
        statusTimeoutMs: settings.statusTimeoutMs,
        idleBackoffMs: settings.idleBackoffMs,
        maxIdleCycles: settings.maxIdleCycles,
      }),
    );
  }

  const summaries: WorkerSummary[] = await Promise.all(
    workers.map(async (worker) => {
      try {
        return await worker.run();
      } finally {
        await worker.close();
      }
    }),
  );

  for (const summary of summaries) {
    log.info(`Kernel ${summary.id} finished: ${summary.result}`, {
      chunks: summary.chunksProcessed,
      particles: summary.particlesProcessed,
    });
  }
  return summaries.some((summary) => summary.result === 'failed') ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log.error('Worker failed', { error: formatError(error) });
    process.exit(1);
  });
