import 'dotenv/config';

/**
 * Primary particle server
 *
 * 1. Loads config from Google Secret Manager (if GOOGLE_CLOUD_PROJECT set) and env
 * 2. Opens the work and status channels (HTTP)
 * 3. Starts generating the first event and serves chunks until the events are used up
 * 4. As a service: parks in Idle and waits for reconfiguration on the control channel (Pub/Sub)
 */

import type { Publisher, Subscriber } from '../../shared/types/channel.js';
import { formatError } from '../../shared/lib/errors.js';
import { createLogger, setLogLevel } from '../../shared/lib/logger.js';
import { loadConfigFromSecretManager } from '../../shared/lib/secret-config.js';
import { loadServerConfig, type ServerSettings } from './config.js';
import { openDriverPipe } from './driver-pipe.js';
import { JobServer } from './job-server.js';
import { LogPublisher } from './notifications.js';
import { ReconfigurationListener } from './reconfig-listener.js';
import { StatusResponder } from './status-responder.js';
import { HttpReplyChannel } from './transports/http-reply-channel.js';

const SECRET_NAME = 'primary-server-config';
const WORK_ROUTE = '/primary-get';
const STATUS_ROUTE = '/primary-status';
const SHUTDOWN_TIMEOUT_MS = 30_000;

const log = createLogger('PrimaryServer');

let jobServer: JobServer | null = null;
let statusResponder: StatusResponder | null = null;
let statusChannel: HttpReplyChannel | null = null;

// ============================================================================
// Control channel
// ============================================================================

interface ControlChannel {
  notifications: Publisher;
  connect: (() => Subscriber) | null;
}

async function openControlChannel(settings: ServerSettings): Promise<ControlChannel> {
  if (!settings.notifyTopic && !settings.controlSubscription) {
    return { notifications: new LogPublisher(), connect: null };
  }
  const { createPubSub, openSubscription, PubSubPublisher, PubSubSubscriber } = await import('./transports/pubsub.js');
  const pubsub = createPubSub(settings.projectId);
  const subscriptionName = settings.controlSubscription;
  log.info('Control channel: Pub/Sub', {
    topic: settings.notifyTopic ?? null,
    subscription: subscriptionName ?? null,
  });
  return {
    notifications: settings.notifyTopic ? new PubSubPublisher(pubsub, settings.notifyTopic) : new LogPublisher(),
    connect: subscriptionName
      ? () => new PubSubSubscriber(openSubscription(pubsub, subscriptionName), subscriptionName)
      : null,
  };
}

// ============================================================================
// Shutdown Handler
// ============================================================================

let isShuttingDown = false;

async function shutdown(): Promise<void> {
  await jobServer?.close();
  await statusResponder?.stop();
  await statusChannel?.close();
}

function handleShutdown(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`Received ${signal}, shutting down gracefully...`);
  shutdown()
    .then(() => {
      log.info('Shutdown complete');
      process.exit(0);
    })
    .catch((error: unknown) => {
      log.error('Error during shutdown', { error: formatError(error) });
      process.exit(1);
    });

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
  const { run, settings } = loadServerConfig();
  setLogLevel(run.logVerbosity);

  log.info('Primary server starting...', {
    generator: run.generator,
    nEvents: run.nEvents,
    chunkSize: run.chunkSize,
    asService: settings.asService,
  });

  const control = await openControlChannel(settings);
  const driverPipe = openDriverPipe(settings.driverPipeFd);

  const work = new HttpReplyChannel(WORK_ROUTE, createLogger('WorkChannel'));
  statusChannel = new HttpReplyChannel(STATUS_ROUTE, createLogger('StatusChannel'));
  const workPort = await work.listen(settings.workPort, settings.bindHost);
  const statusPort = await statusChannel.listen(settings.statusPort, settings.bindHost);
  log.info(`Work channel: http://${settings.bindHost}:${workPort}${WORK_ROUTE}`);
  log.info(`Status channel: http://${settings.bindHost}:${statusPort}${STATUS_ROUTE}`);

  const connect = control.connect;
  const listener =
    settings.asService && connect
      ? new ReconfigurationListener({ connect, notifications: control.notifications })
      : null;
  if (settings.asService && !listener) {
    log.warn('Running as a service without CONTROL_SUBSCRIPTION; the server stops once idle');
  }

  const server = new JobServer({
    config: run,
    work,
    asService: settings.asService,
    notifications: control.notifications,
    listener,
    driverPipe,
    replyTimeoutMs: settings.replyTimeoutMs,
  });
  jobServer = server;

  statusResponder = new StatusResponder(statusChannel, () => server.getState());
  statusResponder.start();

  await server.init();
  await server.run();

  if (!isShuttingDown) {
    await shutdown();
  }
  if (server.failure) {
    log.error('Stopped after generation failure', { error: server.failure.message });
    return 1;
  }
  log.info('No more work, exiting');
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    log.error('Primary server failed', { error: formatError(error) });
    process.exit(1);
  });
