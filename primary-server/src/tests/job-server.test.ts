import { describe, test, before, after } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Publisher } from '../../../shared/types/channel.js';
import type { Particle, PrimaryChunk } from '../../../shared/types/chunk.js';
import { CONFIG_REQUEST, WORK_REQUEST, decodeReply, type WorkReply } from '../../../shared/types/messages.js';
import type { RunConfig } from '../../../shared/types/run-config.js';
import { LifecycleState } from '../../../shared/types/state-machine.js';
import { InProcessRequestReply, InProcessTopic } from '../../../shared/lib/in-process-channel.js';
import { RandomSource } from '../../../shared/lib/random.js';
import { DriverPipe, openDriverPipe } from '../driver-pipe.js';
import { GeneratorCoordinator } from '../generator-coordinator.js';
import type { EventSource } from '../generators/index.js';
import { JobServer } from '../job-server.js';
import { ReconfigurationListener } from '../reconfig-listener.js';

const quiet = { debug() {}, info() {}, warn() {}, error() {} };

function runConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    generator: 'fake',
    trigger: 'none',
    mcEngine: 'TGeant4',
    chunkSize: 500,
    seed: 40,
    nEvents: 2,
    logVerbosity: 'info',
    ...overrides,
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

async function waitFor(condition: () => boolean, what: string): Promise<void> {
  for (let i = 0; i < 200; i++) {
    if (condition()) return;
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  assert.fail(`timed out waiting for ${what}`);
}

/** Events of the given sizes, in order; the last size repeats. Particle i has px = i. */
class SequenceSource implements EventSource {
  readonly name = 'fake';
  calls = 0;

  constructor(
    private readonly sizes: number[],
    private readonly gate: Promise<void> | null = null,
    private readonly failure: Error | null = null,
  ) {}

  async init(): Promise<void> {}

  async generate(): Promise<Particle[]> {
    if (this.gate) await this.gate;
    if (this.failure) throw this.failure;
    const n = this.sizes[Math.min(this.calls, this.sizes.length - 1)];
    this.calls++;
    return Array.from({ length: n }, (_, i) => ({ pdg: 211, px: i, py: 0, pz: 0, e: 1, vx: 0, vy: 0, vz: 0, t: 0 }));
  }
}

/** One particle per event whose px is the next draw of the server's random source. */
class DrawingSource implements EventSource {
  readonly name = 'fake';

  async init(): Promise<void> {}

  async generate(random: RandomSource): Promise<Particle[]> {
    return [{ pdg: 13, px: random.nextFloat(), py: 0, pz: 0, e: 1, vx: 0, vy: 0, vz: 0, t: 0 }];
  }
}

interface Setup {
  config?: Partial<RunConfig>;
  source?: EventSource;
  random?: RandomSource;
  asService?: boolean;
  listener?: ReconfigurationListener | null;
  driverPipe?: DriverPipe | null;
}

function createServer(setup: Setup = {}) {
  const channel = new InProcessRequestReply();
  const notifications = new InProcessTopic();
  const source = setup.source ?? new SequenceSource([3]);
  const server = new JobServer({
    config: runConfig(setup.config),
    work: channel.server,
    asService: setup.asService,
    listener: setup.listener,
    driverPipe: setup.driverPipe,
    coordinator: new GeneratorCoordinator({ builders: { fake: () => source }, logger: quiet }),
    random: setup.random,
    notifications,
    replyTimeoutMs: 100,
    logger: quiet,
  });
  return { server, client: channel.connect(), notifications };
}

type Client = ReturnType<typeof createServer>['client'];

async function call(server: JobServer, client: Client, payload: string = WORK_REQUEST) {
  assert.strictEqual(await client.send(payload, 100), true);
  const more = await server.serveOnce(1000);
  const raw = await client.receive(1000);
  assert.ok(raw !== null, 'no reply');
  const decoded = decodeReply(raw);
  assert.ok(decoded.success);
  return { raw, reply: decoded.reply, more };
}

function chunkOf(reply: WorkReply): PrimaryChunk {
  if (reply.kind !== 'chunk') assert.fail(`expected a chunk, got ${reply.kind}`);
  return reply.chunk;
}

function position(chunk: PrimaryChunk) {
  const { eventId, part, nparts, index, seed } = chunk.info;
  return { eventId, part, nparts, index, seed, particles: chunk.particles.length };
}

/** Notification publisher that answers "awaiting input" with scripted control messages. */
class ScriptedDriver implements Publisher {
  readonly published: string[] = [];

  constructor(
    private readonly control: InProcessTopic,
    private readonly commands: string[],
  ) {}

  async publish(message: string): Promise<void> {
    this.published.push(message);
    if (message.endsWith('AWAITING INPUT')) {
      for (const command of this.commands) {
        await this.control.publish(command);
      }
    }
  }
}

function scriptedListener(commands: string[]) {
  const control = new InProcessTopic();
  const driver = new ScriptedDriver(control, commands);
  const listener = new ReconfigurationListener({
    connect: () => control.subscribe(),
    notifications: driver,
    logger: quiet,
  });
  return { listener, driver };
}

describe('JobServer serving', () => {
  test('serves every part of each event back to front, then the exhaustion signal', async () => {
    const { server, client } = createServer({ source: new SequenceSource([1200, 3]) });
    await server.init();

    const served = [];
    for (let i = 0; i < 4; i++) {
      served.push(position(chunkOf((await call(server, client)).reply)));
    }
    assert.deepStrictEqual(served, [
      { eventId: 1, part: 1, nparts: 3, index: 700, seed: 41, particles: 500 },
      { eventId: 1, part: 2, nparts: 3, index: 200, seed: 41, particles: 500 },
      { eventId: 1, part: 3, nparts: 3, index: 0, seed: 41, particles: 200 },
      { eventId: 2, part: 1, nparts: 1, index: 0, seed: 42, particles: 3 },
    ]);
    assert.strictEqual(server.getState(), LifecycleState.ReadyToServe);

    const last = await call(server, client);
    assert.deepStrictEqual(position(chunkOf(last.reply)), {
      eventId: -1,
      part: 0,
      nparts: 0,
      index: 0,
      seed: 42,
      particles: 0,
    });
    assert.strictEqual(last.more, false);
    assert.strictEqual(server.getState(), LifecycleState.Idle);
    await server.close();
  });

  test('parts carry the particles of their range', async () => {
    const { server, client } = createServer({
      config: { chunkSize: 2, nEvents: 1 },
      source: new SequenceSource([5]),
    });
    await server.init();

    const parts = [];
    for (let i = 0; i < 3; i++) {
      parts.push(chunkOf((await call(server, client)).reply).particles.map((p) => p.px));
    }
    assert.deepStrictEqual(parts, [[3, 4], [1, 2], [0]]);
    await server.close();
  });

  test('an event without particles is served as one empty part', async () => {
    const { server, client } = createServer({ config: { nEvents: 1 }, source: new SequenceSource([0]) });
    await server.init();

    const first = chunkOf((await call(server, client)).reply);
    assert.deepStrictEqual(position(first), { eventId: 1, part: 1, nparts: 1, index: 0, seed: 41, particles: 0 });
    assert.strictEqual(chunkOf((await call(server, client)).reply).info.eventId, -1);
    await server.close();
  });

  test('with no events the first work request gets the exhaustion signal', async () => {
    const { server, client } = createServer({ config: { nEvents: 0 } });
    await server.init();

    const { reply, more } = await call(server, client);
    assert.strictEqual(chunkOf(reply).info.eventId, -1);
    assert.strictEqual(more, false);
    assert.strictEqual(server.getState(), LifecycleState.Idle);
    await server.close();
  });

  test('an idle server keeps answering work requests with the exhaustion signal', async () => {
    const { server, client } = createServer({ config: { nEvents: 1 } });
    await server.init();

    await call(server, client);
    for (let i = 0; i < 3; i++) {
      const { reply, more } = await call(server, client);
      assert.strictEqual(chunkOf(reply).info.eventId, -1);
      assert.strictEqual(more, false);
    }
    assert.deepStrictEqual(server.cursor, { eventCounter: 1, partCounter: 1, needNewEvent: true });
    await server.close();
  });

  test('a chunk whose reply was not delivered goes to the next work request', async () => {
    const { server, client } = createServer({ config: { chunkSize: 2, nEvents: 1 }, source: new SequenceSource([4]) });
    await server.init();

    assert.strictEqual(await client.send(WORK_REQUEST, 100), true);
    client.cancel();
    assert.strictEqual(await server.serveOnce(1000), true);

    const served = [];
    for (let i = 0; i < 3; i++) {
      const chunk = chunkOf((await call(server, client)).reply);
      served.push([chunk.info.eventId, chunk.info.part, chunk.info.index]);
    }
    assert.deepStrictEqual(served, [[1, 1, 2], [1, 2, 0], [-1, 0, 0]]);
    await server.close();
  });

  test('notifies the driver pipe when an event starts', async () => {
    class RecordingPipe extends DriverPipe {
      readonly events: number[] = [];
      notifyEventStarted(eventId: number): void {
        this.events.push(eventId);
      }
    }
    const pipe = new RecordingPipe(-1, quiet);
    const { server, client } = createServer({
      config: { chunkSize: 2 },
      source: new SequenceSource([3]),
      driverPipe: pipe,
    });
    await server.init();

    for (let i = 0; i < 4; i++) await call(server, client);
    assert.deepStrictEqual(pipe.events, [1, 2]);
    await server.close();
  });
});

describe('JobServer lifecycle', () => {
  test('announces initialization and moves through WaitingEvent to ReadyToServe', async () => {
    const gate = deferred();
    const { server, notifications } = createServer({ source: new SequenceSource([3], gate.promise) });
    assert.strictEqual(server.getState(), LifecycleState.Initializing);

    await server.init();
    assert.deepStrictEqual(notifications.published, ['SERVER : INITIALIZING']);
    await waitFor(() => server.getState() === LifecycleState.WaitingEvent, 'WaitingEvent');

    gate.resolve();
    await waitFor(() => server.getState() === LifecycleState.ReadyToServe, 'ReadyToServe');
    await server.close();
    assert.strictEqual(server.getState(), LifecycleState.Stopped);
  });

  test('answers config requests while the first event is still being generated', async () => {
    const gate = deferred();
    const { server, client } = createServer({
      config: { seed: -1 },
      source: new SequenceSource([3], gate.promise),
    });
    await server.init();
    await waitFor(() => server.getState() === LifecycleState.WaitingEvent, 'WaitingEvent');

    const first = await call(server, client, CONFIG_REQUEST);
    const second = await call(server, client, CONFIG_REQUEST);
    assert.strictEqual(first.raw, second.raw);
    if (first.reply.kind !== 'config') assert.fail('expected a config reply');
    assert.strictEqual(first.reply.config.generator, 'fake');
    assert.strictEqual(first.reply.config.seed, server.getConfig().seed);
    assert.ok(first.reply.config.seed >= 0, 'a negative seed is replaced by a derived one');
    assert.strictEqual(server.getState(), LifecycleState.WaitingEvent);

    gate.resolve();
    await server.close();
  });

  test('answers unknown requests with an error and keeps serving', async () => {
    const { server, client } = createServer();
    await server.init();

    const { reply, more } = await call(server, client, 'hello');
    assert.deepStrictEqual(reply, { kind: 'error', code: 'unknown-request', message: 'Unknown request "hello"' });
    assert.strictEqual(more, true);
    assert.strictEqual(chunkOf((await call(server, client)).reply).info.eventId, 1);
    await server.close();
  });

  test('stops after a generation failure', async () => {
    const { server, client } = createServer({
      source: new SequenceSource([3], null, new Error('boom')),
    });
    await server.init();

    const { reply, more } = await call(server, client);
    assert.deepStrictEqual(reply, {
      kind: 'error',
      code: 'generation-failed',
      message: 'Event generation failed: boom',
    });
    assert.strictEqual(more, false);
    assert.strictEqual(server.getState(), LifecycleState.Stopped);
    assert.strictEqual(server.failure?.message, 'Event generation failed: boom');
    assert.strictEqual(await server.serveOnce(10), false);
    await server.close();
  });
});

describe('JobServer as a service', () => {
  test('reconfiguration restarts the cycle at event 1, part 1', async () => {
    const { listener, driver } = scriptedListener(['-n 1 --seed 100']);
    const { server, client } = createServer({
      config: { nEvents: 1, seed: 10 },
      source: new SequenceSource([2, 5]),
      asService: true,
      listener,
    });
    await server.init();

    assert.deepStrictEqual(position(chunkOf((await call(server, client)).reply)), {
      eventId: 1,
      part: 1,
      nparts: 1,
      index: 0,
      seed: 11,
      particles: 2,
    });
    const exhausted = await call(server, client);
    assert.strictEqual(chunkOf(exhausted.reply).info.eventId, -1);
    assert.strictEqual(exhausted.more, true);
    assert.strictEqual(server.getState(), LifecycleState.Idle);

    assert.strictEqual(await server.serveOnce(), true);
    assert.deepStrictEqual(driver.published, ['PRIMSERVER : STATUS : AWAITING INPUT']);
    assert.deepStrictEqual(server.cursor, { eventCounter: 0, partCounter: 0, needNewEvent: true });
    assert.strictEqual(server.getConfig().seed, 100);

    assert.deepStrictEqual(position(chunkOf((await call(server, client)).reply)), {
      eventId: 1,
      part: 1,
      nparts: 1,
      index: 0,
      seed: 101,
      particles: 5,
    });
    await server.close();
  });

  test('reconfiguration without a seed derives a new one', async () => {
    const derived = [500, 900];
    const random = new RandomSource(0, () => {
      const seed = derived.shift();
      return seed === undefined ? assert.fail('unexpected seed derivation') : seed;
    });
    const { listener } = scriptedListener(['-n 1']);
    const { server, client } = createServer({
      config: { nEvents: 1, seed: -1 },
      source: new DrawingSource(),
      random,
      asService: true,
      listener,
    });
    await server.init();

    const first = chunkOf((await call(server, client)).reply);
    assert.strictEqual(first.info.seed, 501);
    await call(server, client);

    assert.strictEqual(await server.serveOnce(), true);
    assert.strictEqual(server.getConfig().seed, 900);
    const second = chunkOf((await call(server, client)).reply);
    assert.strictEqual(second.info.seed, 901);
    assert.notStrictEqual(second.particles[0].px, first.particles[0].px);
    await server.close();
  });

  test('a stop command stops the server', async () => {
    const { listener } = scriptedListener(['--stop']);
    const { server, client } = createServer({ config: { nEvents: 0 }, asService: true, listener });
    await server.init();

    assert.strictEqual((await call(server, client)).more, true);
    assert.strictEqual(await server.serveOnce(), false);
    assert.strictEqual(server.getState(), LifecycleState.Stopped);
    assert.strictEqual(await server.serveOnce(), false);
    await server.close();
  });

  test('without a control channel an idle service stops', async () => {
    const { server, client } = createServer({ config: { nEvents: 0 }, asService: true });
    await server.init();

    await call(server, client);
    assert.strictEqual(await server.serveOnce(), false);
    assert.strictEqual(server.getState(), LifecycleState.Stopped);
    await server.close();
  });
});

describe('DriverPipe', () => {
  let dir = '';

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'driver-pipe-test-'));
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('writes the event ordinal as a 4-byte little-endian integer', async () => {
    const file = path.join(dir, 'pipe');
    const fd = fs.openSync(file, 'w');
    try {
      const pipe = openDriverPipe(fd, quiet);
      assert.ok(pipe);
      pipe.notifyEventStarted(7);
      assert.strictEqual(fs.statSync(file).size, 4);
      assert.strictEqual(fs.readFileSync(file).readInt32LE(0), 7);
    } finally {
      fs.closeSync(fd);
    }
  });

  test('ordinals written back to back keep their order', () => {
    const file = path.join(dir, 'ordered');
    const fd = fs.openSync(file, 'w');
    try {
      const pipe = new DriverPipe(fd, quiet);
      for (let eventId = 1; eventId <= 50; eventId++) pipe.notifyEventStarted(eventId);
      const written = fs.readFileSync(file);
      const ordinals = Array.from({ length: written.length / 4 }, (_, i) => written.readInt32LE(i * 4));
      assert.deepStrictEqual(ordinals, Array.from({ length: 50 }, (_, i) => i + 1));
    } finally {
      fs.closeSync(fd);
    }
  });

  test('a failed write is logged and does not throw', () => {
    const warnings: string[] = [];
    const pipe = new DriverPipe(-1, { ...quiet, warn: (message: string) => warnings.push(message) });
    pipe.notifyEventStarted(3);
    assert.deepStrictEqual(warnings, ['Could not notify driver of new event']);
  });

  test('no pipe is opened without a handle', () => {
    assert.strictEqual(openDriverPipe(undefined, quiet), null);
  });
});
