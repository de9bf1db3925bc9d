import { describe, test } from 'node:test';
import assert from 'node:assert';
import type { Particle, PrimaryEvent } from '../../../shared/types/chunk.js';
import { buildChunk, buildExhaustionChunk, countParts, partRange, partitionEvent } from '../partition.js';

function makeEvent(n: number): PrimaryEvent {
  const particles: Particle[] = Array.from({ length: n }, (_, i) => ({
    pdg: 211,
    px: i,
    py: 0,
    pz: 0,
    e: 1,
    vx: 0,
    vy: 0,
    vz: 0,
    t: 0,
  }));
  return {
    header: { generator: 'test', trigger: 'none', nPrimaries: n, vertex: { x: 0, y: 0, z: 0 }, trials: 1 },
    particles,
  };
}

describe('countParts', () => {
  test('is ceil(N / C) with a minimum of one', () => {
    assert.strictEqual(countParts(1200, 500), 3);
    assert.strictEqual(countParts(1000, 500), 2);
    assert.strictEqual(countParts(1, 500), 1);
    assert.strictEqual(countParts(0, 500), 1);
  });
});

describe('partRange', () => {
  test('cuts parts from the back of the event', () => {
    assert.deepStrictEqual(partRange(1200, 500, 0), { start: 700, end: 1200 });
    assert.deepStrictEqual(partRange(1200, 500, 1), { start: 200, end: 700 });
    assert.deepStrictEqual(partRange(1200, 500, 2), { start: 0, end: 200 });
  });

  test('an empty event has one empty range', () => {
    assert.deepStrictEqual(partRange(0, 500, 0), { start: 0, end: 0 });
  });
});

describe('partitionEvent', () => {
  test('parts are disjoint and cover every particle exactly once', () => {
    for (const [n, c] of [[0, 1], [1, 1], [7, 3], [9, 3], [10, 1], [499, 500], [1201, 500]]) {
      const chunks = partitionEvent(makeEvent(n), { eventId: 1, maxEvents: 1, chunkSize: c, seed: 0 });
      assert.strictEqual(chunks.length, countParts(n, c), `N=${n} C=${c}`);
      const seen = chunks.flatMap((chunk) => chunk.particles.map((p) => p.px)).sort((a, b) => a - b);
      assert.deepStrictEqual(seen, Array.from({ length: n }, (_, i) => i), `N=${n} C=${c}`);
      assert.deepStrictEqual(
        chunks.map((chunk) => chunk.info.part),
        Array.from({ length: chunks.length }, (_, i) => i + 1),
      );
    }
  });

  test('N=1200, C=500 gives [700,1200), [200,700), [0,200)', () => {
    const chunks = partitionEvent(makeEvent(1200), { eventId: 1, maxEvents: 1, chunkSize: 500, seed: 0 });
    assert.deepStrictEqual(
      chunks.map((chunk) => [chunk.info.index, chunk.info.index + chunk.particles.length]),
      [[700, 1200], [200, 700], [0, 200]],
    );
    assert.ok(chunks.every((chunk) => chunk.info.nparts === 3));
  });
});

describe('buildChunk', () => {
  test('fills the sub-event info', () => {
    const chunk = buildChunk(makeEvent(3), { eventId: 2, maxEvents: 5, partIndex: 1, chunkSize: 2, seed: 12 });
    assert.strictEqual(chunk.particles.length, 1);
    assert.deepStrictEqual(
      { ...chunk.info, header: undefined },
      { eventId: 2, maxEvents: 5, part: 2, nparts: 2, seed: 12, index: 0, header: undefined },
    );
    assert.strictEqual(chunk.info.header.nPrimaries, 3);
  });

  test('an empty event yields one empty part that is not the exhaustion signal', () => {
    const chunk = buildChunk(makeEvent(0), { eventId: 1, maxEvents: 1, partIndex: 0, chunkSize: 500, seed: 0 });
    assert.strictEqual(chunk.particles.length, 0);
    assert.strictEqual(chunk.info.eventId, 1);
    assert.strictEqual(chunk.info.part, 1);
    assert.strictEqual(chunk.info.nparts, 1);
  });
});

test('buildExhaustionChunk carries ordinal -1 and no particles', () => {
  const chunk = buildExhaustionChunk(makeEvent(4), 2, 9);
  assert.deepStrictEqual(chunk.particles, []);
  assert.strictEqual(chunk.info.eventId, -1);
  assert.strictEqual(chunk.info.maxEvents, 2);
  assert.strictEqual(chunk.info.nparts, 0);
  assert.strictEqual(chunk.info.seed, 9);
});
