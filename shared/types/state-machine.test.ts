import { describe, test } from 'node:test';
import assert from 'node:assert';
import {
  LifecycleState,
  acceptsWorkRequests,
  canTransition,
  isLifecycleState,
  isTerminalState,
  stateName,
} from './state-machine.js';

const { Initializing, WaitingEvent, ReadyToServe, Idle, Stopped } = LifecycleState;

describe('canTransition', () => {
  test('allows the serving path', () => {
    assert.strictEqual(canTransition(Initializing, WaitingEvent), true);
    assert.strictEqual(canTransition(WaitingEvent, ReadyToServe), true);
    assert.strictEqual(canTransition(ReadyToServe, Idle), true);
  });

  test('allows reconfiguration and stop from Idle', () => {
    assert.strictEqual(canTransition(Idle, Initializing), true);
    assert.strictEqual(canTransition(Idle, Stopped), true);
  });

  test('refuses going back without passing through Idle', () => {
    assert.strictEqual(canTransition(ReadyToServe, WaitingEvent), false);
    assert.strictEqual(canTransition(ReadyToServe, Initializing), false);
    assert.strictEqual(canTransition(Idle, ReadyToServe), false);
  });

  test('Stopped is terminal', () => {
    for (const to of [Initializing, WaitingEvent, ReadyToServe, Idle]) {
      assert.strictEqual(canTransition(Stopped, to), false);
    }
    assert.strictEqual(isTerminalState(Stopped), true);
    assert.strictEqual(isTerminalState(Idle), false);
  });
});

test('acceptsWorkRequests is false only for Idle and Stopped', () => {
  assert.deepStrictEqual(
    [Initializing, WaitingEvent, ReadyToServe, Idle, Stopped].map(acceptsWorkRequests),
    [true, true, true, false, false],
  );
});

test('state values and names', () => {
  assert.strictEqual(stateName(WaitingEvent), 'WaitingEvent');
  assert.strictEqual(Idle, 3);
  assert.strictEqual(isLifecycleState(4), true);
  assert.strictEqual(isLifecycleState(5), false);
});
