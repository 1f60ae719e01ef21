import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { UserLanes } from '../src/ingest/userLanes';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('UserLanes', () => {
  it('runs one user’s tasks strictly in queue order', async () => {
    const lanes = new UserLanes();
    const log: string[] = [];
    const gate = deferred();

    const first = lanes.run('u1', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = lanes.run('u1', async () => {
      log.push('second');
    });

    await new Promise((r) => setImmediate(r));
    assert.deepEqual(log, ['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    assert.deepEqual(log, ['first:start', 'first:end', 'second']);
  });

  it('does not block other users', async () => {
    const lanes = new UserLanes();
    const gate = deferred();
    let otherRan = false;

    const blocked = lanes.run('u1', () => gate.promise);
    await lanes.run('u2', async () => {
      otherRan = true;
    });

    assert.equal(otherRan, true);
    assert.equal(lanes.isBusy('u1'), true);
    gate.resolve();
    await blocked;
  });

  it('a failed task rejects for its caller but the lane keeps going', async () => {
    const lanes = new UserLanes();

    const failing = lanes.run('u1', async () => {
      throw new Error('boom');
    });
    const next = lanes.run('u1', async () => 'ok');

    await assert.rejects(failing, /boom/);
    assert.equal(await next, 'ok');
  });

  it('drain waits for every queued task and clears the lanes', async () => {
    const lanes = new UserLanes();
    const done: string[] = [];

    void lanes.run('u1', async () => {
      await new Promise((r) => setImmediate(r));
      done.push('u1');
    });
    void lanes.run('u2', async () => {
      done.push('u2');
    });

    await lanes.drain();
    assert.deepEqual(done.sort(), ['u1', 'u2']);
    assert.equal(lanes.activeLanes(), 0);
  });
});
