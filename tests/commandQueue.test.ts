import assert from 'node:assert/strict';
import { test } from './testHarness';
import { SerialCommandQueue } from '../src/application/playback/commandQueue';
import { isPlayerError } from '../src/domain/playback/errors';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

test('queue runs tasks one at a time in submission order', async () => {
  const queue = new SerialCommandQueue();
  const order: string[] = [];
  let running = 0;
  let maxRunning = 0;
  const task = (label: string, ms: number) => async () => {
    running += 1;
    maxRunning = Math.max(maxRunning, running);
    order.push(`start:${label}`);
    await new Promise((resolve) => setTimeout(resolve, ms));
    order.push(`end:${label}`);
    running -= 1;
    return label;
  };
  const results = await Promise.all([
    queue.enqueue('a', task('a', 15)),
    queue.enqueue('b', task('b', 1)),
    queue.enqueue('c', task('c', 5)),
  ]);
  assert.deepEqual(results, ['a', 'b', 'c']);
  assert.deepEqual(order, ['start:a', 'end:a', 'start:b', 'end:b', 'start:c', 'end:c']);
  assert.equal(maxRunning, 1);
  assert.equal(queue.isIdle(), true);
});

test('a failing task does not block the next one', async () => {
  const queue = new SerialCommandQueue();
  const failed = queue.enqueue('fail', async () => {
    throw new Error('boom');
  });
  const next = queue.enqueue('ok', async () => 'ok');
  await assert.rejects(failed, /boom/);
  assert.equal(await next, 'ok');
});

test('queue rejects with busy beyond the pending limit', async () => {
  const queue = new SerialCommandQueue(2);
  const gate = deferred();
  const accepted = [
    queue.enqueue('running', () => gate.promise),
    queue.enqueue('wait-1', async () => undefined),
    queue.enqueue('wait-2', async () => undefined),
  ];
  assert.equal(queue.size, 3);
  await assert.rejects(queue.enqueue('overflow', async () => undefined), (error: unknown) => {
    assert.ok(isPlayerError(error, 'busy'));
    assert.equal(error.details.command, 'overflow');
    return true;
  });
  gate.resolve();
  await Promise.all(accepted);
  assert.equal(queue.size, 0);
});

test('runIfIdle skips while another task is outstanding', async () => {
  const queue = new SerialCommandQueue();
  const gate = deferred();
  const running = queue.enqueue('long', () => gate.promise);
  assert.equal(queue.runIfIdle('poll', async () => 1), null);
  gate.resolve();
  await running;
  const polled = queue.runIfIdle('poll', async () => 1);
  assert.ok(polled);
  assert.equal(await polled, 1);
});
