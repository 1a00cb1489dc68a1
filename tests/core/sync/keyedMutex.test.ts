import assert from 'node:assert/strict';
import test from 'node:test';

import { KeyedMutex, createLocalIdGenerator, isLocalId, scopeKey } from '../../../src';
import { createFixedClock } from './__fixtures__/syncFixtures';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

test('tasks on the same key run one after the other', async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  let releaseFirst: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    releaseFirst = resolve;
  });

  const first = mutex.run('races:raid:1', async () => {
    events.push('first:start');
    await gate;
    events.push('first:end');
  });
  const second = mutex.run('races:raid:1', async () => {
    events.push('second');
  });

  await tick();
  assert.deepEqual(events, ['first:start']);
  assert.equal(mutex.isLocked('races:raid:1'), true);

  releaseFirst();
  await Promise.all([first, second]);

  assert.deepEqual(events, ['first:start', 'first:end', 'second']);
  assert.equal(mutex.size, 0);
});

test('tasks on different keys do not wait for each other', async () => {
  const mutex = new KeyedMutex();
  const events: string[] = [];
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const blocked = mutex.run('a', async () => {
    await gate;
    events.push('a');
  });
  await mutex.run('b', async () => {
    events.push('b');
  });

  assert.deepEqual(events, ['b']);
  release();
  await blocked;
  assert.deepEqual(events, ['b', 'a']);
});

test('a failing task releases the key for the next one', async () => {
  const mutex = new KeyedMutex();

  await assert.rejects(
    mutex.run('scope', async () => {
      throw new Error('boom');
    }),
    /boom/,
  );

  assert.equal(await mutex.run('scope', async () => 'next'), 'next');
  assert.equal(mutex.size, 0);
});

test('scope keys default to the whole entity kind', () => {
  assert.equal(scopeKey('raids'), 'raids:*');
  assert.equal(scopeKey('races:raid', 10), 'races:raid:10');
});

test('local ids are negative and unique under a frozen clock', () => {
  const ids = createLocalIdGenerator(createFixedClock(new Date(1_000)));

  assert.equal(ids.next(), -1_000);
  assert.equal(ids.next(), -1_001);
  assert.equal(ids.next(), -1_002);
  assert.equal(isLocalId(-1), true);
  assert.equal(isLocalId(12), false);
});
