/**
 * Project: Raid Sync
 * File: tests/core/infra/sqliteLocalStore.test.ts
 * Summary: Scoped replacement, id remapping and outbound queue bookkeeping on SQLite.
 */

import assert from 'node:assert/strict';
import test, { type TestContext } from 'node:test';

import { SqliteLocalStore, type OutboundQueueRow, type TeamRaceRow } from '../../../src';

const createStore = (t: TestContext) => {
  const store = new SqliteLocalStore({ filename: ':memory:' });
  t.after(() => store.close());
  return store;
};

const entry = (teamId: number, raceId: number, bibNumber: number | null = null): TeamRaceRow => ({
  team_id: teamId,
  race_id: raceId,
  is_valid: 0,
  finish_time: null,
  bib_number: bibNumber,
});

const queued = (
  id: string,
  createdAt: number,
  status: OutboundQueueRow['status'] = 'pending',
): OutboundQueueRow => ({
  id,
  action: 'raid.create',
  payload: '{}',
  created_at: createdAt,
  status,
  attempts: 0,
  last_error: null,
});

test('upsert replaces the row sharing the same key', async (t) => {
  const store = createStore(t);

  await store.upsert('addresses', {
    id: 1,
    postal_code: '14000',
    city: 'Caen',
    street_name: 'Rue des Chênes',
    street_number: '12',
  });
  await store.upsert('addresses', {
    id: 1,
    postal_code: '14000',
    city: 'Caen',
    street_name: 'Rue des Chênes',
    street_number: '14',
  });

  assert.deepEqual(await store.query('addresses'), [
    { id: 1, postal_code: '14000', city: 'Caen', street_name: 'Rue des Chênes', street_number: '14' },
  ]);
});

test('replaceScope only touches rows of the given scope', async (t) => {
  const store = createStore(t);
  await store.upsertMany('team_races', [entry(1, 20, 1), entry(2, 20, 2), entry(3, 21, 1)]);

  await store.replaceScope('team_races', 'race_id', 20, [entry(2, 20, 5)]);

  assert.deepEqual(await store.query('team_races'), [entry(2, 20, 5), entry(3, 21, 1)]);
});

test('replaceAll swaps the whole table', async (t) => {
  const store = createStore(t);
  await store.upsertMany('team_members', [
    { team_id: 1, user_id: 1 },
    { team_id: 1, user_id: 2 },
  ]);

  await store.replaceAll('team_members', [{ team_id: 2, user_id: 3 }]);

  assert.deepEqual(await store.query('team_members'), [{ team_id: 2, user_id: 3 }]);
});

test('filters match null columns and delete returns the removed count', async (t) => {
  const store = createStore(t);
  await store.upsertMany('team_races', [entry(1, 20, null), entry(2, 20, 4)]);

  assert.deepEqual(await store.query('team_races', { bib_number: null }), [entry(1, 20, null)]);
  assert.equal(await store.delete('team_races', { team_id: 2, race_id: 20 }), 1);
  assert.equal(await store.delete('team_races', { team_id: 2, race_id: 20 }), 0);
  assert.equal(await store.clearScope('team_races', 'race_id', 20), 1);
});

test('remapping an id rewrites the entity and every reference to it', async (t) => {
  const store = createStore(t);
  await store.upsert('teams', { id: -5, manager_id: 1, name: 'Local team', image: null });
  await store.upsert('team_members', { team_id: -5, user_id: 1 });
  await store.upsert('team_races', entry(-5, 20, 3));
  await store.upsert('team_races', entry(9, 20, 1));

  await store.remapEntityId('team', -5, 42);

  assert.deepEqual(
    (await store.query('teams')).map((row) => row.id),
    [42],
  );
  assert.deepEqual(await store.query('team_members'), [{ team_id: 42, user_id: 1 }]);
  assert.deepEqual(await store.query('team_races'), [entry(9, 20, 1), entry(42, 20, 3)]);
});

test('remapping onto an id already cached keeps the remapped row', async (t) => {
  const store = createStore(t);
  await store.upsert('teams', { id: -5, manager_id: 1, name: 'Offline name', image: null });
  await store.upsert('teams', { id: 42, manager_id: 1, name: 'Server name', image: null });

  await store.remapEntityId('team', -5, 42);

  assert.deepEqual(await store.query('teams'), [
    { id: 42, manager_id: 1, name: 'Offline name', image: null },
  ]);
});

test('outbound entries are listed in creation order and updated in place', async (t) => {
  const store = createStore(t);
  await store.enqueueOutbound(queued('b', 2_000));
  await store.enqueueOutbound(queued('a', 1_000));
  await store.enqueueOutbound(queued('c', 2_000));
  await store.enqueueOutbound(queued('d', 500, 'rejected'));

  assert.deepEqual(
    (await store.listPendingOutbound()).map((row) => row.id),
    ['a', 'b', 'c'],
  );

  await store.updateOutbound('b', { status: 'rejected', attempts: 1, last_error: 'Forbidden.' });
  await store.updateOutbound('c', {});
  await store.dequeueOutbound('a');

  assert.deepEqual(
    (await store.listPendingOutbound()).map((row) => row.id),
    ['c'],
  );
  assert.deepEqual(
    (await store.listOutbound()).map((row) => [row.id, row.status, row.attempts, row.last_error]),
    [
      ['d', 'rejected', 0, null],
      ['b', 'rejected', 1, 'Forbidden.'],
      ['c', 'pending', 0, null],
    ],
  );
});

test('close can be called twice', async () => {
  const store = new SqliteLocalStore({ filename: ':memory:' });
  await store.close();
  await store.close();
});
