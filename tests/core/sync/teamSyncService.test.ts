import assert from 'node:assert/strict';
import test from 'node:test';

import {
  CapacityError,
  CompositionError,
  EligibilityError,
  NotFoundError,
  TeamSyncService,
  type LocalStore,
  type User,
} from '../../../src';
import {
  backendTeamListItem,
  birthDateForAge,
  createSyncHarness,
  notFound,
  offline,
  ok,
  sampleRace,
  sampleUser,
  seedRace,
  seedUsers,
  wrapped,
} from './__fixtures__/syncFixtures';

const race = sampleRace({
  id: 20,
  maxTeams: 2,
  minTeamMembers: 2,
  maxTeamMembers: 3,
  ageThresholds: { minimum: 10, autonomous: 16, supervisor: 20 },
});

const runner = (id: number, age: number, overrides: Partial<User> = {}): User =>
  sampleUser({
    id,
    email: `runner${id}@example.test`,
    birthDate: birthDateForAge(age),
    licenceNumber: `LIC-${id}`,
    ...overrides,
  });

const buildService = async (users: readonly User[] = []) => {
  const harness = createSyncHarness();
  await seedRace(harness.store, race);
  await seedUsers(harness.store, users);
  return { ...harness, service: new TeamSyncService(harness.coordinator) };
};

const seedRoster = async (
  store: LocalStore,
  teamId: number,
  userIds: readonly number[],
) => {
  await store.upsert('teams', { id: teamId, manager_id: userIds[0] ?? 1, name: 'Team', image: null });
  await store.replaceScope(
    'team_members',
    'team_id',
    teamId,
    userIds.map((userId) => ({ team_id: teamId, user_id: userId })),
  );
};

test('offline entries receive consecutive bib numbers until the race is full', async () => {
  const { service, remote, store } = await buildService();

  const first = await service.registerTeamToRace(30, 20);
  const second = await service.registerTeamToRace(31, 20);

  assert.equal(first.confirmed, false);
  assert.equal(second.confirmed, false);
  assert.deepEqual(
    (await store.query('team_races', { race_id: 20 })).map((row) => [row.team_id, row.bib_number]),
    [
      [30, 1],
      [31, 2],
    ],
  );

  await assert.rejects(service.registerTeamToRace(32, 20), (error) => {
    assert.ok(error instanceof CapacityError);
    assert.equal(error.scope, 'Race 20');
    assert.equal(error.current, 2);
    return true;
  });
  assert.equal(remote.calls.length, 1);
});

test('confirmed entry keeps the bib number assigned by the backend', async () => {
  const { service, remote, store } = await buildService();
  remote.on('POST', '/teams/30/register-race', ok({ race_number: 7 }));

  const result = await service.registerTeamToRace(30, 20);

  assert.equal(result.confirmed, true);
  assert.deepEqual(remote.calls[0]?.body, { RAC_ID: 20 });
  assert.deepEqual(await store.query('team_races'), [
    { team_id: 30, race_id: 20, is_valid: 0, finish_time: null, bib_number: 7 },
  ]);
});

test('entering a team in an uncached race fails', async () => {
  const { service, remote } = await buildService();

  await assert.rejects(service.registerTeamToRace(30, 99), NotFoundError);
  assert.equal(remote.calls.length, 0);
});

test('adding a member to a full roster fails before any remote call', async () => {
  const users = [runner(1, 30), runner(2, 30), runner(3, 30), runner(4, 30)];
  const { service, remote, store } = await buildService(users);
  await seedRoster(store, 30, [1, 2, 3]);

  await assert.rejects(service.addTeamMember(30, 4, 20), (error) => {
    assert.ok(error instanceof CapacityError);
    assert.equal(error.scope, 'Team 30');
    assert.equal(error.limit, 3);
    return true;
  });
  assert.equal(remote.calls.length, 0);
});

test('ineligible runners cannot be added', async () => {
  const { service, remote } = await buildService([runner(1, 8)]);

  await assert.rejects(service.addTeamMember(30, 1, 20), (error) => {
    assert.ok(error instanceof EligibilityError);
    assert.deepEqual(error.reasons, ['invalidAge']);
    return true;
  });
  assert.equal(remote.calls.length, 0);
});

test('added member gets a membership and an empty registration', async () => {
  const { service, remote, store } = await buildService([runner(1, 30)]);
  remote.on('POST', '/teams/addMember', ok({ message: 'Member added.' }));

  const result = await service.addTeamMember(30, 1, 20);

  assert.equal(result.confirmed, true);
  assert.deepEqual(remote.calls[0]?.body, { TEA_ID: 30, USE_ID: 1 });
  assert.deepEqual(await store.query('team_members'), [{ team_id: 30, user_id: 1 }]);
  assert.deepEqual(await store.query('race_registrations'), [
    { user_id: 1, race_id: 20, chip_number: null, finish_time: null, pps_form: null },
  ]);
});

test('team too small for the race fails validation', async () => {
  const { service, store, remote } = await buildService([runner(1, 30)]);
  await seedRoster(store, 30, [1]);

  await assert.rejects(service.validateTeamForRace(30, 20), (error) => {
    assert.ok(error instanceof CompositionError);
    assert.equal(error.rule, 'team-size');
    assert.equal(error.reason, 'below-minimum-members');
    return true;
  });
  assert.equal(remote.calls.length, 0);
});

test('minors without a supervising adult fail the age bracket rule', async () => {
  const { service, store, remote } = await buildService([
    runner(1, 12),
    runner(2, 15),
    runner(3, 18),
  ]);
  await seedRoster(store, 30, [1, 2, 3]);

  await assert.rejects(service.validateTeamForRace(30, 20), (error) => {
    assert.ok(error instanceof CompositionError);
    assert.equal(error.rule, 'team-age-bracket');
    assert.equal(error.reason, 'missing-supervising-adult');
    return true;
  });
  assert.equal(remote.calls.length, 0);
});

test('members without a birth date block validation', async () => {
  const { service, store } = await buildService([runner(1, 30), runner(2, 30, { birthDate: null })]);
  await seedRoster(store, 30, [1, 2]);

  await assert.rejects(
    service.validateTeamForRace(30, 20),
    (error) => error instanceof CompositionError && error.rule === 'unknown-age',
  );
});

test('unlicensed members need a PPS form before the team is valid', async () => {
  const { service, store, remote } = await buildService([
    runner(1, 12, { licenceNumber: null }),
    runner(2, 40),
  ]);
  await seedRoster(store, 30, [1, 2]);
  await store.upsert('team_races', {
    team_id: 30,
    race_id: 20,
    is_valid: 0,
    finish_time: null,
    bib_number: 1,
  });

  await assert.rejects(service.validateTeamForRace(30, 20), (error) => {
    assert.ok(error instanceof CompositionError);
    assert.equal(error.rule, 'required-documents');
    assert.equal(error.message, 'Alex Martin has no licence and no PPS form for this race.');
    return true;
  });

  remote.on('POST', '/teams/member/update-info', ok(null, 204));
  remote.on('POST', '/teams/validate-race', ok({ message: 'Team validated.' }));

  await service.updateRegistration(1, 20, { ppsForm: 'pps-1.pdf' });
  const validated = await service.validateTeamForRace(30, 20);

  assert.equal(validated.confirmed, true);
  assert.deepEqual(remote.callsTo('POST', '/teams/member/update-info')[0]?.body, {
    USE_ID: 1,
    RAC_ID: 20,
    USR_PPS_FORM: 'pps-1.pdf',
  });
  assert.deepEqual(remote.callsTo('POST', '/teams/validate-race')[0]?.body, {
    TEA_ID: 30,
    RAC_ID: 20,
  });
  assert.deepEqual(await store.query('team_races'), [
    { team_id: 30, race_id: 20, is_valid: 1, finish_time: null, bib_number: 1 },
  ]);
});

test('invalidating a team offline flips the cached entry and queues the request', async () => {
  const { service, store } = await buildService();
  await store.upsert('team_races', {
    team_id: 30,
    race_id: 20,
    is_valid: 1,
    finish_time: null,
    bib_number: 3,
  });

  const result = await service.invalidateTeamForRace(30, 20);

  assert.equal(result.confirmed, false);
  assert.equal((await store.query('team_races'))[0]?.is_valid, 0);
  assert.deepEqual(
    (await store.listOutbound()).map((row) => row.action),
    ['team.invalidate'],
  );
});

test('offline availability lists the cached runners who may still join', async () => {
  const free = runner(1, 30);
  const taken = runner(2, 30);
  const young = runner(3, 9);
  const { service, store } = await buildService([free, taken, young]);
  await seedRoster(store, 31, [2]);
  await store.upsert('team_races', {
    team_id: 31,
    race_id: 20,
    is_valid: 0,
    finish_time: null,
    bib_number: 1,
  });

  const result = await service.fetchAvailableUsers(20);

  assert.equal(result.freshness, 'cached');
  assert.deepEqual(
    result.data.map((user) => user.id),
    [1],
  );
  assert.deepEqual(
    (await service.resolveAvailabilityLocally(20)).map(({ userId, reason }) => [userId, reason]),
    [
      [1, null],
      [2, 'alreadyInTeam'],
      [3, 'invalidAge'],
    ],
  );
});

test('fresh roster replaces the cached members of the team', async () => {
  const { service, remote, store } = await buildService([runner(9, 30)]);
  await seedRoster(store, 30, [9]);
  remote.on(
    'GET',
    '/teams/30/races/20',
    ok(
      wrapped({
        team: {
          id: 30,
          name: 'Les Rapides',
          manager_id: 1,
          image: null,
          is_valid: 0,
          race_number: 4,
        },
        members: [
          {
            id: 1,
            first_name: 'Camille',
            last_name: 'Durand',
            email: 'camille@example.test',
            licence_number: null,
            pps_form: 'pps-1.pdf',
            chip_number: 812,
          },
        ],
      }),
    ),
    offline(),
  );

  const fresh = await service.fetchTeamRoster(30, 20);

  assert.equal(fresh.freshness, 'fresh');
  assert.deepEqual(fresh.data?.team, { id: 30, managerId: 1, name: 'Les Rapides', image: null });
  assert.deepEqual(fresh.data?.entry, {
    teamId: 30,
    raceId: 20,
    isValid: false,
    finishTime: null,
    bibNumber: 4,
  });
  assert.deepEqual(await store.query('team_members'), [{ team_id: 30, user_id: 1 }]);
  assert.deepEqual(await store.query('race_registrations'), [
    { user_id: 1, race_id: 20, chip_number: 812, finish_time: null, pps_form: 'pps-1.pdf' },
  ]);

  const cached = await service.fetchTeamRoster(30, 20);
  assert.equal(cached.freshness, 'cached');
  assert.equal(cached.data?.team.name, 'Les Rapides');
  assert.deepEqual(
    cached.data?.members.map(({ user, registration }) => [
      user.id,
      user.firstName,
      user.email,
      registration?.chipNumber,
    ]),
    [[1, 'Camille', 'camille@example.test', 812]],
  );
});

test('teams listed with their column names are cached with their entries', async () => {
  const { service, remote, store } = await buildService();
  remote.on(
    'GET',
    '/races/20/teams',
    ok(
      wrapped([
        backendTeamListItem(5, { TEA_NAME: 'Les Renards', TER_IS_VALID: 1, TER_RACE_NUMBER: 3 }),
      ]),
    ),
  );

  const result = await service.fetchTeamsForRace(20);

  assert.deepEqual(result.data, [
    {
      team: { id: 5, managerId: 100, name: 'Les Renards', image: null },
      entry: { teamId: 5, raceId: 20, isValid: true, finishTime: null, bibNumber: 3 },
    },
  ]);
  assert.deepEqual(await store.query('teams'), [
    { id: 5, manager_id: 100, name: 'Les Renards', image: null },
  ]);
  assert.deepEqual(await store.query('team_races'), [
    { team_id: 5, race_id: 20, is_valid: 1, finish_time: null, bib_number: 3 },
  ]);
});

test('a race without teams answers 404 and clears its cached entries', async () => {
  const { service, remote, store } = await buildService();
  await store.upsert('team_races', {
    team_id: 30,
    race_id: 20,
    is_valid: 0,
    finish_time: null,
    bib_number: 1,
  });
  remote.on('GET', '/races/20/teams', notFound());

  const result = await service.fetchTeamsForRace(20);

  assert.equal(result.freshness, 'fresh');
  assert.deepEqual(result.data, []);
  assert.deepEqual(await store.query('team_races', { race_id: 20 }), []);
});

test('created team is stored under the id from the wrapped response', async () => {
  const { service, remote, store } = await buildService();
  remote.on('POST', '/teams', ok(wrapped({ TEA_ID: 31 }), 201));

  const result = await service.createTeam({ managerId: 100, name: 'Les Chamois', image: null });

  assert.deepEqual(result, { id: 31, confirmed: true, outboundEntryId: null });
  assert.deepEqual(remote.calls[0]?.body, { name: 'Les Chamois', image: null });
  assert.deepEqual(await store.query('teams'), [
    { id: 31, manager_id: 100, name: 'Les Chamois', image: null },
  ]);
  assert.deepEqual(await store.listOutbound(), []);
});
