import assert from 'node:assert/strict';
import test from 'node:test';

import {
  MappingError,
  addressMapper,
  asCollection,
  asEntity,
  categoryPriceMapper,
  clubMapper,
  raceMapper,
  raidMapper,
  registrationMapper,
  teamMapper,
  teamMembershipMapper,
  teamRaceEntryMapper,
  userMapper,
  type Address,
  type Club,
  type JsonObject,
  type RaceRegistration,
  type Team,
  type TeamRaceEntry,
  type User,
} from '../../../src';
import { sampleRace, sampleRaid, sampleUser } from '../sync/__fixtures__/syncFixtures';

const minimalUser: User = {
  id: 7,
  addressId: 4,
  clubId: null,
  email: 'minimal@example.test',
  firstName: 'Sam',
  lastName: 'Durand',
  licenceNumber: null,
  phoneNumber: null,
  birthDate: null,
  membershipDate: null,
  roles: [],
};

test('raids survive wire and row round trips', () => {
  for (const raid of [
    sampleRaid(),
    sampleRaid({ email: null, phoneNumber: null, website: null, image: null }),
  ]) {
    assert.deepEqual(raidMapper.fromWireJson(raidMapper.toWireJson(raid)), raid);
    assert.deepEqual(raidMapper.fromLocalRow(raidMapper.toLocalRow(raid)), raid);
  }
});

test('races survive wire and row round trips', () => {
  for (const race of [
    sampleRace(),
    sampleRace({ type: 'leisure', gender: 'female', chipMandatory: false, difficulty: '' }),
  ]) {
    assert.deepEqual(raceMapper.fromWireJson(raceMapper.toWireJson(race)), race);
    assert.deepEqual(raceMapper.fromLocalRow(raceMapper.toLocalRow(race)), race);
  }
});

test('race labels are sent in the backend vocabulary', () => {
  const wire = raceMapper.toWireJson(sampleRace({ type: 'leisure', gender: 'male' }));

  assert.equal(wire.RAC_TYPE, 'Loisir');
  assert.equal(wire.RAC_GENDER, 'Homme');
  assert.equal(wire.RAC_CHIP_MANDATORY, 1);
  assert.equal(wire.RAC_AGE_MIDDLE, 16);
});

test('users survive wire and row round trips including roles', () => {
  const full = sampleUser({ roles: ['runner', 'raid-manager'] });

  for (const user of [full, minimalUser]) {
    assert.deepEqual(userMapper.fromWireJson(userMapper.toWireJson(user)), user);
    assert.deepEqual(
      userMapper.fromLocalRow(userMapper.toLocalRow(user), userMapper.toRoleRows(user)),
      user,
    );
  }

  assert.deepEqual(userMapper.toWireJson(full).roles, [{ ROL_ID: 1 }, { ROL_ID: 4 }]);
});

test('user roles accept plain ids, drop unknown ones and keep canonical order', () => {
  const user = userMapper.fromWireJson({
    USE_ID: 9,
    ADD_ID: 1,
    USE_MAIL: 'x@example.test',
    USE_NAME: 'X',
    USE_LAST_NAME: 'Y',
    USE_BIRTHDATE: '2001-04-05T00:00:00.000000Z',
    roles: [5, { ROL_ID: 2 }, 42, 5],
  });

  assert.deepEqual(user.roles, ['site-manager', 'race-manager']);
  assert.equal(user.birthDate, '2001-04-05');
});

test('clubs, addresses and teams survive wire and row round trips', () => {
  const club: Club = { id: 3, managerId: 5, addressId: 4, name: 'CO Sangliers' };
  const address: Address = {
    id: 4,
    postalCode: '14000',
    city: 'Caen',
    streetName: 'Rue des Chênes',
    streetNumber: '12 bis',
  };
  const team: Team = { id: 30, managerId: 100, name: 'Les Rapides', image: null };

  assert.deepEqual(clubMapper.fromWireJson(clubMapper.toWireJson(club)), club);
  assert.deepEqual(clubMapper.fromLocalRow(clubMapper.toLocalRow(club)), club);
  assert.deepEqual(addressMapper.fromWireJson(addressMapper.toWireJson(address)), address);
  assert.deepEqual(addressMapper.fromLocalRow(addressMapper.toLocalRow(address)), address);
  assert.deepEqual(teamMapper.fromWireJson(teamMapper.toWireJson(team)), team);
  assert.deepEqual(teamMapper.fromLocalRow(teamMapper.toLocalRow(team)), team);
});

test('team entries, memberships and registrations survive round trips', () => {
  const entry: TeamRaceEntry = {
    teamId: 30,
    raceId: 20,
    isValid: true,
    finishTime: '02:41:10',
    bibNumber: 4,
  };
  const pending: TeamRaceEntry = { ...entry, isValid: false, finishTime: null, bibNumber: null };
  const registration: RaceRegistration = {
    userId: 100,
    raceId: 20,
    chipNumber: 5521,
    finishTime: null,
    ppsForm: 'pps-100.pdf',
  };

  for (const candidate of [entry, pending]) {
    assert.deepEqual(
      teamRaceEntryMapper.fromWireJson(teamRaceEntryMapper.toWireJson(candidate), 99),
      candidate,
    );
    assert.deepEqual(
      teamRaceEntryMapper.fromLocalRow(teamRaceEntryMapper.toLocalRow(candidate)),
      candidate,
    );
  }

  assert.deepEqual(
    teamMembershipMapper.fromWireJson(teamMembershipMapper.toWireJson({ teamId: 30, userId: 100 })),
    { teamId: 30, userId: 100 },
  );
  assert.deepEqual(
    registrationMapper.fromWireJson(registrationMapper.toWireJson(registration), 99),
    registration,
  );
  assert.deepEqual(
    registrationMapper.fromLocalRow(registrationMapper.toLocalRow(registration)),
    registration,
  );
});

test('category prices map to category ids and sort in category order', () => {
  const parsed = [
    categoryPriceMapper.fromWireJson({ CAT_ID: 3, CAR_PRICE: 8 }, 20),
    categoryPriceMapper.fromWireJson({ CAT_ID: 1, CAR_PRICE: '10.5' }, 20),
    categoryPriceMapper.fromWireJson({ CAT_ID: 2, CAR_PRICE: 12 }, 20),
  ];

  assert.deepEqual(categoryPriceMapper.sort(parsed), [
    { raceId: 20, category: 'minor', price: 10.5 },
    { raceId: 20, category: 'adult', price: 12 },
    { raceId: 20, category: 'licensed', price: 8 },
  ]);
  assert.deepEqual(categoryPriceMapper.toWireJson({ raceId: 20, category: 'licensed', price: 8 }), {
    CAT_ID: 3,
    CAR_PRICE: 8,
  });
  assert.throws(
    () => categoryPriceMapper.fromWireJson({ CAT_ID: 9, CAR_PRICE: 1 }, 20),
    MappingError,
  );
});

test('relation ids are read from embedded objects when the flat column is absent', () => {
  const wire = {
    ...raidMapper.toWireJson(sampleRaid()),
    CLU_ID: null,
    club: { CLU_ID: 77, CLU_NAME: 'Embedded' },
  };

  assert.equal(raidMapper.fromWireJson(wire).clubId, 77);
});

test('missing ids and timestamps raise mapping errors', () => {
  const withoutId: JsonObject = { ...raidMapper.toWireJson(sampleRaid()) };
  delete withoutId.RAI_ID;

  assert.throws(
    () => raidMapper.fromWireJson(withoutId),
    (error: unknown) =>
      error instanceof MappingError && error.entity === 'raid' && error.field === 'RAI_ID',
  );
  assert.throws(
    () => raceMapper.fromWireJson({ ...raceMapper.toWireJson(sampleRace()), RAC_TIME_END: '' }),
    (error: unknown) => error instanceof MappingError && error.field === 'RAC_TIME_END',
  );
  assert.throws(() => userMapper.fromWireJson([]), MappingError);
});

test('collections may be bare arrays or wrapped in data', () => {
  assert.deepEqual(asCollection([1, 2]), [1, 2]);
  assert.deepEqual(asCollection({ data: [3] }), [3]);
  assert.deepEqual(asCollection({ message: 'none' }), []);
});

test('single entities may be bare objects or wrapped in data', () => {
  assert.deepEqual(asEntity({ RAI_ID: 5 }), { RAI_ID: 5 });
  assert.deepEqual(asEntity({ data: { RAI_ID: 5 } }), { RAI_ID: 5 });
  assert.deepEqual(asEntity({ data: [1] }), { data: [1] });
  assert.equal(asEntity(null), null);
});

test('teams are read from column names and from snake_case keys', () => {
  const expected: Team = { id: 5, managerId: 100, name: 'Les Renards', image: 'renards.png' };

  assert.deepEqual(
    teamMapper.fromWireJson({
      TEA_ID: 5,
      USE_ID: 100,
      TEA_NAME: 'Les Renards',
      TEA_IMAGE: 'renards.png',
    }),
    expected,
  );
  assert.deepEqual(
    teamMapper.fromWireJson({ id: 5, manager_id: 100, name: 'Les Renards', image: 'renards.png' }),
    expected,
  );
  assert.deepEqual(
    teamRaceEntryMapper.fromWireJson({ id: 5, is_valid: 1, race_number: 3 }, 20),
    { teamId: 5, raceId: 20, isValid: true, finishTime: null, bibNumber: 3 },
  );
  assert.equal(teamMapper.idFromWireJson({ TEA_ID: 31 }), 31);
  assert.throws(
    () => teamMapper.idFromWireJson({ message: 'Created.' }),
    (error: unknown) => error instanceof MappingError && error.field === 'TEA_ID',
  );
  assert.deepEqual(teamMapper.toCreatePayload({ managerId: 100, name: 'Les Renards', image: null }), {
    name: 'Les Renards',
    image: null,
  });
});

test('roster members are read from snake_case keys', () => {
  const member = {
    id: 7,
    first_name: 'Camille',
    last_name: 'Durand',
    email: 'camille@example.test',
    licence_number: 'LIC-7',
    pps_form: null,
    chip_number: 44,
  };

  const user = userMapper.fromWireJson(member);
  assert.deepEqual(
    [user.id, user.firstName, user.lastName, user.email, user.licenceNumber],
    [7, 'Camille', 'Durand', 'camille@example.test', 'LIC-7'],
  );
  assert.deepEqual(registrationMapper.fromWireJson(member, 20), {
    userId: 7,
    raceId: 20,
    chipNumber: 44,
    finishTime: null,
    ppsForm: null,
  });
});
