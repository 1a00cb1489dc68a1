import type { Race } from '../../../domain/race';
import type { Raid } from '../../../domain/raid';
import type { User } from '../../../domain/user';
import { raceMapper } from '../../mappers/raceMapper';
import { raidMapper } from '../../mappers/raidMapper';
import { userMapper } from '../../mappers/userMapper';
import type { LocalStore, RowFilter } from '../../ports/localStore';

export const loadUsers = async (store: LocalStore, filter?: RowFilter<'users'>): Promise<User[]> => {
  const [rows, roles] = await Promise.all([store.query('users', filter), store.query('user_roles')]);
  return rows.map((row) => userMapper.fromLocalRow(row, roles));
};

export const loadUser = async (store: LocalStore, id: number): Promise<User | null> => {
  const [user] = await loadUsers(store, { id });
  return user ?? null;
};

export const loadRaid = async (store: LocalStore, id: number): Promise<Raid | null> => {
  const [row] = await store.query('raids', { id });
  return row ? raidMapper.fromLocalRow(row) : null;
};

export const loadRace = async (store: LocalStore, id: number): Promise<Race | null> => {
  const [row] = await store.query('races', { id });
  return row ? raceMapper.fromLocalRow(row) : null;
};

export const loadRaces = async (store: LocalStore, filter?: RowFilter<'races'>): Promise<Race[]> =>
  (await store.query('races', filter)).map((row) => raceMapper.fromLocalRow(row));

export const storeUsers = async (
  store: LocalStore,
  users: readonly User[],
  options: { replaceRoles: boolean } = { replaceRoles: true },
): Promise<void> => {
  await store.upsertMany(
    'users',
    users.map((user) => userMapper.toLocalRow(user)),
  );

  if (!options.replaceRoles) {
    return;
  }

  for (const user of users) {
    await store.replaceScope('user_roles', 'user_id', user.id, userMapper.toRoleRows(user));
  }
};
