/**
 * Project: Raid Sync
 * File: src/core/app/ports/localStore.ts
 * Summary: Port for the persistent entity cache and the durable outbound queue.
 */

/** Value stored in a single column. Booleans are persisted as 0/1. */
export type Cell = string | number | null;

export type AddressRow = {
  id: number;
  postal_code: string;
  city: string;
  street_name: string;
  street_number: string;
};

export type UserRow = {
  id: number;
  address_id: number;
  club_id: number | null;
  email: string;
  first_name: string;
  last_name: string;
  licence_number: string | null;
  phone_number: string | null;
  birth_date: string | null;
  membership_date: string | null;
};

export type UserRoleRow = {
  user_id: number;
  role_id: number;
};

export type ClubRow = {
  id: number;
  manager_id: number;
  address_id: number;
  name: string;
};

export type RaidRow = {
  id: number;
  club_id: number;
  address_id: number;
  manager_id: number;
  name: string;
  email: string | null;
  phone_number: string | null;
  website: string | null;
  image: string | null;
  starts_at: string;
  ends_at: string;
  registration_opens_at: string;
  registration_closes_at: string;
  max_races: number;
};

export type RaceRow = {
  id: number;
  raid_id: number;
  manager_id: number;
  name: string;
  starts_at: string;
  ends_at: string;
  race_type: string;
  difficulty: string;
  min_participants: number;
  max_participants: number;
  min_teams: number;
  max_teams: number;
  min_team_members: number;
  max_team_members: number;
  age_minimum: number;
  age_autonomous: number;
  age_supervisor: number;
  gender: string;
  chip_mandatory: number;
};

export type CategoryPriceRow = {
  race_id: number;
  category_id: number;
  price: number;
};

export type TeamRow = {
  id: number;
  manager_id: number;
  name: string;
  image: string | null;
};

export type TeamMemberRow = {
  team_id: number;
  user_id: number;
};

export type TeamRaceRow = {
  team_id: number;
  race_id: number;
  is_valid: number;
  finish_time: string | null;
  bib_number: number | null;
};

export type RaceRegistrationRow = {
  user_id: number;
  race_id: number;
  chip_number: number | null;
  finish_time: string | null;
  pps_form: string | null;
};

export type IdMappingRow = {
  entity: string;
  local_id: number;
  server_id: number;
};

export type LocalTables = {
  addresses: AddressRow;
  users: UserRow;
  user_roles: UserRoleRow;
  clubs: ClubRow;
  raids: RaidRow;
  races: RaceRow;
  category_prices: CategoryPriceRow;
  teams: TeamRow;
  team_members: TeamMemberRow;
  team_races: TeamRaceRow;
  race_registrations: RaceRegistrationRow;
  id_mappings: IdMappingRow;
};

export type TableName = keyof LocalTables;

export type LocalRow<T extends TableName> = LocalTables[T];

export type ColumnOf<T extends TableName> = Extract<keyof LocalTables[T], string>;

type TableKeyColumns = {
  addresses: 'id';
  users: 'id';
  user_roles: 'user_id' | 'role_id';
  clubs: 'id';
  raids: 'id';
  races: 'id';
  category_prices: 'race_id' | 'category_id';
  teams: 'id';
  team_members: 'team_id' | 'user_id';
  team_races: 'team_id' | 'race_id';
  race_registrations: 'user_id' | 'race_id';
  id_mappings: 'entity' | 'local_id';
};

export type RowKey<T extends TableName> = Pick<
  LocalTables[T],
  Extract<TableKeyColumns[T], keyof LocalTables[T]>
>;

export type RowFilter<T extends TableName> = Partial<LocalTables[T]>;

export const TABLE_KEY_COLUMNS: { [T in TableName]: readonly ColumnOf<T>[] } = {
  addresses: ['id'],
  users: ['id'],
  user_roles: ['user_id', 'role_id'],
  clubs: ['id'],
  raids: ['id'],
  races: ['id'],
  category_prices: ['race_id', 'category_id'],
  teams: ['id'],
  team_members: ['team_id', 'user_id'],
  team_races: ['team_id', 'race_id'],
  race_registrations: ['user_id', 'race_id'],
  id_mappings: ['entity', 'local_id'],
};

export type EntityKind = 'address' | 'user' | 'club' | 'raid' | 'race' | 'team';

export type ColumnReference = { [T in TableName]: { table: T; column: ColumnOf<T> } }[TableName];

export const ENTITY_TABLES: Record<EntityKind, ColumnReference> = {
  address: { table: 'addresses', column: 'id' },
  user: { table: 'users', column: 'id' },
  club: { table: 'clubs', column: 'id' },
  raid: { table: 'raids', column: 'id' },
  race: { table: 'races', column: 'id' },
  team: { table: 'teams', column: 'id' },
};

/** Columns holding a foreign key to each entity kind. */
export const ENTITY_REFERENCES: Record<EntityKind, readonly ColumnReference[]> = {
  address: [
    { table: 'users', column: 'address_id' },
    { table: 'clubs', column: 'address_id' },
    { table: 'raids', column: 'address_id' },
  ],
  user: [
    { table: 'user_roles', column: 'user_id' },
    { table: 'clubs', column: 'manager_id' },
    { table: 'raids', column: 'manager_id' },
    { table: 'races', column: 'manager_id' },
    { table: 'teams', column: 'manager_id' },
    { table: 'team_members', column: 'user_id' },
    { table: 'race_registrations', column: 'user_id' },
  ],
  club: [
    { table: 'users', column: 'club_id' },
    { table: 'raids', column: 'club_id' },
  ],
  raid: [{ table: 'races', column: 'raid_id' }],
  race: [
    { table: 'category_prices', column: 'race_id' },
    { table: 'team_races', column: 'race_id' },
    { table: 'race_registrations', column: 'race_id' },
  ],
  team: [
    { table: 'team_members', column: 'team_id' },
    { table: 'team_races', column: 'team_id' },
  ],
};

export type OutboundStatus = 'pending' | 'replaying' | 'rejected';

export type OutboundQueueRow = {
  id: string;
  action: string;
  /** JSON serialised payload. */
  payload: string;
  /** Epoch milliseconds. */
  created_at: number;
  status: OutboundStatus;
  attempts: number;
  last_error: string | null;
};

export type OutboundPatch = Partial<Pick<OutboundQueueRow, 'status' | 'attempts' | 'last_error'>>;

export interface LocalStore {
  /** Inserts the row, replacing any row with the same key. */
  upsert<T extends TableName>(table: T, row: LocalRow<T>): Promise<void>;
  upsertMany<T extends TableName>(table: T, rows: readonly LocalRow<T>[]): Promise<void>;
  /** Deletes every row whose `column` equals `value`; returns the number removed. */
  clearScope<T extends TableName>(table: T, column: ColumnOf<T>, value: Cell): Promise<number>;
  /** Atomic `clearScope` followed by `upsertMany`. */
  replaceScope<T extends TableName>(
    table: T,
    column: ColumnOf<T>,
    value: Cell,
    rows: readonly LocalRow<T>[],
  ): Promise<void>;
  /** Atomically replaces the whole table content. */
  replaceAll<T extends TableName>(table: T, rows: readonly LocalRow<T>[]): Promise<void>;
  /** Rows matching every column of `filter`, ordered by key. */
  query<T extends TableName>(table: T, filter?: RowFilter<T>): Promise<LocalRow<T>[]>;
  delete<T extends TableName>(table: T, key: RowKey<T>): Promise<number>;
  /** Rewrites an entity id and every column referencing it. */
  remapEntityId(entity: EntityKind, fromId: number, toId: number): Promise<void>;

  enqueueOutbound(entry: OutboundQueueRow): Promise<void>;
  dequeueOutbound(id: string): Promise<void>;
  updateOutbound(id: string, patch: OutboundPatch): Promise<void>;
  /** Pending entries in creation order. */
  listPendingOutbound(): Promise<OutboundQueueRow[]>;
  listOutbound(): Promise<OutboundQueueRow[]>;

  close(): Promise<void>;
}
