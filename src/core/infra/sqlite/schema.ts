/**
 * Project: Raid Sync
 * File: src/core/infra/sqlite/schema.ts
 * Summary: Column declarations for every cache table and the DDL derived from them.
 */

import {
  TABLE_KEY_COLUMNS,
  type ColumnOf,
  type TableName,
} from '../../app/ports/localStore';

export type SqlType = 'INTEGER' | 'REAL' | 'TEXT';

type ColumnDef = { type: SqlType; nullable?: boolean };

export const TABLE_COLUMNS: { [T in TableName]: { [C in ColumnOf<T>]: ColumnDef } } = {
  addresses: {
    id: { type: 'INTEGER' },
    postal_code: { type: 'TEXT' },
    city: { type: 'TEXT' },
    street_name: { type: 'TEXT' },
    street_number: { type: 'TEXT' },
  },
  users: {
    id: { type: 'INTEGER' },
    address_id: { type: 'INTEGER' },
    club_id: { type: 'INTEGER', nullable: true },
    email: { type: 'TEXT' },
    first_name: { type: 'TEXT' },
    last_name: { type: 'TEXT' },
    licence_number: { type: 'TEXT', nullable: true },
    phone_number: { type: 'TEXT', nullable: true },
    birth_date: { type: 'TEXT', nullable: true },
    membership_date: { type: 'TEXT', nullable: true },
  },
  user_roles: {
    user_id: { type: 'INTEGER' },
    role_id: { type: 'INTEGER' },
  },
  clubs: {
    id: { type: 'INTEGER' },
    manager_id: { type: 'INTEGER' },
    address_id: { type: 'INTEGER' },
    name: { type: 'TEXT' },
  },
  raids: {
    id: { type: 'INTEGER' },
    club_id: { type: 'INTEGER' },
    address_id: { type: 'INTEGER' },
    manager_id: { type: 'INTEGER' },
    name: { type: 'TEXT' },
    email: { type: 'TEXT', nullable: true },
    phone_number: { type: 'TEXT', nullable: true },
    website: { type: 'TEXT', nullable: true },
    image: { type: 'TEXT', nullable: true },
    starts_at: { type: 'TEXT' },
    ends_at: { type: 'TEXT' },
    registration_opens_at: { type: 'TEXT' },
    registration_closes_at: { type: 'TEXT' },
    max_races: { type: 'INTEGER' },
  },
  races: {
    id: { type: 'INTEGER' },
    raid_id: { type: 'INTEGER' },
    manager_id: { type: 'INTEGER' },
    name: { type: 'TEXT' },
    starts_at: { type: 'TEXT' },
    ends_at: { type: 'TEXT' },
    race_type: { type: 'TEXT' },
    difficulty: { type: 'TEXT' },
    min_participants: { type: 'INTEGER' },
    max_participants: { type: 'INTEGER' },
    min_teams: { type: 'INTEGER' },
    max_teams: { type: 'INTEGER' },
    min_team_members: { type: 'INTEGER' },
    max_team_members: { type: 'INTEGER' },
    age_minimum: { type: 'INTEGER' },
    age_autonomous: { type: 'INTEGER' },
    age_supervisor: { type: 'INTEGER' },
    gender: { type: 'TEXT' },
    chip_mandatory: { type: 'INTEGER' },
  },
  category_prices: {
    race_id: { type: 'INTEGER' },
    category_id: { type: 'INTEGER' },
    price: { type: 'REAL' },
  },
  teams: {
    id: { type: 'INTEGER' },
    manager_id: { type: 'INTEGER' },
    name: { type: 'TEXT' },
    image: { type: 'TEXT', nullable: true },
  },
  team_members: {
    team_id: { type: 'INTEGER' },
    user_id: { type: 'INTEGER' },
  },
  team_races: {
    team_id: { type: 'INTEGER' },
    race_id: { type: 'INTEGER' },
    is_valid: { type: 'INTEGER' },
    finish_time: { type: 'TEXT', nullable: true },
    bib_number: { type: 'INTEGER', nullable: true },
  },
  race_registrations: {
    user_id: { type: 'INTEGER' },
    race_id: { type: 'INTEGER' },
    chip_number: { type: 'INTEGER', nullable: true },
    finish_time: { type: 'TEXT', nullable: true },
    pps_form: { type: 'TEXT', nullable: true },
  },
  id_mappings: {
    entity: { type: 'TEXT' },
    local_id: { type: 'INTEGER' },
    server_id: { type: 'INTEGER' },
  },
};

export const TABLE_NAMES = Object.keys(TABLE_KEY_COLUMNS).filter(
  (name): name is TableName => name in TABLE_COLUMNS,
);

/** Declared column names of `table`, in declaration order. */
export const columnsOf = (table: TableName): string[] => Object.keys(TABLE_COLUMNS[table]);

const columnDefinitions = (table: TableName): string[] =>
  Object.entries<ColumnDef>(TABLE_COLUMNS[table]).map(
    ([name, column]) => `${name} ${column.type}${column.nullable ? '' : ' NOT NULL'}`,
  );

const createTableStatement = (table: TableName): string => {
  const keys: readonly string[] = TABLE_KEY_COLUMNS[table];
  return `CREATE TABLE IF NOT EXISTS ${table} (${[
    ...columnDefinitions(table),
    `PRIMARY KEY (${keys.join(', ')})`,
  ].join(', ')})`;
};

export const OUTBOUND_QUEUE_DDL = `CREATE TABLE IF NOT EXISTS outbound_queue (
  id TEXT NOT NULL PRIMARY KEY,
  action TEXT NOT NULL,
  payload TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  status TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 0,
  last_error TEXT
)`;

export const SCHEMA_STATEMENTS: string[] = [
  ...TABLE_NAMES.map(createTableStatement),
  OUTBOUND_QUEUE_DDL,
  'CREATE INDEX IF NOT EXISTS outbound_queue_order ON outbound_queue (status, created_at)',
];
