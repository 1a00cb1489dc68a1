import { z } from 'zod';

import type { LocalTables, OutboundQueueRow, TableName } from '../../app/ports/localStore';

const id = z.number().int();
const integer = z.number().int();
const text = z.string();
const nullableText = z.string().nullable();
const nullableInteger = z.number().int().nullable();

/** Shapes of rows read back from SQLite, one per cache table. */
export const ROW_SCHEMAS: { [T in TableName]: z.ZodType<LocalTables[T]> } = {
  addresses: z.object({
    id,
    postal_code: text,
    city: text,
    street_name: text,
    street_number: text,
  }),
  users: z.object({
    id,
    address_id: id,
    club_id: nullableInteger,
    email: text,
    first_name: text,
    last_name: text,
    licence_number: nullableText,
    phone_number: nullableText,
    birth_date: nullableText,
    membership_date: nullableText,
  }),
  user_roles: z.object({ user_id: id, role_id: id }),
  clubs: z.object({ id, manager_id: id, address_id: id, name: text }),
  raids: z.object({
    id,
    club_id: id,
    address_id: id,
    manager_id: id,
    name: text,
    email: nullableText,
    phone_number: nullableText,
    website: nullableText,
    image: nullableText,
    starts_at: text,
    ends_at: text,
    registration_opens_at: text,
    registration_closes_at: text,
    max_races: integer,
  }),
  races: z.object({
    id,
    raid_id: id,
    manager_id: id,
    name: text,
    starts_at: text,
    ends_at: text,
    race_type: text,
    difficulty: text,
    min_participants: integer,
    max_participants: integer,
    min_teams: integer,
    max_teams: integer,
    min_team_members: integer,
    max_team_members: integer,
    age_minimum: integer,
    age_autonomous: integer,
    age_supervisor: integer,
    gender: text,
    chip_mandatory: integer,
  }),
  category_prices: z.object({ race_id: id, category_id: id, price: z.number() }),
  teams: z.object({ id, manager_id: id, name: text, image: nullableText }),
  team_members: z.object({ team_id: id, user_id: id }),
  team_races: z.object({
    team_id: id,
    race_id: id,
    is_valid: integer,
    finish_time: nullableText,
    bib_number: nullableInteger,
  }),
  race_registrations: z.object({
    user_id: id,
    race_id: id,
    chip_number: nullableInteger,
    finish_time: nullableText,
    pps_form: nullableText,
  }),
  id_mappings: z.object({ entity: text, local_id: id, server_id: id }),
};

export const outboundQueueRowSchema: z.ZodType<OutboundQueueRow> = z.object({
  id: text,
  action: text,
  payload: text,
  created_at: integer,
  status: z.enum(['pending', 'replaying', 'rejected']),
  attempts: integer,
  last_error: nullableText,
});
