/**
 * Project: Raid Sync
 * File: src/core/app/mappers/teamMapper.ts
 * Summary: Transforms for teams, their race entries and memberships.
 *
 * The backend names team columns `TEA_*`/`TER_*`, but some team routes answer with
 * snake_case keys (`id`, `manager_id`, `is_valid`, `race_number`); both are read.
 * Outgoing payloads use the column names, except team creation which takes
 * `name` and `image`.
 */

import type { Team, TeamDraft, TeamMembership, TeamRaceEntry } from '../../domain/team';
import type { TeamMemberRow, TeamRaceRow, TeamRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import {
  readBoolean,
  readFirst,
  readInteger,
  readString,
  requireFirstId,
  requireObject,
} from './wireValues';

export const TEAM_ID_KEYS = ['TEA_ID', 'id'] as const;

export type TeamPayload = {
  name: string;
  image: string | null;
};

export type TeamWire = {
  TEA_ID: number;
  USE_ID: number;
  TEA_NAME: string;
  TEA_IMAGE: string | null;
};

export type TeamRaceEntryWire = {
  TEA_ID: number;
  RAC_ID: number;
  TER_IS_VALID: 0 | 1;
  TER_TIME: string | null;
  TER_RACE_NUMBER: number | null;
};

export type TeamMembershipWire = {
  TEA_ID: number;
  USE_ID: number;
};

export const teamMapper = {
  fromWireJson(json: JsonValue): Team {
    const source = requireObject(json, 'team');
    return {
      id: requireFirstId(source, TEAM_ID_KEYS, 'team'),
      managerId: readFirst(readInteger, source, ['USE_ID', 'manager_id']) ?? 0,
      name: readFirst(readString, source, ['TEA_NAME', 'name']) ?? '',
      image: readFirst(readString, source, ['TEA_IMAGE', 'image']),
    };
  },

  /** Id of a created team; the create response may carry nothing else. */
  idFromWireJson(json: JsonValue): number {
    return requireFirstId(requireObject(json, 'team'), TEAM_ID_KEYS, 'team');
  },

  fromLocalRow(row: TeamRow): Team {
    return { id: row.id, managerId: row.manager_id, name: row.name, image: row.image };
  },

  toCreatePayload(draft: TeamDraft): TeamPayload {
    return { name: draft.name, image: draft.image };
  },

  toWireJson(team: Team): TeamWire {
    return {
      TEA_ID: team.id,
      USE_ID: team.managerId,
      TEA_NAME: team.name,
      TEA_IMAGE: team.image,
    };
  },

  toLocalRow(team: Team): TeamRow {
    return { id: team.id, manager_id: team.managerId, name: team.name, image: team.image };
  },
};

export const teamRaceEntryMapper = {
  /** Entries are listed per race; `raceId` is used when the payload omits the race id. */
  fromWireJson(json: JsonValue, raceId: number): TeamRaceEntry {
    const source = requireObject(json, 'teamRaceEntry');
    return {
      teamId: requireFirstId(source, TEAM_ID_KEYS, 'teamRaceEntry'),
      raceId: readFirst(readInteger, source, ['RAC_ID', 'race_id']) ?? raceId,
      isValid: readFirst(readBoolean, source, ['TER_IS_VALID', 'is_valid']) ?? false,
      finishTime: readFirst(readString, source, ['TER_TIME', 'finish_time']),
      bibNumber: readFirst(readInteger, source, ['TER_RACE_NUMBER', 'race_number']),
    };
  },

  fromLocalRow(row: TeamRaceRow): TeamRaceEntry {
    return {
      teamId: row.team_id,
      raceId: row.race_id,
      isValid: row.is_valid === 1,
      finishTime: row.finish_time,
      bibNumber: row.bib_number,
    };
  },

  toWireJson(entry: TeamRaceEntry): TeamRaceEntryWire {
    return {
      TEA_ID: entry.teamId,
      RAC_ID: entry.raceId,
      TER_IS_VALID: entry.isValid ? 1 : 0,
      TER_TIME: entry.finishTime,
      TER_RACE_NUMBER: entry.bibNumber,
    };
  },

  toLocalRow(entry: TeamRaceEntry): TeamRaceRow {
    return {
      team_id: entry.teamId,
      race_id: entry.raceId,
      is_valid: entry.isValid ? 1 : 0,
      finish_time: entry.finishTime,
      bib_number: entry.bibNumber,
    };
  },
};

export const teamMembershipMapper = {
  fromWireJson(json: JsonValue): TeamMembership {
    const source = requireObject(json, 'teamMembership');
    return {
      teamId: requireFirstId(source, ['TEA_ID', 'team_id'], 'teamMembership'),
      userId: requireFirstId(source, ['USE_ID', 'user_id'], 'teamMembership'),
    };
  },

  fromLocalRow(row: TeamMemberRow): TeamMembership {
    return { teamId: row.team_id, userId: row.user_id };
  },

  toWireJson(membership: TeamMembership): TeamMembershipWire {
    return { TEA_ID: membership.teamId, USE_ID: membership.userId };
  },

  toLocalRow(membership: TeamMembership): TeamMemberRow {
    return { team_id: membership.teamId, user_id: membership.userId };
  },
};
