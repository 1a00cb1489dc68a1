import type { Race, RaceDraft, RaceGender, RaceType } from '../../domain/race';
import type { RaceRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import {
  parseStoredTimestamp,
  readBoolean,
  readInteger,
  readRelationId,
  readString,
  requireId,
  requireObject,
  requireTimestamp,
  toTimestamp,
} from './wireValues';

const ENTITY = 'race';

const WIRE_RACE_TYPES: Record<RaceType, string> = {
  competitive: 'Compétitif',
  leisure: 'Loisir',
};

const WIRE_GENDERS: Record<RaceGender, string> = {
  male: 'Homme',
  female: 'Femme',
  mixed: 'Mixte',
};

const RACE_TYPES: readonly RaceType[] = ['competitive', 'leisure'];
const GENDERS: readonly RaceGender[] = ['male', 'female', 'mixed'];

const raceTypeFromWire = (value: string | null): RaceType =>
  RACE_TYPES.find((type) => WIRE_RACE_TYPES[type] === value) ?? 'leisure';

const genderFromWire = (value: string | null): RaceGender =>
  GENDERS.find((gender) => WIRE_GENDERS[gender] === value) ?? 'mixed';

const raceTypeFromRow = (value: string): RaceType =>
  RACE_TYPES.find((type) => type === value) ?? 'leisure';

const genderFromRow = (value: string): RaceGender =>
  GENDERS.find((gender) => gender === value) ?? 'mixed';

export type RacePayload = {
  RAI_ID: number;
  USE_ID: number;
  RAC_NAME: string;
  RAC_TIME_START: string;
  RAC_TIME_END: string;
  RAC_TYPE: string;
  RAC_DIFFICULTY: string;
  RAC_MIN_PARTICIPANTS: number;
  RAC_MAX_PARTICIPANTS: number;
  RAC_MIN_TEAMS: number;
  RAC_MAX_TEAMS: number;
  RAC_MIN_TEAM_MEMBERS: number;
  RAC_MAX_TEAM_MEMBERS: number;
  RAC_AGE_MIN: number;
  RAC_AGE_MIDDLE: number;
  RAC_AGE_MAX: number;
  RAC_GENDER: string;
  RAC_CHIP_MANDATORY: number;
};

export type RaceWire = RacePayload & { RAC_ID: number };

export const raceMapper = {
  fromWireJson(json: JsonValue): Race {
    const source = requireObject(json, ENTITY);
    return {
      id: requireId(source, 'RAC_ID', ENTITY),
      raidId: readRelationId(source, 'RAI_ID', 'raid') ?? 0,
      managerId: readRelationId(source, 'USE_ID', 'user') ?? 0,
      name: readString(source, 'RAC_NAME') ?? '',
      startsAt: requireTimestamp(source, 'RAC_TIME_START', ENTITY),
      endsAt: requireTimestamp(source, 'RAC_TIME_END', ENTITY),
      type: raceTypeFromWire(readString(source, 'RAC_TYPE')),
      difficulty: readString(source, 'RAC_DIFFICULTY') ?? '',
      minParticipants: readInteger(source, 'RAC_MIN_PARTICIPANTS') ?? 0,
      maxParticipants: readInteger(source, 'RAC_MAX_PARTICIPANTS') ?? 0,
      minTeams: readInteger(source, 'RAC_MIN_TEAMS') ?? 0,
      maxTeams: readInteger(source, 'RAC_MAX_TEAMS') ?? 0,
      minTeamMembers: readInteger(source, 'RAC_MIN_TEAM_MEMBERS') ?? 0,
      maxTeamMembers: readInteger(source, 'RAC_MAX_TEAM_MEMBERS') ?? 0,
      ageThresholds: {
        minimum: readInteger(source, 'RAC_AGE_MIN') ?? 0,
        autonomous: readInteger(source, 'RAC_AGE_MIDDLE') ?? 0,
        supervisor: readInteger(source, 'RAC_AGE_MAX') ?? 0,
      },
      gender: genderFromWire(readString(source, 'RAC_GENDER')),
      chipMandatory: readBoolean(source, 'RAC_CHIP_MANDATORY') ?? false,
    };
  },

  fromLocalRow(row: RaceRow): Race {
    return {
      id: row.id,
      raidId: row.raid_id,
      managerId: row.manager_id,
      name: row.name,
      startsAt: parseStoredTimestamp(row.starts_at, ENTITY, 'starts_at'),
      endsAt: parseStoredTimestamp(row.ends_at, ENTITY, 'ends_at'),
      type: raceTypeFromRow(row.race_type),
      difficulty: row.difficulty,
      minParticipants: row.min_participants,
      maxParticipants: row.max_participants,
      minTeams: row.min_teams,
      maxTeams: row.max_teams,
      minTeamMembers: row.min_team_members,
      maxTeamMembers: row.max_team_members,
      ageThresholds: {
        minimum: row.age_minimum,
        autonomous: row.age_autonomous,
        supervisor: row.age_supervisor,
      },
      gender: genderFromRow(row.gender),
      chipMandatory: row.chip_mandatory === 1,
    };
  },

  toCreatePayload(draft: RaceDraft): RacePayload {
    return {
      RAI_ID: draft.raidId,
      USE_ID: draft.managerId,
      RAC_NAME: draft.name,
      RAC_TIME_START: toTimestamp(draft.startsAt),
      RAC_TIME_END: toTimestamp(draft.endsAt),
      RAC_TYPE: WIRE_RACE_TYPES[draft.type],
      RAC_DIFFICULTY: draft.difficulty,
      RAC_MIN_PARTICIPANTS: draft.minParticipants,
      RAC_MAX_PARTICIPANTS: draft.maxParticipants,
      RAC_MIN_TEAMS: draft.minTeams,
      RAC_MAX_TEAMS: draft.maxTeams,
      RAC_MIN_TEAM_MEMBERS: draft.minTeamMembers,
      RAC_MAX_TEAM_MEMBERS: draft.maxTeamMembers,
      RAC_AGE_MIN: draft.ageThresholds.minimum,
      RAC_AGE_MIDDLE: draft.ageThresholds.autonomous,
      RAC_AGE_MAX: draft.ageThresholds.supervisor,
      RAC_GENDER: WIRE_GENDERS[draft.gender],
      RAC_CHIP_MANDATORY: draft.chipMandatory ? 1 : 0,
    };
  },

  toWireJson(race: Race): RaceWire {
    return { RAC_ID: race.id, ...raceMapper.toCreatePayload(race) };
  },

  toLocalRow(race: Race): RaceRow {
    return {
      id: race.id,
      raid_id: race.raidId,
      manager_id: race.managerId,
      name: race.name,
      starts_at: toTimestamp(race.startsAt),
      ends_at: toTimestamp(race.endsAt),
      race_type: race.type,
      difficulty: race.difficulty,
      min_participants: race.minParticipants,
      max_participants: race.maxParticipants,
      min_teams: race.minTeams,
      max_teams: race.maxTeams,
      min_team_members: race.minTeamMembers,
      max_team_members: race.maxTeamMembers,
      age_minimum: race.ageThresholds.minimum,
      age_autonomous: race.ageThresholds.autonomous,
      age_supervisor: race.ageThresholds.supervisor,
      gender: race.gender,
      chip_mandatory: race.chipMandatory ? 1 : 0,
    };
  },
};
