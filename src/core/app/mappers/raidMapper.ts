import type { Raid, RaidDraft } from '../../domain/raid';
import type { RaidRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import {
  parseStoredTimestamp,
  readInteger,
  readRelationId,
  readString,
  requireId,
  requireObject,
  requireTimestamp,
  toTimestamp,
} from './wireValues';

const ENTITY = 'raid';

export type RaidPayload = {
  CLU_ID: number;
  ADD_ID: number;
  USE_ID: number;
  RAI_NAME: string;
  RAI_MAIL: string | null;
  RAI_PHONE_NUMBER: string | null;
  RAI_WEB_SITE: string | null;
  RAI_IMAGE: string | null;
  RAI_TIME_START: string;
  RAI_TIME_END: string;
  RAI_REGISTRATION_START: string;
  RAI_REGISTRATION_END: string;
  RAI_NB_RACES: number;
};

export type RaidWire = RaidPayload & { RAI_ID: number };

export const raidMapper = {
  fromWireJson(json: JsonValue): Raid {
    const source = requireObject(json, ENTITY);
    return {
      id: requireId(source, 'RAI_ID', ENTITY),
      clubId: readRelationId(source, 'CLU_ID', 'club') ?? 0,
      addressId: readRelationId(source, 'ADD_ID', 'address') ?? 0,
      managerId: readRelationId(source, 'USE_ID', 'user') ?? 0,
      name: readString(source, 'RAI_NAME') ?? '',
      email: readString(source, 'RAI_MAIL'),
      phoneNumber: readString(source, 'RAI_PHONE_NUMBER'),
      website: readString(source, 'RAI_WEB_SITE'),
      image: readString(source, 'RAI_IMAGE'),
      startsAt: requireTimestamp(source, 'RAI_TIME_START', ENTITY),
      endsAt: requireTimestamp(source, 'RAI_TIME_END', ENTITY),
      registrationOpensAt: requireTimestamp(source, 'RAI_REGISTRATION_START', ENTITY),
      registrationClosesAt: requireTimestamp(source, 'RAI_REGISTRATION_END', ENTITY),
      maxRaces: readInteger(source, 'RAI_NB_RACES') ?? 0,
    };
  },

  fromLocalRow(row: RaidRow): Raid {
    return {
      id: row.id,
      clubId: row.club_id,
      addressId: row.address_id,
      managerId: row.manager_id,
      name: row.name,
      email: row.email,
      phoneNumber: row.phone_number,
      website: row.website,
      image: row.image,
      startsAt: parseStoredTimestamp(row.starts_at, ENTITY, 'starts_at'),
      endsAt: parseStoredTimestamp(row.ends_at, ENTITY, 'ends_at'),
      registrationOpensAt: parseStoredTimestamp(
        row.registration_opens_at,
        ENTITY,
        'registration_opens_at',
      ),
      registrationClosesAt: parseStoredTimestamp(
        row.registration_closes_at,
        ENTITY,
        'registration_closes_at',
      ),
      maxRaces: row.max_races,
    };
  },

  toCreatePayload(draft: RaidDraft): RaidPayload {
    return {
      CLU_ID: draft.clubId,
      ADD_ID: draft.addressId,
      USE_ID: draft.managerId,
      RAI_NAME: draft.name,
      RAI_MAIL: draft.email,
      RAI_PHONE_NUMBER: draft.phoneNumber,
      RAI_WEB_SITE: draft.website,
      RAI_IMAGE: draft.image,
      RAI_TIME_START: toTimestamp(draft.startsAt),
      RAI_TIME_END: toTimestamp(draft.endsAt),
      RAI_REGISTRATION_START: toTimestamp(draft.registrationOpensAt),
      RAI_REGISTRATION_END: toTimestamp(draft.registrationClosesAt),
      RAI_NB_RACES: draft.maxRaces,
    };
  },

  toWireJson(raid: Raid): RaidWire {
    return { RAI_ID: raid.id, ...raidMapper.toCreatePayload(raid) };
  },

  toLocalRow(raid: Raid): RaidRow {
    return {
      id: raid.id,
      club_id: raid.clubId,
      address_id: raid.addressId,
      manager_id: raid.managerId,
      name: raid.name,
      email: raid.email,
      phone_number: raid.phoneNumber,
      website: raid.website,
      image: raid.image,
      starts_at: toTimestamp(raid.startsAt),
      ends_at: toTimestamp(raid.endsAt),
      registration_opens_at: toTimestamp(raid.registrationOpensAt),
      registration_closes_at: toTimestamp(raid.registrationClosesAt),
      max_races: raid.maxRaces,
    };
  },
};
