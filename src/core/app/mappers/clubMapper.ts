import type { Club, ClubDraft } from '../../domain/club';
import type { ClubRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import { readRelationId, readString, requireId, requireObject } from './wireValues';

const ENTITY = 'club';

export type ClubPayload = {
  USE_ID: number;
  ADD_ID: number;
  CLU_NAME: string;
};

export type ClubWire = ClubPayload & { CLU_ID: number };

export const clubMapper = {
  fromWireJson(json: JsonValue): Club {
    const source = requireObject(json, ENTITY);
    return {
      id: requireId(source, 'CLU_ID', ENTITY),
      managerId: readRelationId(source, 'USE_ID', 'user') ?? 0,
      addressId: readRelationId(source, 'ADD_ID', 'address') ?? 0,
      name: readString(source, 'CLU_NAME') ?? '',
    };
  },

  fromLocalRow(row: ClubRow): Club {
    return { id: row.id, managerId: row.manager_id, addressId: row.address_id, name: row.name };
  },

  toCreatePayload(draft: ClubDraft): ClubPayload {
    return { USE_ID: draft.managerId, ADD_ID: draft.addressId, CLU_NAME: draft.name };
  },

  toWireJson(club: Club): ClubWire {
    return { CLU_ID: club.id, ...clubMapper.toCreatePayload(club) };
  },

  toLocalRow(club: Club): ClubRow {
    return { id: club.id, manager_id: club.managerId, address_id: club.addressId, name: club.name };
  },
};
