import type { EntityKind } from '../../ports/localStore';
import type { JsonValue } from '../../ports/remoteClient';
import { TEAM_ID_KEYS } from '../../mappers/teamMapper';
import { asEntity, asObject, readFirst, readInteger } from '../../mappers/wireValues';

/** Keys holding the server id in the response to a create, per entity kind. */
const WIRE_ID_KEYS: Record<EntityKind, readonly string[]> = {
  address: ['ADD_ID'],
  user: ['USE_ID'],
  club: ['CLU_ID'],
  raid: ['RAI_ID'],
  race: ['RAC_ID'],
  team: TEAM_ID_KEYS,
};

/** Reads the created id from the response body or from its `data` wrapper. */
export const extractServerId = (data: JsonValue, entity: EntityKind): number | null => {
  const body = asObject(asEntity(data));
  return body ? readFirst(readInteger, body, WIRE_ID_KEYS[entity]) : null;
};
