import type { RaceRegistration } from '../../domain/registration';
import type { RaceRegistrationRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import { readFirst, readInteger, readString, requireFirstId, requireObject } from './wireValues';

const ENTITY = 'registration';

export type RaceRegistrationWire = {
  USE_ID: number;
  RAC_ID: number;
  USR_CHIP_NUMBER: number | null;
  USR_TIME: string | null;
  USR_PPS_FORM: string | null;
};

export const registrationMapper = {
  /**
   * Roster members carry their registration columns next to the user columns; the
   * race id falls back to the requested race when the member omits it.
   */
  fromWireJson(json: JsonValue, raceId: number): RaceRegistration {
    const source = requireObject(json, ENTITY);
    return {
      userId: requireFirstId(source, ['USE_ID', 'id'], ENTITY),
      raceId: readFirst(readInteger, source, ['RAC_ID', 'race_id']) ?? raceId,
      chipNumber: readFirst(readInteger, source, ['USR_CHIP_NUMBER', 'chip_number']),
      finishTime: readFirst(readString, source, ['USR_TIME', 'finish_time']),
      ppsForm: readFirst(readString, source, ['USR_PPS_FORM', 'pps_form']),
    };
  },

  fromLocalRow(row: RaceRegistrationRow): RaceRegistration {
    return {
      userId: row.user_id,
      raceId: row.race_id,
      chipNumber: row.chip_number,
      finishTime: row.finish_time,
      ppsForm: row.pps_form,
    };
  },

  toWireJson(registration: RaceRegistration): RaceRegistrationWire {
    return {
      USE_ID: registration.userId,
      RAC_ID: registration.raceId,
      USR_CHIP_NUMBER: registration.chipNumber,
      USR_TIME: registration.finishTime,
      USR_PPS_FORM: registration.ppsForm,
    };
  },

  toLocalRow(registration: RaceRegistration): RaceRegistrationRow {
    return {
      user_id: registration.userId,
      race_id: registration.raceId,
      chip_number: registration.chipNumber,
      finish_time: registration.finishTime,
      pps_form: registration.ppsForm,
    };
  },
};
