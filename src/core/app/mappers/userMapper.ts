import { normaliseRoles, ROLE_TAGS, type RoleTag, type User } from '../../domain/user';
import type { UserRoleRow, UserRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import {
  asArray,
  asObject,
  readCalendarDate,
  readFirst,
  readInteger,
  readRelationId,
  readString,
  requireFirstId,
  requireObject,
} from './wireValues';

const ENTITY = 'user';

/** Backend role ids are 1-based positions in `ROLE_TAGS`. */
export const roleIdOf = (role: RoleTag): number => ROLE_TAGS.indexOf(role) + 1;

export const roleFromId = (id: number): RoleTag | null => ROLE_TAGS[id - 1] ?? null;

const collectRoles = (ids: Iterable<number>): RoleTag[] => {
  const roles: RoleTag[] = [];
  for (const id of ids) {
    const role = roleFromId(id);
    if (role) {
      roles.push(role);
    }
  }

  return normaliseRoles(roles);
};

export type UserWire = {
  USE_ID: number;
  ADD_ID: number;
  CLU_ID: number | null;
  USE_MAIL: string;
  USE_NAME: string;
  USE_LAST_NAME: string;
  USE_LICENCE_NUMBER: string | null;
  USE_PHONE_NUMBER: string | null;
  USE_BIRTHDATE: string | null;
  USE_MEMBERSHIP_DATE: string | null;
  roles: { ROL_ID: number }[];
};

export const userMapper = {
  /**
   * Accepts `roles` as `[{ ROL_ID }]` or plain ids; `address`/`club` may be embedded.
   * Roster members come with snake_case keys (`id`, `first_name`, `email`, ...).
   */
  fromWireJson(json: JsonValue): User {
    const source = requireObject(json, ENTITY);
    const roleIds = asArray(source.roles).flatMap((entry) => {
      if (typeof entry === 'number') {
        return [entry];
      }

      const role = asObject(entry);
      const id = role ? readInteger(role, 'ROL_ID') : null;
      return id === null ? [] : [id];
    });

    return {
      id: requireFirstId(source, ['USE_ID', 'id'], ENTITY),
      addressId: readRelationId(source, 'ADD_ID', 'address') ?? 0,
      clubId: readRelationId(source, 'CLU_ID', 'club'),
      email: readFirst(readString, source, ['USE_MAIL', 'email']) ?? '',
      firstName: readFirst(readString, source, ['USE_NAME', 'first_name', 'name']) ?? '',
      lastName: readFirst(readString, source, ['USE_LAST_NAME', 'last_name']) ?? '',
      licenceNumber: readFirst(readString, source, ['USE_LICENCE_NUMBER', 'licence_number']),
      phoneNumber: readString(source, 'USE_PHONE_NUMBER'),
      birthDate: readCalendarDate(source, 'USE_BIRTHDATE'),
      membershipDate: readCalendarDate(source, 'USE_MEMBERSHIP_DATE'),
      roles: collectRoles(roleIds),
    };
  },

  fromLocalRow(row: UserRow, roleRows: readonly UserRoleRow[] = []): User {
    return {
      id: row.id,
      addressId: row.address_id,
      clubId: row.club_id,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      licenceNumber: row.licence_number,
      phoneNumber: row.phone_number,
      birthDate: row.birth_date,
      membershipDate: row.membership_date,
      roles: collectRoles(roleRows.filter((role) => role.user_id === row.id).map((role) => role.role_id)),
    };
  },

  toWireJson(user: User): UserWire {
    return {
      USE_ID: user.id,
      ADD_ID: user.addressId,
      CLU_ID: user.clubId,
      USE_MAIL: user.email,
      USE_NAME: user.firstName,
      USE_LAST_NAME: user.lastName,
      USE_LICENCE_NUMBER: user.licenceNumber,
      USE_PHONE_NUMBER: user.phoneNumber,
      USE_BIRTHDATE: user.birthDate,
      USE_MEMBERSHIP_DATE: user.membershipDate,
      roles: user.roles.map((role) => ({ ROL_ID: roleIdOf(role) })),
    };
  },

  toLocalRow(user: User): UserRow {
    return {
      id: user.id,
      address_id: user.addressId,
      club_id: user.clubId,
      email: user.email,
      first_name: user.firstName,
      last_name: user.lastName,
      licence_number: user.licenceNumber,
      phone_number: user.phoneNumber,
      birth_date: user.birthDate,
      membership_date: user.membershipDate,
    };
  },

  toRoleRows(user: User): UserRoleRow[] {
    return user.roles.map((role) => ({ user_id: user.id, role_id: roleIdOf(role) }));
  },
};
