import type { Address, AddressDraft } from '../../domain/address';
import type { AddressRow } from '../ports/localStore';
import type { JsonValue } from '../ports/remoteClient';
import { readString, requireId, requireObject } from './wireValues';

const ENTITY = 'address';

export type AddressPayload = {
  ADD_POSTAL_CODE: string;
  ADD_CITY: string;
  ADD_STREET_NAME: string;
  ADD_STREET_NUMBER: string;
};

export type AddressWire = AddressPayload & { ADD_ID: number };

export const addressMapper = {
  fromWireJson(json: JsonValue): Address {
    const source = requireObject(json, ENTITY);
    return {
      id: requireId(source, 'ADD_ID', ENTITY),
      postalCode: readString(source, 'ADD_POSTAL_CODE') ?? '',
      city: readString(source, 'ADD_CITY') ?? '',
      streetName: readString(source, 'ADD_STREET_NAME') ?? '',
      streetNumber: readString(source, 'ADD_STREET_NUMBER') ?? '',
    };
  },

  fromLocalRow(row: AddressRow): Address {
    return {
      id: row.id,
      postalCode: row.postal_code,
      city: row.city,
      streetName: row.street_name,
      streetNumber: row.street_number,
    };
  },

  toCreatePayload(draft: AddressDraft): AddressPayload {
    return {
      ADD_POSTAL_CODE: draft.postalCode,
      ADD_CITY: draft.city,
      ADD_STREET_NAME: draft.streetName,
      ADD_STREET_NUMBER: draft.streetNumber,
    };
  },

  toWireJson(address: Address): AddressWire {
    return { ADD_ID: address.id, ...addressMapper.toCreatePayload(address) };
  },

  toLocalRow(address: Address): AddressRow {
    return {
      id: address.id,
      postal_code: address.postalCode,
      city: address.city,
      street_name: address.streetName,
      street_number: address.streetNumber,
    };
  },
};
