/**
 * Project: Raid Sync
 * File: src/core/app/mappers/wireValues.ts
 * Summary: Lenient readers for backend JSON values shared by the entity mappers.
 */

import { MappingError } from '../errors/syncErrors';
import type { JsonObject, JsonValue } from '../ports/remoteClient';

export const asObject = (value: JsonValue | undefined): JsonObject | null => {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return value;
  }

  return null;
};

export const asArray = (value: JsonValue | undefined): JsonValue[] =>
  Array.isArray(value) ? value : [];

export const requireObject = (value: JsonValue | undefined, entity: string): JsonObject => {
  const object = asObject(value);
  if (!object) {
    throw new MappingError(entity, '<root>', `Expected ${entity} to be a JSON object.`);
  }

  return object;
};

export const readString = (source: JsonObject, key: string): string | null => {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return null;
};

export const readNumber = (source: JsonObject, key: string): number | null => {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

export const readInteger = (source: JsonObject, key: string): number | null => {
  const value = readNumber(source, key);
  return value !== null && Number.isInteger(value) ? value : null;
};

export const readBoolean = (source: JsonObject, key: string): boolean | null => {
  const value = source[key];
  if (typeof value === 'boolean') {
    return value;
  }

  if (value === 1 || value === '1' || value === 'true') {
    return true;
  }

  if (value === 0 || value === '0' || value === 'false') {
    return false;
  }

  return null;
};

export const readTimestamp = (source: JsonObject, key: string): Date | null => {
  const value = source[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    return null;
  }

  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

const CALENDAR_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/u;

/** Accepts `YYYY-MM-DD` or a full timestamp and keeps the calendar day. */
export const readCalendarDate = (source: JsonObject, key: string): string | null => {
  const value = source[key];
  if (typeof value !== 'string') {
    return null;
  }

  const match = CALENDAR_DATE_PREFIX.exec(value.trim());
  return match?.[1] ?? null;
};

export const requireId = (source: JsonObject, key: string, entity: string): number => {
  const id = readInteger(source, key);
  if (id === null) {
    throw new MappingError(entity, key);
  }

  return id;
};

/** First value `read` finds among `keys`; team and roster payloads name a column in two ways. */
export const readFirst = <T>(
  read: (source: JsonObject, key: string) => T | null,
  source: JsonObject,
  keys: readonly string[],
): T | null => {
  for (const key of keys) {
    const value = read(source, key);
    if (value !== null) {
      return value;
    }
  }

  return null;
};

export const requireFirstId = (
  source: JsonObject,
  keys: readonly [string, ...string[]],
  entity: string,
): number => {
  const id = readFirst(readInteger, source, keys);
  if (id === null) {
    throw new MappingError(entity, keys[0]);
  }

  return id;
};

export const requireTimestamp = (source: JsonObject, key: string, entity: string): Date => {
  const value = readTimestamp(source, key);
  if (!value) {
    throw new MappingError(entity, key);
  }

  return value;
};

/**
 * Reads a foreign key from its flat column, or from the id of the embedded relation
 * object when the backend nests it (e.g. `club: { CLU_ID: 3 }`).
 */
export const readRelationId = (
  source: JsonObject,
  key: string,
  relation: string,
): number | null => {
  const flat = readInteger(source, key);
  if (flat !== null) {
    return flat;
  }

  const nested = asObject(source[relation]);
  return nested ? readInteger(nested, key) : null;
};

export const toTimestamp = (value: Date): string => value.toISOString();

export const parseStoredTimestamp = (value: string, entity: string, field: string): Date => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new MappingError(entity, field, `Stored ${entity}.${field} is not a timestamp.`);
  }

  return parsed;
};

/** List payloads may be bare arrays or wrapped as `{ data: [...] }`. */
export const asCollection = (value: JsonValue): JsonValue[] => {
  if (Array.isArray(value)) {
    return value;
  }

  const wrapper = asObject(value);
  return wrapper ? asArray(wrapper.data) : [];
};

/** Single-entity payloads may be bare objects or wrapped as `{ data: {...} }`. */
export const asEntity = (value: JsonValue): JsonValue => {
  const wrapper = asObject(value);
  const inner = wrapper ? asObject(wrapper.data) : null;
  return inner ?? value;
};
