/**
 * Typed outbound queue entries and their JSON payload codec.
 *
 * A queued write stores the request it failed to send. Ids that may still be
 * local (negative) are kept as references so replay can substitute the server id
 * once the entity that owns them has been created remotely.
 */

import { z } from 'zod';

import type { EntityKind, OutboundQueueRow, OutboundStatus } from '../../ports/localStore';
import type { JsonObject, JsonValue } from '../../ports/remoteClient';
import { jsonObjectSchema } from '../../validation/json';

export const OUTBOUND_ACTION_TYPES = [
  'address.create',
  'club.create',
  'club.update',
  'club.delete',
  'raid.create',
  'raid.update',
  'raid.delete',
  'race.create',
  'race.delete',
  'user.update',
  'team.create',
  'team.delete',
  'team.addMember',
  'team.removeMember',
  'team.registerRace',
  'team.validate',
  'team.invalidate',
  'registration.update',
] as const;

export type OutboundActionType = (typeof OUTBOUND_ACTION_TYPES)[number];

export type WriteMethod = 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type IdReference = {
  entity: EntityKind;
  id: number;
};

export type OutboundRequest = {
  method: WriteMethod;
  /** Path template; `{name}` segments are filled from `params`. */
  path: string;
  params: Record<string, IdReference>;
  body: JsonObject | null;
  /** Top-level body fields holding an id that may still be local. */
  bodyRefs: Record<string, IdReference>;
};

export type OutboundPayload = {
  request: OutboundRequest;
  /** Lock scope of the write, used to keep later writes behind queued ones. */
  scope: string;
  creates: { entity: EntityKind; localId: number } | null;
};

export type OutboundEntry = {
  id: string;
  action: OutboundActionType;
  payload: OutboundPayload;
  createdAt: Date;
  status: OutboundStatus;
  attempts: number;
  lastError: string | null;
};

const entityKindSchema = z.enum(['address', 'user', 'club', 'raid', 'race', 'team']);

const idReferenceSchema = z.object({
  entity: entityKindSchema,
  id: z.number().int(),
});

const outboundPayloadSchema = z.object({
  request: z.object({
    method: z.enum(['POST', 'PUT', 'PATCH', 'DELETE']),
    path: z.string().startsWith('/'),
    params: z.record(idReferenceSchema),
    body: jsonObjectSchema.nullable(),
    bodyRefs: z.record(idReferenceSchema),
  }),
  scope: z.string(),
  creates: z.object({ entity: entityKindSchema, localId: z.number().int() }).nullable(),
});

const actionSchema = z.enum(OUTBOUND_ACTION_TYPES);

export const outboundEntryFromRow = (row: OutboundQueueRow): OutboundEntry => {
  const payload: unknown = JSON.parse(row.payload);

  return {
    id: row.id,
    action: actionSchema.parse(row.action),
    payload: outboundPayloadSchema.parse(payload),
    createdAt: new Date(row.created_at),
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
  };
};

export const outboundEntryToRow = (entry: OutboundEntry): OutboundQueueRow => ({
  id: entry.id,
  action: entry.action,
  payload: JSON.stringify(entry.payload),
  created_at: entry.createdAt.getTime(),
  status: entry.status,
  attempts: entry.attempts,
  last_error: entry.lastError,
});

export const requestReferences = (request: OutboundRequest): IdReference[] => [
  ...Object.values(request.params),
  ...Object.values(request.bodyRefs),
];

export const referencesEntity = (
  payload: OutboundPayload,
  entity: EntityKind,
  id: number,
): boolean =>
  (payload.creates?.entity === entity && payload.creates.localId === id) ||
  requestReferences(payload.request).some((ref) => ref.entity === entity && ref.id === id);

export type ResolvedRequest = {
  method: WriteMethod;
  path: string;
  body: JsonValue | undefined;
};

const PATH_PARAM = /\{(\w+)\}/gu;

/**
 * Fills path parameters and referenced body fields with resolved ids. Returns the
 * first reference `resolve` could not map when one is still local.
 */
export const materialiseRequest = async (
  request: OutboundRequest,
  resolve: (ref: IdReference) => Promise<number | null>,
): Promise<{ ok: true; request: ResolvedRequest } | { ok: false; unresolved: IdReference }> => {
  const params = new Map<string, number>();
  for (const [name, ref] of Object.entries(request.params)) {
    const id = await resolve(ref);
    if (id === null) {
      return { ok: false, unresolved: ref };
    }
    params.set(name, id);
  }

  let body: JsonObject | null = request.body ? { ...request.body } : null;
  for (const [field, ref] of Object.entries(request.bodyRefs)) {
    const id = await resolve(ref);
    if (id === null) {
      return { ok: false, unresolved: ref };
    }
    body = { ...(body ?? {}), [field]: id };
  }

  const path = request.path.replace(PATH_PARAM, (segment, name: string) => {
    const id = params.get(name);
    return id === undefined ? segment : String(id);
  });

  return { ok: true, request: { method: request.method, path, body: body ?? undefined } };
};

type RequestInput = {
  method: WriteMethod;
  path: string;
  params?: Record<string, IdReference>;
  body?: JsonObject | null;
  bodyRefs?: Record<string, IdReference>;
};

export const outboundRequest = (input: RequestInput): OutboundRequest => ({
  method: input.method,
  path: input.path,
  params: input.params ?? {},
  body: input.body ?? null,
  bodyRefs: input.bodyRefs ?? {},
});

/** Keeps only the references that point to entities still identified locally. */
export const localReferences = (
  candidates: Record<string, IdReference>,
): Record<string, IdReference> =>
  Object.fromEntries(Object.entries(candidates).filter(([, ref]) => ref.id < 0));
