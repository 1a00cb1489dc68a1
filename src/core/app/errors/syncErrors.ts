/**
 * Project: Raid Sync
 * File: src/core/app/errors/syncErrors.ts
 * Summary: Error taxonomy surfaced by sync operations, discriminated by `kind`.
 */

import type { RemoteFailure } from '../ports/remoteClient';

export type SyncErrorKind =
  | 'connectivity'
  | 'auth'
  | 'permission'
  | 'validation'
  | 'not-found'
  | 'capacity'
  | 'composition'
  | 'eligibility'
  | 'mapping'
  | 'local-store'
  | 'cancelled';

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;
}

export class ConnectivityError extends SyncError {
  readonly kind = 'connectivity';

  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConnectivityError';
  }
}

export class AuthError extends SyncError {
  readonly kind = 'auth';

  constructor(message = 'Authentication is required or has expired.') {
    super(message);
    this.name = 'AuthError';
  }
}

export class PermissionError extends SyncError {
  readonly kind = 'permission';

  constructor(message = 'The current user is not allowed to perform this action.') {
    super(message);
    this.name = 'PermissionError';
  }
}

export class ValidationError extends SyncError {
  readonly kind = 'validation';

  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]> = {},
    public readonly status: number | null = 422,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SyncError {
  readonly kind = 'not-found';

  constructor(
    public readonly resource: string,
    public readonly resourceId: number | string | null = null,
  ) {
    super(
      resourceId === null ? `${resource} not found.` : `${resource} ${String(resourceId)} not found.`,
    );
    this.name = 'NotFoundError';
  }
}

export class CapacityError extends SyncError {
  readonly kind = 'capacity';

  constructor(
    public readonly scope: string,
    public readonly limit: number,
    public readonly current: number,
  ) {
    super(`${scope} is at capacity (${current}/${limit}).`);
    this.name = 'CapacityError';
  }
}

export type CompositionRule =
  | 'team-age-bracket'
  | 'team-size'
  | 'category-price-order'
  | 'age-thresholds'
  | 'required-documents'
  | 'unknown-age';

export class CompositionError extends SyncError {
  readonly kind = 'composition';

  constructor(
    public readonly rule: CompositionRule,
    public readonly reason: string,
    message: string,
  ) {
    super(message);
    this.name = 'CompositionError';
  }
}

export type AvailabilityReason = 'alreadyInTeam' | 'hasOverlappingRace' | 'invalidAge';

export class EligibilityError extends SyncError {
  readonly kind = 'eligibility';

  constructor(
    public readonly userId: number,
    public readonly reasons: readonly AvailabilityReason[],
  ) {
    super(`User ${userId} cannot join this race (${reasons.join(', ')}).`);
    this.name = 'EligibilityError';
  }
}

export class MappingError extends SyncError {
  readonly kind = 'mapping';

  constructor(
    public readonly entity: string,
    public readonly field: string,
    message?: string,
  ) {
    super(message ?? `Missing or invalid ${entity}.${field}.`);
    this.name = 'MappingError';
  }
}

export type LocalStoreErrorContext = {
  /** Remote failure that sent the operation to the local store. */
  remoteFailure?: RemoteFailure | null;
  /**
   * Set when the remote already accepted the write: the entity exists on the server
   * under this id but could not be stored locally.
   */
  serverId?: number | null;
};

export class LocalStoreError extends SyncError {
  readonly kind = 'local-store';

  readonly remoteFailure: RemoteFailure | null;

  readonly serverId: number | null;

  constructor(message: string, context: LocalStoreErrorContext = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LocalStoreError';
    this.remoteFailure = context.remoteFailure ?? null;
    this.serverId = context.serverId ?? null;
  }

  /** True when the write is committed remotely despite the local failure. */
  get committedRemotely(): boolean {
    return this.serverId !== null;
  }
}

export class CancelledError extends SyncError {
  readonly kind = 'cancelled';

  constructor(message = 'The operation was cancelled.') {
    super(message);
    this.name = 'CancelledError';
  }
}

export type AnySyncError =
  | ConnectivityError
  | AuthError
  | PermissionError
  | ValidationError
  | NotFoundError
  | CapacityError
  | CompositionError
  | EligibilityError
  | MappingError
  | LocalStoreError
  | CancelledError;

export const isSyncError = (value: unknown): value is AnySyncError => value instanceof SyncError;

/** Maps a classified remote failure onto the error taxonomy. */
export const toSyncError = (failure: RemoteFailure, resource = 'Resource'): AnySyncError => {
  if (failure.kind === 'cancelled') {
    return new CancelledError(failure.message);
  }

  if (failure.kind === 'connectivity' || failure.kind === 'server') {
    return new ConnectivityError(failure.message, failure.status, { cause: failure.cause });
  }

  switch (failure.status) {
    case 401:
      return new AuthError(failure.message);
    case 403:
      return new PermissionError(failure.message);
    case 404:
      return new NotFoundError(resource);
    default:
      return new ValidationError(failure.message, failure.fieldErrors ?? {}, failure.status);
  }
};
