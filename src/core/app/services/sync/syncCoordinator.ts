/**
 * Project: Raid Sync
 * File: src/core/app/services/sync/syncCoordinator.ts
 * Summary: Read and write protocol shared by every entity service: remote first,
 * reconcile into the local store, fall back to the cache or the outbound queue
 * on connectivity-class failures.
 */

import { randomUUID } from 'node:crypto';

import { ensureError } from '../../../../lib/errors/ensureError';
import { createErrorLogContext } from '../../../../lib/logging/error';
import { CancelledError, LocalStoreError, toSyncError } from '../../errors/syncErrors';
import type { AuthProvider } from '../../ports/authProvider';
import type { EntityKind, LocalStore } from '../../ports/localStore';
import type { Logger } from '../../ports/logger';
import {
  isConnectivityClass,
  type JsonValue,
  type RemoteClient,
  type RemoteFailure,
  type RemoteResult,
} from '../../ports/remoteClient';
import { KeyedMutex } from './keyedMutex';
import { createLocalIdGenerator, isLocalId, type LocalIdGenerator } from './localIds';
import {
  materialiseRequest,
  outboundEntryFromRow,
  outboundEntryToRow,
  referencesEntity,
  type IdReference,
  type OutboundActionType,
  type OutboundEntry,
  type OutboundRequest,
  type ResolvedRequest,
} from './outboundPayload';
import { extractServerId } from './serverIds';

export type Freshness = 'fresh' | 'cached';

export type SyncReadResult<T> = {
  data: T;
  freshness: Freshness;
  /** Remote failure that caused a cached answer. */
  degradedBy?: RemoteFailure;
};

export type SyncWriteResult = {
  id: number;
  /** False while the write only exists locally and in the outbound queue. */
  confirmed: boolean;
  outboundEntryId: string | null;
};

export type ReadPlan<T> = {
  operation: string;
  scope: string;
  path: string;
  resource: string;
  signal?: AbortSignal;
  decode: (data: JsonValue) => T;
  /** Writes a fresh result into the store with replace semantics. */
  reconcile: (store: LocalStore, fresh: T) => Promise<void>;
  readLocal: (store: LocalStore) => Promise<T>;
  /**
   * Result for a 404: `null` for a single entity, `[]` for a list. The plan evicts
   * what it cached for the resource.
   */
  whenAbsent: (store: LocalStore) => Promise<T>;
};

type WritePlanBase = {
  operation: string;
  action: OutboundActionType;
  scope: string;
  resource: string;
  request: OutboundRequest;
  signal?: AbortSignal;
};

export type CreatePlan = WritePlanBase & {
  kind: 'create';
  entity: EntityKind;
  /** Stores the authoritative entity and returns its server id. */
  applyRemote: (store: LocalStore, data: JsonValue) => Promise<number>;
  applyLocal: (store: LocalStore, localId: number) => Promise<void>;
};

export type MutationPlan = WritePlanBase & {
  kind: 'mutation';
  targetId: number;
  applyRemote: (store: LocalStore, data: JsonValue) => Promise<void>;
  applyLocal: (store: LocalStore) => Promise<void>;
};

export type WritePlan = CreatePlan | MutationPlan;

export type SyncCoordinatorDependencies = {
  store: LocalStore;
  remote: RemoteClient;
  auth: AuthProvider;
  logger?: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
  clock?: () => Date;
  locks?: KeyedMutex;
  localIds?: LocalIdGenerator;
};

export class SyncCoordinator {
  readonly store: LocalStore;

  readonly locks: KeyedMutex;

  private readonly remote: RemoteClient;

  private readonly auth: AuthProvider;

  private readonly logger?: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

  private readonly clock: () => Date;

  private readonly localIds: LocalIdGenerator;

  constructor(dependencies: SyncCoordinatorDependencies) {
    this.store = dependencies.store;
    this.remote = dependencies.remote;
    this.auth = dependencies.auth;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.locks = dependencies.locks ?? new KeyedMutex();
    this.localIds = dependencies.localIds ?? createLocalIdGenerator(this.clock);
  }

  now(): Date {
    return this.clock();
  }

  async read<T>(plan: ReadPlan<T>): Promise<SyncReadResult<T>> {
    const startedAt = Date.now();
    const authToken = await this.auth.currentToken();
    const result = await this.remote.request({
      method: 'GET',
      path: plan.path,
      authToken,
      signal: plan.signal,
    });

    if (result.ok) {
      const fresh = plan.decode(result.data);
      await this.locks.run(plan.scope, () => plan.reconcile(this.store, fresh));
      this.logger?.debug('Read served from remote.', {
        event: 'sync.read.fresh',
        operation: plan.operation,
        scope: plan.scope,
        outcome: 'success',
        durationMs: Date.now() - startedAt,
      });
      return { data: fresh, freshness: 'fresh' };
    }

    const { failure } = result;
    if (failure.kind === 'client' && failure.status === 404) {
      const data = await this.locks.run(plan.scope, () => plan.whenAbsent(this.store));
      this.logger?.info('Remote reported resource as absent.', {
        event: 'sync.read.absent',
        operation: plan.operation,
        scope: plan.scope,
        outcome: 'absent',
        durationMs: Date.now() - startedAt,
      });
      return { data, freshness: 'fresh' };
    }

    if (!isConnectivityClass(failure)) {
      throw toSyncError(failure, plan.resource);
    }

    try {
      const data = await this.locks.run(plan.scope, () => plan.readLocal(this.store));
      this.logger?.warn('Remote unavailable, serving cached data.', {
        event: 'sync.read.fallback',
        operation: plan.operation,
        scope: plan.scope,
        outcome: 'fallback',
        status: failure.status,
        reason: failure.message,
        durationMs: Date.now() - startedAt,
      });
      return { data, freshness: 'cached', degradedBy: failure };
    } catch (error) {
      throw new LocalStoreError(
        `Cached ${plan.resource} could not be read.`,
        { remoteFailure: failure },
        { cause: ensureError(error) },
      );
    }
  }

  async write(plan: WritePlan): Promise<SyncWriteResult> {
    const startedAt = Date.now();
    const queuedFirst = await this.hasPendingWrites(plan.scope);
    const materialised = queuedFirst
      ? null
      : await materialiseRequest(plan.request, (ref) => this.resolveReference(ref));

    let failure: RemoteFailure | null = null;

    if (materialised?.ok) {
      const result = await this.send(materialised.request, plan.signal);

      if (result.ok) {
        const id = await this.reconcileConfirmed(plan, result.data, startedAt);

        this.logger?.info('Write confirmed by remote.', {
          event: 'sync.write.confirmed',
          operation: plan.operation,
          scope: plan.scope,
          outcome: 'success',
          durationMs: Date.now() - startedAt,
        });
        return { id, confirmed: true, outboundEntryId: null };
      }

      failure = result.failure;
      if (failure.kind === 'cancelled') {
        throw new CancelledError(failure.message);
      }

      if (!isConnectivityClass(failure)) {
        this.logger?.warn('Write rejected by remote.', {
          event: 'sync.write.rejected',
          operation: plan.operation,
          scope: plan.scope,
          outcome: 'failure',
          status: failure.status,
          durationMs: Date.now() - startedAt,
        });
        throw toSyncError(failure, plan.resource);
      }
    }

    return this.writeLocally(plan, failure, startedAt);
  }

  /**
   * Stores the outcome of a write the remote accepted. A failure here leaves the
   * entity on the server only, so the error carries the server id.
   */
  private async reconcileConfirmed(
    plan: WritePlan,
    data: JsonValue,
    startedAt: number,
  ): Promise<number> {
    try {
      return await this.locks.run(plan.scope, async () => {
        if (plan.kind === 'create') {
          return plan.applyRemote(this.store, data);
        }

        await plan.applyRemote(this.store, data);
        return plan.targetId;
      });
    } catch (error) {
      const serverId = plan.kind === 'create' ? extractServerId(data, plan.entity) : plan.targetId;
      this.logger?.error(
        'Remote accepted the write but the local store could not be updated.',
        createErrorLogContext(
          {
            event: 'sync.write.reconcile_failed',
            operation: plan.operation,
            scope: plan.scope,
            outcome: 'failure',
            serverId,
            durationMs: Date.now() - startedAt,
          },
          error,
        ),
      );
      throw new LocalStoreError(
        `${plan.resource} was saved remotely but could not be stored locally.`,
        { serverId },
        { cause: ensureError(error) },
      );
    }
  }

  /** Sends a resolved write with the current token. */
  async send(request: ResolvedRequest, signal?: AbortSignal): Promise<RemoteResult> {
    const authToken = await this.auth.currentToken();
    return this.remote.request({ ...request, authToken, signal });
  }

  /** Server id for a reference, or null while its entity only exists locally. */
  async resolveReference(ref: IdReference): Promise<number | null> {
    if (!isLocalId(ref.id)) {
      return ref.id;
    }

    const [mapping] = await this.store.query('id_mappings', {
      entity: ref.entity,
      local_id: ref.id,
    });
    return mapping ? mapping.server_id : null;
  }

  /**
   * Drops queued writes that create or reference an entity that never reached the
   * remote. Used when such an entity is deleted locally.
   */
  async discardUnsyncedEntity(entity: EntityKind, localId: number): Promise<number> {
    const entries = await this.listQueuedEntries();
    const obsolete = entries.filter((entry) => referencesEntity(entry.payload, entity, localId));

    for (const entry of obsolete) {
      await this.store.dequeueOutbound(entry.id);
    }

    if (obsolete.length > 0) {
      this.logger?.info('Discarded queued writes for unsynced entity.', {
        event: 'sync.outbound.discarded',
        entity,
        localId,
        count: obsolete.length,
      });
    }

    return obsolete.length;
  }

  async listQueuedEntries(): Promise<OutboundEntry[]> {
    const rows = await this.store.listPendingOutbound();
    return rows.map(outboundEntryFromRow);
  }

  /** Entries still waiting or being replayed hold back later writes on their scope. */
  private async hasPendingWrites(scope: string): Promise<boolean> {
    const rows = await this.store.listOutbound();
    return rows
      .filter((row) => row.status !== 'rejected')
      .map(outboundEntryFromRow)
      .some((entry) => entry.payload.scope === scope);
  }

  private async writeLocally(
    plan: WritePlan,
    failure: RemoteFailure | null,
    startedAt: number,
  ): Promise<SyncWriteResult> {
    const id = plan.kind === 'create' ? this.localIds.next() : plan.targetId;
    const entry: OutboundEntry = {
      id: randomUUID(),
      action: plan.action,
      payload: {
        request: plan.request,
        scope: plan.scope,
        creates: plan.kind === 'create' ? { entity: plan.entity, localId: id } : null,
      },
      createdAt: this.clock(),
      status: 'pending',
      attempts: 0,
      lastError: failure?.message ?? null,
    };

    try {
      await this.locks.run(plan.scope, async () => {
        if (plan.kind === 'create') {
          await plan.applyLocal(this.store, id);
        } else {
          await plan.applyLocal(this.store);
        }

        await this.store.enqueueOutbound(outboundEntryToRow(entry));
      });
    } catch (error) {
      this.logger?.error(
        'Local fallback write failed.',
        createErrorLogContext(
          { event: 'sync.write.local_failed', operation: plan.operation, outcome: 'failure' },
          error,
        ),
      );
      throw new LocalStoreError(
        `Could not store ${plan.resource} locally.`,
        { remoteFailure: failure },
        { cause: ensureError(error) },
      );
    }

    this.logger?.warn('Write stored locally and queued for replay.', {
      event: 'sync.write.queued',
      operation: plan.operation,
      scope: plan.scope,
      outcome: 'queued',
      outboundEntryId: entry.id,
      status: failure?.status ?? null,
      durationMs: Date.now() - startedAt,
    });

    return { id, confirmed: false, outboundEntryId: entry.id };
  }
}
