/**
 * Project: Raid Sync
 * File: src/core/app/services/sync/outboundReplayService.ts
 * Summary: Drains the outbound queue in creation order once the network is back.
 *
 * A connectivity-class failure stops the drain so later writes keep their order.
 * Any other failure moves the entry to `rejected`, together with every later entry
 * that depends on an entity it was supposed to create. A replayed create records
 * the server id and rewrites the local id across the cache.
 */

import { createErrorLogContext } from '../../../../lib/logging/error';
import type { ConnectivitySignal } from '../../ports/connectivitySignal';
import type { Logger } from '../../ports/logger';
import { isConnectivityClass, type RemoteFailure } from '../../ports/remoteClient';
import {
  materialiseRequest,
  outboundEntryFromRow,
  referencesEntity,
  type IdReference,
  type OutboundEntry,
} from './outboundPayload';
import { extractServerId } from './serverIds';
import type { SyncCoordinator } from './syncCoordinator';

export type ReplaySummary = {
  replayed: number;
  rejected: number;
  /** Entries still pending after the drain. */
  remaining: number;
  /** Failure that interrupted the drain, if any. */
  stoppedBy: RemoteFailure | null;
};

export type OutboundReplayDependencies = {
  coordinator: SyncCoordinator;
  logger?: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
};

export class OutboundReplayService {
  private readonly coordinator: SyncCoordinator;

  private readonly logger?: Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

  private inFlight: Promise<ReplaySummary> | null = null;

  constructor(dependencies: OutboundReplayDependencies) {
    this.coordinator = dependencies.coordinator;
    this.logger = dependencies.logger;
  }

  /** Joins the running drain when one is already in progress. */
  replayPending(signal?: AbortSignal): Promise<ReplaySummary> {
    if (!this.inFlight) {
      this.inFlight = this.drain(signal).finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  get isReplaying(): boolean {
    return this.inFlight !== null;
  }

  /** Replays the queue every time the signal fires; returns the unsubscribe function. */
  attach(signal: ConnectivitySignal): () => void {
    return signal.subscribe(() => {
      this.replayPending().catch((error: unknown) => {
        this.logger?.error(
          'Outbound replay failed.',
          createErrorLogContext({ event: 'sync.outbound.replay_failed', outcome: 'failure' }, error),
        );
      });
    });
  }

  private async drain(signal?: AbortSignal): Promise<ReplaySummary> {
    const { store } = this.coordinator;
    const startedAt = Date.now();
    const summary: ReplaySummary = { replayed: 0, rejected: 0, remaining: 0, stoppedBy: null };

    const rows = await store.listOutbound();
    const rejectedCreates: IdReference[] = [];
    for (const row of rows) {
      if (row.status === 'replaying') {
        // Left over from an interrupted drain.
        await store.updateOutbound(row.id, { status: 'pending' });
      }

      if (row.status === 'rejected') {
        const { creates } = outboundEntryFromRow(row).payload;
        if (creates) {
          rejectedCreates.push({ entity: creates.entity, id: creates.localId });
        }
      }
    }

    const entries = await this.coordinator.listQueuedEntries();

    for (const [index, entry] of entries.entries()) {
      if (signal?.aborted) {
        break;
      }

      const dependency = rejectedCreates.find((ref) =>
        referencesEntity(entry.payload, ref.entity, ref.id),
      );
      if (dependency) {
        await this.reject(
          entry,
          `Depends on ${dependency.entity} ${dependency.id}, whose creation was rejected.`,
          rejectedCreates,
        );
        summary.rejected += 1;
        continue;
      }

      await store.updateOutbound(entry.id, { status: 'replaying' });
      const materialised = await materialiseRequest(entry.payload.request, (ref) =>
        this.coordinator.resolveReference(ref),
      );

      if (!materialised.ok) {
        const { unresolved } = materialised;
        const ownerQueued = entries
          .slice(index + 1)
          .some(
            (later) =>
              later.payload.creates?.entity === unresolved.entity &&
              later.payload.creates.localId === unresolved.id,
          );

        if (ownerQueued) {
          await store.updateOutbound(entry.id, { status: 'pending' });
          break;
        }

        await this.reject(
          entry,
          `Unknown local ${unresolved.entity} ${unresolved.id}.`,
          rejectedCreates,
        );
        summary.rejected += 1;
        continue;
      }

      const result = await this.coordinator.send(materialised.request, signal);

      if (result.ok) {
        const { creates } = entry.payload;
        if (creates) {
          const serverId = extractServerId(result.data, creates.entity);
          if (serverId === null) {
            await this.reject(entry, 'Create response did not include an id.', rejectedCreates);
            summary.rejected += 1;
            continue;
          }

          await this.coordinator.locks.run(entry.payload.scope, async () => {
            await store.upsert('id_mappings', {
              entity: creates.entity,
              local_id: creates.localId,
              server_id: serverId,
            });
            await store.remapEntityId(creates.entity, creates.localId, serverId);
          });
        }

        await store.dequeueOutbound(entry.id);
        summary.replayed += 1;
        this.logger?.info('Queued write replayed.', {
          event: 'sync.outbound.replayed',
          action: entry.action,
          scope: entry.payload.scope,
          outboundEntryId: entry.id,
          outcome: 'success',
        });
        continue;
      }

      const { failure } = result;
      if (failure.kind === 'cancelled') {
        await store.updateOutbound(entry.id, { status: 'pending' });
        summary.stoppedBy = failure;
        break;
      }

      if (isConnectivityClass(failure)) {
        await store.updateOutbound(entry.id, {
          status: 'pending',
          attempts: entry.attempts + 1,
          last_error: failure.message,
        });
        summary.stoppedBy = failure;
        this.logger?.warn('Replay interrupted by connectivity failure.', {
          event: 'sync.outbound.deferred',
          action: entry.action,
          outboundEntryId: entry.id,
          status: failure.status,
          outcome: 'deferred',
        });
        break;
      }

      await this.reject(entry, failure.message, rejectedCreates, failure.status);
      summary.rejected += 1;
    }

    summary.remaining = (await store.listPendingOutbound()).length;
    this.logger?.info('Outbound queue drained.', {
      event: 'sync.outbound.drained',
      outcome: summary.stoppedBy ? 'interrupted' : 'success',
      replayed: summary.replayed,
      rejected: summary.rejected,
      remaining: summary.remaining,
      durationMs: Date.now() - startedAt,
    });

    return summary;
  }

  private async reject(
    entry: OutboundEntry,
    reason: string,
    rejectedCreates: IdReference[],
    status: number | null = null,
  ): Promise<void> {
    await this.coordinator.store.updateOutbound(entry.id, {
      status: 'rejected',
      attempts: entry.attempts + 1,
      last_error: reason,
    });

    const { creates } = entry.payload;
    if (creates) {
      rejectedCreates.push({ entity: creates.entity, id: creates.localId });
    }

    this.logger?.warn('Queued write rejected.', {
      event: 'sync.outbound.rejected',
      action: entry.action,
      outboundEntryId: entry.id,
      status,
      reason,
      outcome: 'rejected',
    });
  }
}
