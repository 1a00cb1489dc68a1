import type { Raid, RaidDraft } from '../../../domain/raid';
import { raidMapper } from '../../mappers/raidMapper';
import { asCollection, asEntity } from '../../mappers/wireValues';
import { scopeKey } from './keyedMutex';
import { loadRaid } from './localReads';
import { isLocalId } from './localIds';
import { localReferences, outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const RAIDS_SCOPE = scopeKey('raids');

export class RaidSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchRaids(signal?: AbortSignal): Promise<SyncReadResult<Raid[]>> {
    return this.coordinator.read<Raid[]>({
      operation: 'raids.list',
      scope: RAIDS_SCOPE,
      path: '/raids',
      resource: 'Raids',
      signal,
      decode: (data) => asCollection(data).map((item) => raidMapper.fromWireJson(item)),
      reconcile: (store, raids) =>
        store.replaceAll(
          'raids',
          raids.map((raid) => raidMapper.toLocalRow(raid)),
        ),
      readLocal: async (store) =>
        (await store.query('raids')).map((row) => raidMapper.fromLocalRow(row)),
      whenAbsent: async (store) => {
        await store.replaceAll('raids', []);
        return [];
      },
    });
  }

  fetchRaid(id: number, signal?: AbortSignal): Promise<SyncReadResult<Raid | null>> {
    return this.coordinator.read<Raid | null>({
      operation: 'raids.get',
      scope: RAIDS_SCOPE,
      path: `/raids/${id}`,
      resource: 'Raid',
      signal,
      decode: (data) => raidMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, raid) => {
        if (raid) {
          await store.upsert('raids', raidMapper.toLocalRow(raid));
        }
      },
      readLocal: (store) => loadRaid(store, id),
      whenAbsent: async (store) => {
        await store.delete('raids', { id });
        return null;
      },
    });
  }

  createRaid(draft: RaidDraft, signal?: AbortSignal): Promise<SyncWriteResult> {
    return this.coordinator.write({
      kind: 'create',
      entity: 'raid',
      operation: 'raids.create',
      action: 'raid.create',
      scope: RAIDS_SCOPE,
      resource: 'Raid',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/raids',
        body: raidMapper.toCreatePayload(draft),
        bodyRefs: localReferences({
          CLU_ID: { entity: 'club', id: draft.clubId },
          ADD_ID: { entity: 'address', id: draft.addressId },
          USE_ID: { entity: 'user', id: draft.managerId },
        }),
      }),
      applyRemote: async (store, data) => {
        const raid = raidMapper.fromWireJson(asEntity(data));
        await store.upsert('raids', raidMapper.toLocalRow(raid));
        return raid.id;
      },
      applyLocal: (store, localId) =>
        store.upsert('raids', raidMapper.toLocalRow({ ...draft, id: localId })),
    });
  }

  updateRaid(raid: Raid, signal?: AbortSignal): Promise<SyncWriteResult> {
    const row = raidMapper.toLocalRow(raid);
    return this.coordinator.write({
      kind: 'mutation',
      targetId: raid.id,
      operation: 'raids.update',
      action: 'raid.update',
      scope: RAIDS_SCOPE,
      resource: 'Raid',
      signal,
      request: outboundRequest({
        method: 'PUT',
        path: '/raids/{id}',
        params: { id: { entity: 'raid', id: raid.id } },
        body: raidMapper.toCreatePayload(raid),
        bodyRefs: localReferences({
          CLU_ID: { entity: 'club', id: raid.clubId },
          ADD_ID: { entity: 'address', id: raid.addressId },
          USE_ID: { entity: 'user', id: raid.managerId },
        }),
      }),
      applyRemote: (store) => store.upsert('raids', row),
      applyLocal: (store) => store.upsert('raids', row),
    });
  }

  async deleteRaid(id: number, signal?: AbortSignal): Promise<SyncWriteResult> {
    const removeLocally = async () => {
      await this.coordinator.store.clearScope('races', 'raid_id', id);
      await this.coordinator.store.delete('raids', { id });
    };

    if (isLocalId(id)) {
      await this.coordinator.discardUnsyncedEntity('raid', id);
      await this.coordinator.locks.run(RAIDS_SCOPE, removeLocally);
      return { id, confirmed: true, outboundEntryId: null };
    }

    return this.coordinator.write({
      kind: 'mutation',
      targetId: id,
      operation: 'raids.delete',
      action: 'raid.delete',
      scope: RAIDS_SCOPE,
      resource: 'Raid',
      signal,
      request: outboundRequest({
        method: 'DELETE',
        path: '/raids/{id}',
        params: { id: { entity: 'raid', id } },
      }),
      applyRemote: removeLocally,
      applyLocal: removeLocally,
    });
  }
}
