import type { Club, ClubDraft } from '../../../domain/club';
import { clubMapper } from '../../mappers/clubMapper';
import { asCollection, asEntity } from '../../mappers/wireValues';
import type { LocalStore } from '../../ports/localStore';
import { scopeKey } from './keyedMutex';
import { isLocalId } from './localIds';
import { localReferences, outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const CLUBS_SCOPE = scopeKey('clubs');

const loadClub = async (store: LocalStore, id: number): Promise<Club | null> => {
  const [row] = await store.query('clubs', { id });
  return row ? clubMapper.fromLocalRow(row) : null;
};

export class ClubSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchClubs(signal?: AbortSignal): Promise<SyncReadResult<Club[]>> {
    return this.coordinator.read<Club[]>({
      operation: 'clubs.list',
      scope: CLUBS_SCOPE,
      path: '/clubs',
      resource: 'Clubs',
      signal,
      decode: (data) => asCollection(data).map((item) => clubMapper.fromWireJson(item)),
      reconcile: (store, clubs) =>
        store.replaceAll(
          'clubs',
          clubs.map((club) => clubMapper.toLocalRow(club)),
        ),
      readLocal: async (store) =>
        (await store.query('clubs')).map((row) => clubMapper.fromLocalRow(row)),
      whenAbsent: async (store) => {
        await store.replaceAll('clubs', []);
        return [];
      },
    });
  }

  fetchClub(id: number, signal?: AbortSignal): Promise<SyncReadResult<Club | null>> {
    return this.coordinator.read<Club | null>({
      operation: 'clubs.get',
      scope: CLUBS_SCOPE,
      path: `/clubs/${id}`,
      resource: 'Club',
      signal,
      decode: (data) => clubMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, club) => {
        if (club) {
          await store.upsert('clubs', clubMapper.toLocalRow(club));
        }
      },
      readLocal: (store) => loadClub(store, id),
      whenAbsent: async (store) => {
        await store.delete('clubs', { id });
        return null;
      },
    });
  }

  createClub(draft: ClubDraft, signal?: AbortSignal): Promise<SyncWriteResult> {
    return this.coordinator.write({
      kind: 'create',
      entity: 'club',
      operation: 'clubs.create',
      action: 'club.create',
      scope: CLUBS_SCOPE,
      resource: 'Club',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/clubs',
        body: clubMapper.toCreatePayload(draft),
        bodyRefs: localReferences({
          USE_ID: { entity: 'user', id: draft.managerId },
          ADD_ID: { entity: 'address', id: draft.addressId },
        }),
      }),
      applyRemote: async (store, data) => {
        const club = clubMapper.fromWireJson(asEntity(data));
        await store.upsert('clubs', clubMapper.toLocalRow(club));
        return club.id;
      },
      applyLocal: (store, localId) =>
        store.upsert('clubs', clubMapper.toLocalRow({ ...draft, id: localId })),
    });
  }

  updateClub(club: Club, signal?: AbortSignal): Promise<SyncWriteResult> {
    const row = clubMapper.toLocalRow(club);
    return this.coordinator.write({
      kind: 'mutation',
      targetId: club.id,
      operation: 'clubs.update',
      action: 'club.update',
      scope: CLUBS_SCOPE,
      resource: 'Club',
      signal,
      request: outboundRequest({
        method: 'PUT',
        path: '/clubs/{id}',
        params: { id: { entity: 'club', id: club.id } },
        body: clubMapper.toCreatePayload(club),
        bodyRefs: localReferences({
          USE_ID: { entity: 'user', id: club.managerId },
          ADD_ID: { entity: 'address', id: club.addressId },
        }),
      }),
      applyRemote: (store) => store.upsert('clubs', row),
      applyLocal: (store) => store.upsert('clubs', row),
    });
  }

  async deleteClub(id: number, signal?: AbortSignal): Promise<SyncWriteResult> {
    const removeLocally = async (store: LocalStore) => {
      await store.delete('clubs', { id });
    };

    if (isLocalId(id)) {
      await this.coordinator.discardUnsyncedEntity('club', id);
      await this.coordinator.locks.run(CLUBS_SCOPE, () => removeLocally(this.coordinator.store));
      return { id, confirmed: true, outboundEntryId: null };
    }

    return this.coordinator.write({
      kind: 'mutation',
      targetId: id,
      operation: 'clubs.delete',
      action: 'club.delete',
      scope: CLUBS_SCOPE,
      resource: 'Club',
      signal,
      request: outboundRequest({
        method: 'DELETE',
        path: '/clubs/{id}',
        params: { id: { entity: 'club', id } },
      }),
      applyRemote: (store) => removeLocally(store),
      applyLocal: (store) => removeLocally(store),
    });
  }
}
