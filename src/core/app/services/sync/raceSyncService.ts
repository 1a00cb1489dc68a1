import { toCategoryPrices, type CategoryPrice, type CategoryPriceSet } from '../../../domain/category';
import type { Race, RaceDraft } from '../../../domain/race';
import { checkAgeThresholds } from '../../../domain/rules/ageRules';
import { checkPriceOrdering } from '../../../domain/rules/priceRules';
import { CapacityError, CompositionError, NotFoundError } from '../../errors/syncErrors';
import { categoryPriceMapper } from '../../mappers/categoryPriceMapper';
import { raceMapper } from '../../mappers/raceMapper';
import { asCollection, asEntity } from '../../mappers/wireValues';
import type { LocalStore } from '../../ports/localStore';
import { scopeKey } from './keyedMutex';
import { loadRace, loadRaces, loadRaid } from './localReads';
import { isLocalId } from './localIds';
import { localReferences, outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const ALL_RACES_SCOPE = scopeKey('races');

export const raidRacesScope = (raidId: number): string => scopeKey('races:raid', raidId);

const pricesScope = (raceId: number): string => scopeKey('prices:race', raceId);

const storePrices = (store: LocalStore, raceId: number, prices: readonly CategoryPrice[]) =>
  store.replaceScope(
    'category_prices',
    'race_id',
    raceId,
    prices.map((price) => categoryPriceMapper.toLocalRow({ ...price, raceId })),
  );

export type RaceSlots = {
  raidId: number;
  maxRaces: number;
  current: number;
  remaining: number;
};

export class RaceSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchRaces(signal?: AbortSignal): Promise<SyncReadResult<Race[]>> {
    return this.coordinator.read<Race[]>({
      operation: 'races.list',
      scope: ALL_RACES_SCOPE,
      path: '/races',
      resource: 'Races',
      signal,
      decode: (data) => asCollection(data).map((item) => raceMapper.fromWireJson(item)),
      reconcile: (store, races) =>
        store.replaceAll(
          'races',
          races.map((race) => raceMapper.toLocalRow(race)),
        ),
      readLocal: (store) => loadRaces(store),
      whenAbsent: async (store) => {
        await store.replaceAll('races', []);
        return [];
      },
    });
  }

  fetchRacesForRaid(raidId: number, signal?: AbortSignal): Promise<SyncReadResult<Race[]>> {
    return this.coordinator.read<Race[]>({
      operation: 'races.forRaid',
      scope: raidRacesScope(raidId),
      path: `/raids/${raidId}/races`,
      resource: 'Races',
      signal,
      decode: (data) => asCollection(data).map((item) => raceMapper.fromWireJson(item)),
      reconcile: (store, races) =>
        store.replaceScope(
          'races',
          'raid_id',
          raidId,
          races.map((race) => raceMapper.toLocalRow({ ...race, raidId })),
        ),
      readLocal: (store) => loadRaces(store, { raid_id: raidId }),
      whenAbsent: async (store) => {
        await store.clearScope('races', 'raid_id', raidId);
        return [];
      },
    });
  }

  fetchRace(id: number, signal?: AbortSignal): Promise<SyncReadResult<Race | null>> {
    return this.coordinator.read<Race | null>({
      operation: 'races.get',
      scope: scopeKey('race', id),
      path: `/races/${id}`,
      resource: 'Race',
      signal,
      decode: (data) => raceMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, race) => {
        if (race) {
          await store.upsert('races', raceMapper.toLocalRow(race));
        }
      },
      readLocal: (store) => loadRace(store, id),
      whenAbsent: async (store) => {
        await store.clearScope('category_prices', 'race_id', id);
        await store.delete('races', { id });
        return null;
      },
    });
  }

  fetchCategoryPrices(
    raceId: number,
    signal?: AbortSignal,
  ): Promise<SyncReadResult<CategoryPrice[]>> {
    return this.coordinator.read<CategoryPrice[]>({
      operation: 'races.prices',
      scope: pricesScope(raceId),
      path: `/races/${raceId}/prices`,
      resource: 'Category prices',
      signal,
      decode: (data) =>
        categoryPriceMapper.sort(
          asCollection(data).map((item) => categoryPriceMapper.fromWireJson(item, raceId)),
        ),
      reconcile: (store, prices) => storePrices(store, raceId, prices),
      readLocal: async (store) =>
        categoryPriceMapper.sort(
          (await store.query('category_prices', { race_id: raceId })).map((row) =>
            categoryPriceMapper.fromLocalRow(row),
          ),
        ),
      whenAbsent: async (store) => {
        await store.clearScope('category_prices', 'race_id', raceId);
        return [];
      },
    });
  }

  /** Slots left in a raid according to the local cache, or null when the raid is unknown. */
  async remainingRaceSlots(raidId: number): Promise<RaceSlots | null> {
    const raid = await loadRaid(this.coordinator.store, raidId);
    if (!raid) {
      return null;
    }

    const current = (await this.coordinator.store.query('races', { raid_id: raidId })).length;
    return {
      raidId,
      maxRaces: raid.maxRaces,
      current,
      remaining: Math.max(raid.maxRaces - current, 0),
    };
  }

  async createRace(
    draft: RaceDraft,
    prices: CategoryPriceSet,
    signal?: AbortSignal,
  ): Promise<SyncWriteResult> {
    const thresholds = checkAgeThresholds(draft.ageThresholds);
    if (!thresholds.ok) {
      throw new CompositionError(
        'age-thresholds',
        thresholds.reason,
        'Age thresholds must satisfy minimum < autonomous < supervisor.',
      );
    }

    const ordering = checkPriceOrdering(prices);
    if (!ordering.ok) {
      throw new CompositionError('category-price-order', ordering.reason, ordering.message);
    }

    return this.coordinator.locks.run(scopeKey('race-capacity', draft.raidId), async () => {
      const slots = await this.remainingRaceSlots(draft.raidId);
      if (!slots) {
        throw new NotFoundError('Raid', draft.raidId);
      }

      if (slots.remaining === 0) {
        throw new CapacityError(`Raid ${draft.raidId}`, slots.maxRaces, slots.current);
      }

      const categoryPrices = toCategoryPrices(0, prices);

      return this.coordinator.write({
        kind: 'create',
        entity: 'race',
        operation: 'races.create',
        action: 'race.create',
        scope: raidRacesScope(draft.raidId),
        resource: 'Race',
        signal,
        request: outboundRequest({
          method: 'POST',
          path: '/races/with-prices',
          body: {
            ...raceMapper.toCreatePayload(draft),
            prices: categoryPrices.map((price) => categoryPriceMapper.toWireJson(price)),
          },
          bodyRefs: localReferences({
            RAI_ID: { entity: 'raid', id: draft.raidId },
            USE_ID: { entity: 'user', id: draft.managerId },
          }),
        }),
        applyRemote: async (store, data) => {
          const race = raceMapper.fromWireJson(asEntity(data));
          await store.upsert('races', raceMapper.toLocalRow(race));
          await storePrices(store, race.id, categoryPrices);
          return race.id;
        },
        applyLocal: async (store, localId) => {
          await store.upsert('races', raceMapper.toLocalRow({ ...draft, id: localId }));
          await storePrices(store, localId, categoryPrices);
        },
      });
    });
  }

  async deleteRace(id: number, signal?: AbortSignal): Promise<SyncWriteResult> {
    const race = await loadRace(this.coordinator.store, id);
    const scope = race ? raidRacesScope(race.raidId) : scopeKey('race', id);
    const removeLocally = async (store: LocalStore) => {
      await store.clearScope('category_prices', 'race_id', id);
      await store.clearScope('team_races', 'race_id', id);
      await store.delete('races', { id });
    };

    if (isLocalId(id)) {
      await this.coordinator.discardUnsyncedEntity('race', id);
      await this.coordinator.locks.run(scope, () => removeLocally(this.coordinator.store));
      return { id, confirmed: true, outboundEntryId: null };
    }

    return this.coordinator.write({
      kind: 'mutation',
      targetId: id,
      operation: 'races.delete',
      action: 'race.delete',
      scope,
      resource: 'Race',
      signal,
      request: outboundRequest({
        method: 'DELETE',
        path: '/races/{id}',
        params: { id: { entity: 'race', id } },
      }),
      applyRemote: (store) => removeLocally(store),
      applyLocal: (store) => removeLocally(store),
    });
  }
}
