import type { Address, AddressDraft } from '../../../domain/address';
import { addressMapper } from '../../mappers/addressMapper';
import type { LocalStore } from '../../ports/localStore';
import { asEntity } from '../../mappers/wireValues';
import { scopeKey } from './keyedMutex';
import { outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const ADDRESSES_SCOPE = scopeKey('addresses');

const loadAddress = async (store: LocalStore, id: number): Promise<Address | null> => {
  const [row] = await store.query('addresses', { id });
  return row ? addressMapper.fromLocalRow(row) : null;
};

/** Addresses are immutable once created. */
export class AddressSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchAddress(id: number, signal?: AbortSignal): Promise<SyncReadResult<Address | null>> {
    return this.coordinator.read<Address | null>({
      operation: 'addresses.get',
      scope: ADDRESSES_SCOPE,
      path: `/addresses/${id}`,
      resource: 'Address',
      signal,
      decode: (data) => addressMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, address) => {
        if (address) {
          await store.upsert('addresses', addressMapper.toLocalRow(address));
        }
      },
      readLocal: (store) => loadAddress(store, id),
      whenAbsent: async (store) => {
        await store.delete('addresses', { id });
        return null;
      },
    });
  }

  createAddress(draft: AddressDraft, signal?: AbortSignal): Promise<SyncWriteResult> {
    return this.coordinator.write({
      kind: 'create',
      entity: 'address',
      operation: 'addresses.create',
      action: 'address.create',
      scope: ADDRESSES_SCOPE,
      resource: 'Address',
      signal,
      request: outboundRequest({
        method: 'POST',
        path: '/addresses',
        body: addressMapper.toCreatePayload(draft),
      }),
      applyRemote: async (store, data) => {
        const address = addressMapper.fromWireJson(asEntity(data));
        await store.upsert('addresses', addressMapper.toLocalRow(address));
        return address.id;
      },
      applyLocal: (store, localId) =>
        store.upsert('addresses', addressMapper.toLocalRow({ ...draft, id: localId })),
    });
  }
}
