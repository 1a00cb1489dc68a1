import type { RoleTag, User } from '../../../domain/user';
import { roleIdOf, userMapper } from '../../mappers/userMapper';
import { asCollection, asEntity } from '../../mappers/wireValues';
import { scopeKey } from './keyedMutex';
import { loadUser, loadUsers, storeUsers } from './localReads';
import { localReferences, outboundRequest } from './outboundPayload';
import type { SyncCoordinator, SyncReadResult, SyncWriteResult } from './syncCoordinator';

const USERS_SCOPE = scopeKey('users');

export class UserSyncService {
  constructor(private readonly coordinator: SyncCoordinator) {}

  fetchUsers(signal?: AbortSignal): Promise<SyncReadResult<User[]>> {
    return this.coordinator.read<User[]>({
      operation: 'users.list',
      scope: USERS_SCOPE,
      path: '/users',
      resource: 'Users',
      signal,
      decode: (data) => asCollection(data).map((item) => userMapper.fromWireJson(item)),
      reconcile: async (store, users) => {
        await store.replaceAll(
          'user_roles',
          users.flatMap((user) => userMapper.toRoleRows(user)),
        );
        await store.replaceAll(
          'users',
          users.map((user) => userMapper.toLocalRow(user)),
        );
      },
      readLocal: (store) => loadUsers(store),
      whenAbsent: async (store) => {
        await store.replaceAll('user_roles', []);
        await store.replaceAll('users', []);
        return [];
      },
    });
  }

  fetchUser(id: number, signal?: AbortSignal): Promise<SyncReadResult<User | null>> {
    return this.coordinator.read<User | null>({
      operation: 'users.get',
      scope: USERS_SCOPE,
      path: `/users/${id}`,
      resource: 'User',
      signal,
      decode: (data) => userMapper.fromWireJson(asEntity(data)),
      reconcile: async (store, user) => {
        if (user) {
          await storeUsers(store, [user]);
        }
      },
      readLocal: (store) => loadUser(store, id),
      whenAbsent: async (store) => {
        await store.clearScope('user_roles', 'user_id', id);
        await store.delete('users', { id });
        return null;
      },
    });
  }

  /** Users holding `role`; the role assignment is cached without touching other roles. */
  fetchUsersByRole(role: RoleTag, signal?: AbortSignal): Promise<SyncReadResult<User[]>> {
    const roleId = roleIdOf(role);
    return this.coordinator.read<User[]>({
      operation: 'users.byRole',
      scope: USERS_SCOPE,
      path: `/roles/${roleId}/users`,
      resource: 'Users',
      signal,
      decode: (data) =>
        asCollection(data).map((item) => {
          const user = userMapper.fromWireJson(item);
          return user.roles.includes(role) ? user : { ...user, roles: [...user.roles, role] };
        }),
      reconcile: async (store, users) => {
        await storeUsers(store, users, { replaceRoles: false });
        await store.upsertMany(
          'user_roles',
          users.map((user) => ({ user_id: user.id, role_id: roleId })),
        );
      },
      readLocal: async (store) => {
        const holders = new Set(
          (await store.query('user_roles', { role_id: roleId })).map((row) => row.user_id),
        );
        return (await loadUsers(store)).filter((user) => holders.has(user.id));
      },
      whenAbsent: async (store) => {
        await store.clearScope('user_roles', 'role_id', roleId);
        return [];
      },
    });
  }

  updateUser(user: User, signal?: AbortSignal): Promise<SyncWriteResult> {
    const wire = userMapper.toWireJson(user);
    return this.coordinator.write({
      kind: 'mutation',
      targetId: user.id,
      operation: 'users.update',
      action: 'user.update',
      scope: USERS_SCOPE,
      resource: 'User',
      signal,
      request: outboundRequest({
        method: 'PUT',
        path: '/users/{id}',
        params: { id: { entity: 'user', id: user.id } },
        body: wire,
        bodyRefs: localReferences({
          ADD_ID: { entity: 'address', id: user.addressId },
          ...(user.clubId === null ? {} : { CLU_ID: { entity: 'club', id: user.clubId } }),
        }),
      }),
      applyRemote: (store) => storeUsers(store, [user]),
      applyLocal: (store) => storeUsers(store, [user]),
    });
  }
}
