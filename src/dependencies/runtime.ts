/**
 * Project: Raid Sync
 * File: src/dependencies/runtime.ts
 * Summary: Composition root building the sync services over one store and one remote client.
 */

import { parseEnvironment, type EnvironmentConfig } from '../config/environment';
import type { AuthProvider } from '../core/app/ports/authProvider';
import type { ConnectivitySignal } from '../core/app/ports/connectivitySignal';
import type { LocalStore } from '../core/app/ports/localStore';
import type { Logger } from '../core/app/ports/logger';
import type { RemoteClient } from '../core/app/ports/remoteClient';
import { AddressSyncService } from '../core/app/services/sync/addressSyncService';
import { ClubSyncService } from '../core/app/services/sync/clubSyncService';
import { OutboundReplayService } from '../core/app/services/sync/outboundReplayService';
import { RaceSyncService } from '../core/app/services/sync/raceSyncService';
import { RaidSyncService } from '../core/app/services/sync/raidSyncService';
import { SyncCoordinator } from '../core/app/services/sync/syncCoordinator';
import { TeamSyncService } from '../core/app/services/sync/teamSyncService';
import { UserSyncService } from '../core/app/services/sync/userSyncService';
import { InMemoryTokenStore } from '../core/infra/auth/tokenStore';
import { FetchRemoteClient } from '../core/infra/http/fetchRemoteClient';
import { SqliteLocalStore } from '../core/infra/sqlite/sqliteLocalStore';
import { createApplicationLogger, getScopedLogger } from './logger';

export type SyncRuntimeOptions = {
  config?: EnvironmentConfig;
  store?: LocalStore;
  remote?: RemoteClient;
  auth?: AuthProvider;
  logger?: Logger;
  clock?: () => Date;
  /** When given, the outbound queue is replayed every time it fires. */
  connectivity?: ConnectivitySignal;
};

export type SyncRuntime = {
  config: EnvironmentConfig;
  logger: Logger;
  store: LocalStore;
  auth: AuthProvider;
  coordinator: SyncCoordinator;
  addresses: AddressSyncService;
  clubs: ClubSyncService;
  users: UserSyncService;
  raids: RaidSyncService;
  races: RaceSyncService;
  teams: TeamSyncService;
  replay: OutboundReplayService;
  /** Detaches the connectivity listener and closes the store. */
  close(): Promise<void>;
};

export const createSyncRuntime = (options: SyncRuntimeOptions = {}): SyncRuntime => {
  const config = options.config ?? parseEnvironment(process.env);
  const logger = options.logger ?? createApplicationLogger(config.logging);
  const store = options.store ?? new SqliteLocalStore({ filename: config.storage.databasePath });
  const remote =
    options.remote ??
    new FetchRemoteClient({
      baseUrl: config.api.baseUrl.toString(),
      timeoutMs: config.api.timeoutMs,
    });
  const auth = options.auth ?? new InMemoryTokenStore();

  const coordinator = new SyncCoordinator({
    store,
    remote,
    auth,
    clock: options.clock,
    logger: getScopedLogger(logger, { component: 'sync' }),
  });
  const replay = new OutboundReplayService({
    coordinator,
    logger: getScopedLogger(logger, { component: 'outbound-replay' }),
  });
  const detach = options.connectivity ? replay.attach(options.connectivity) : () => {};

  logger.info('Sync runtime ready.', {
    event: 'runtime.ready',
    baseUrl: config.api.baseUrl.origin,
    timeoutMs: config.api.timeoutMs,
  });

  return {
    config,
    logger,
    store,
    auth,
    coordinator,
    addresses: new AddressSyncService(coordinator),
    clubs: new ClubSyncService(coordinator),
    users: new UserSyncService(coordinator),
    raids: new RaidSyncService(coordinator),
    races: new RaceSyncService(coordinator),
    teams: new TeamSyncService(coordinator),
    replay,
    async close() {
      detach();
      await store.close();
    },
  };
};
