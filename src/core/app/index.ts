export * from './ports/authProvider';
export * from './ports/connectivitySignal';
export * from './ports/localStore';
export * from './ports/logger';
export * from './ports/remoteClient';
export * from './errors/syncErrors';
export * from './mappers';
export * from './services/availabilityResolver';
export * from './services/sync/keyedMutex';
export * from './services/sync/localIds';
export * from './services/sync/outboundPayload';
export * from './services/sync/serverIds';
export * from './services/sync/syncCoordinator';
export * from './services/sync/outboundReplayService';
export * from './services/sync/addressSyncService';
export * from './services/sync/clubSyncService';
export * from './services/sync/userSyncService';
export * from './services/sync/raidSyncService';
export * from './services/sync/raceSyncService';
export * from './services/sync/teamSyncService';
