export * from './sqlite/sqliteLocalStore';
export * from './http/fetchRemoteClient';
export * from './auth/tokenStore';
export * from './connectivity/manualConnectivitySignal';
export * from './logger/pinoLogger';
