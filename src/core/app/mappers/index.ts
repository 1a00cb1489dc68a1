export * from './wireValues';
export * from './addressMapper';
export * from './userMapper';
export * from './clubMapper';
export * from './raidMapper';
export * from './raceMapper';
export * from './categoryPriceMapper';
export * from './teamMapper';
export * from './registrationMapper';
