export * from './address';
export * from './user';
export * from './club';
export * from './raid';
export * from './race';
export * from './category';
export * from './team';
export * from './registration';
export * from './rules/ageRules';
export * from './rules/priceRules';
