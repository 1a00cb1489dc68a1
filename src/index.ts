export * from './core/domain';
export * from './core/app';
export * from './core/infra';
export * from './config/environment';
export type { EnvIssue } from './config/envValues';
export * from './dependencies/runtime';
export { createApplicationLogger } from './dependencies/logger';
