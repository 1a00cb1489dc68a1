/**
 * Project: Raid Sync
 * File: src/config/environment.ts
 * Summary: Parse and validate environment variables into the sync runtime configuration.
 */

import { isAbsolute, join } from 'node:path';

import type { LogLevel } from '../core/app/ports/logger';
import {
  isAbsoluteUrl,
  isPositiveInteger,
  parseBooleanFlagValue,
  readEnvValue,
  type EnvIssue,
} from './envValues';

export const DEFAULT_API_BASE_URL = 'https://api.sanglier-explorer.fr';
export const DEFAULT_API_TIMEOUT_MS = 10_000;
export const DEFAULT_DATABASE_PATH = 'raid-sync.db';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type EnvironmentConfig = {
  api: {
    baseUrl: URL;
    timeoutMs: number;
  };
  storage: {
    databasePath: string;
  };
  logging: {
    level: LogLevel;
    directory: string;
    disableFileLogs: boolean;
  };
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super('Environment configuration is invalid.');
    this.name = 'EnvironmentValidationError';
  }
}

const parseBaseUrl = (raw: string | undefined, issues: EnvIssue[]): URL => {
  const value = readEnvValue(raw);
  if (!value) {
    return new URL(DEFAULT_API_BASE_URL);
  }

  if (!isAbsoluteUrl(value)) {
    issues.push({
      key: 'RAID_API_BASE_URL',
      message: 'RAID_API_BASE_URL must be an absolute HTTP(S) URL.',
    });
    return new URL(DEFAULT_API_BASE_URL);
  }

  return new URL(value);
};

const parseTimeout = (raw: string | undefined, issues: EnvIssue[]): number => {
  const value = readEnvValue(raw);
  if (!value) {
    return DEFAULT_API_TIMEOUT_MS;
  }

  if (!isPositiveInteger(value)) {
    issues.push({
      key: 'RAID_API_TIMEOUT_MS',
      message: 'RAID_API_TIMEOUT_MS must be a positive integer (milliseconds).',
    });
    return DEFAULT_API_TIMEOUT_MS;
  }

  return Number(value);
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const parseLogLevel = (raw: string | undefined, issues: EnvIssue[]): LogLevel => {
  const value = readEnvValue(raw)?.toLowerCase();
  if (!value) {
    return 'info';
  }

  if (!isLogLevel(value)) {
    issues.push({
      key: 'LOG_LEVEL',
      message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}.`,
    });
    return 'info';
  }

  return value;
};

const resolveLogDirectory = (raw: string | undefined, cwd: string): string => {
  const override = readEnvValue(raw);
  if (!override) {
    return join(cwd, 'logs');
  }

  return isAbsolute(override) ? override : join(cwd, override);
};

const readBooleanFlag = (
  key: string,
  raw: string | undefined,
  issues: EnvIssue[],
  defaultValue: boolean,
): boolean => {
  const value = readEnvValue(raw);
  if (value === undefined) {
    return defaultValue;
  }

  const parsed = parseBooleanFlagValue(value);
  if (parsed === null) {
    issues.push({ key, message: `${key} must be set to "true" or "false".` });
    return defaultValue;
  }

  return parsed;
};

export const parseEnvironment = (
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): EnvironmentConfig => {
  const issues: EnvIssue[] = [];

  const baseUrl = parseBaseUrl(env.RAID_API_BASE_URL, issues);
  const timeoutMs = parseTimeout(env.RAID_API_TIMEOUT_MS, issues);
  const level = parseLogLevel(env.LOG_LEVEL, issues);
  const disableFileLogs = readBooleanFlag('DISABLE_FILE_LOGS', env.DISABLE_FILE_LOGS, issues, false);

  if (issues.length > 0) {
    throw new EnvironmentValidationError(issues);
  }

  return {
    api: { baseUrl, timeoutMs },
    storage: { databasePath: readEnvValue(env.RAID_SYNC_DB_PATH) ?? DEFAULT_DATABASE_PATH },
    logging: {
      level,
      directory: resolveLogDirectory(env.LOG_DIR, cwd),
      disableFileLogs,
    },
  };
};
