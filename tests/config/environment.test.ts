import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';

import {
  DEFAULT_API_BASE_URL,
  DEFAULT_API_TIMEOUT_MS,
  DEFAULT_DATABASE_PATH,
  EnvironmentValidationError,
  parseEnvironment,
} from '../../src';

const cwd = path.resolve('/srv/raid-sync');

test('defaults apply when nothing is set', () => {
  const config = parseEnvironment({}, cwd);

  assert.equal(config.api.baseUrl.toString(), `${DEFAULT_API_BASE_URL}/`);
  assert.equal(config.api.timeoutMs, DEFAULT_API_TIMEOUT_MS);
  assert.equal(config.storage.databasePath, DEFAULT_DATABASE_PATH);
  assert.deepEqual(config.logging, {
    level: 'info',
    directory: path.join(cwd, 'logs'),
    disableFileLogs: false,
  });
});

test('overrides are trimmed and normalised', () => {
  const config = parseEnvironment(
    {
      RAID_API_BASE_URL: ' https://staging.example.test/api ',
      RAID_API_TIMEOUT_MS: '2500',
      RAID_SYNC_DB_PATH: '/var/lib/raid-sync/cache.db',
      LOG_LEVEL: 'DEBUG',
      LOG_DIR: 'var/log',
      DISABLE_FILE_LOGS: 'yes',
    },
    cwd,
  );

  assert.equal(config.api.baseUrl.toString(), 'https://staging.example.test/api');
  assert.equal(config.api.timeoutMs, 2500);
  assert.equal(config.storage.databasePath, '/var/lib/raid-sync/cache.db');
  assert.deepEqual(config.logging, {
    level: 'debug',
    directory: path.join(cwd, 'var/log'),
    disableFileLogs: true,
  });
});

test('absolute log directories are kept as given', () => {
  const directory = path.resolve('/tmp/raid-sync-logs');
  assert.equal(parseEnvironment({ LOG_DIR: directory }, cwd).logging.directory, directory);
});

test('every invalid value is reported at once', () => {
  assert.throws(
    () =>
      parseEnvironment(
        {
          RAID_API_BASE_URL: 'ftp://files.example.test',
          RAID_API_TIMEOUT_MS: '-5',
          LOG_LEVEL: 'verbose',
          DISABLE_FILE_LOGS: 'maybe',
        },
        cwd,
      ),
    (error: unknown) => {
      assert.ok(error instanceof EnvironmentValidationError);
      assert.deepEqual(error.issues, [
        {
          key: 'RAID_API_BASE_URL',
          message: 'RAID_API_BASE_URL must be an absolute HTTP(S) URL.',
        },
        {
          key: 'RAID_API_TIMEOUT_MS',
          message: 'RAID_API_TIMEOUT_MS must be a positive integer (milliseconds).',
        },
        { key: 'LOG_LEVEL', message: 'LOG_LEVEL must be one of debug, info, warn, error.' },
        { key: 'DISABLE_FILE_LOGS', message: 'DISABLE_FILE_LOGS must be set to "true" or "false".' },
      ]);
      return true;
    },
  );
});

test('a zero timeout is rejected', () => {
  assert.throws(
    () => parseEnvironment({ RAID_API_TIMEOUT_MS: '0' }, cwd),
    EnvironmentValidationError,
  );
});
