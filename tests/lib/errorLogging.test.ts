import assert from 'node:assert/strict';
import test from 'node:test';

import { LocalStoreError, ValidationError } from '../../src/core/app/errors/syncErrors';
import { ensureError } from '../../src/lib/errors/ensureError';
import { createErrorLogContext, toLoggableError } from '../../src/lib/logging/error';

test('ensureError returns errors unchanged', () => {
  const error = new ValidationError('Invalid.');
  assert.equal(ensureError(error), error);
});

test('ensureError keeps failure objects as the cause', () => {
  const failure = { kind: 'server', status: 500, message: 'Upstream down.' };
  const error = ensureError(failure);

  assert.equal(error.message, 'Upstream down.');
  assert.equal(error.cause, failure);
});

test('ensureError falls back for values without a message', () => {
  assert.equal(ensureError('').message, 'Unknown error');
  assert.equal(ensureError(42, 'Store failed.').message, 'Store failed.');
  assert.equal(ensureError(42).cause, 42);
  assert.equal(ensureError(undefined).cause, undefined);
});

test('validation errors expose kind, status and failing fields', () => {
  const loggable = toLoggableError(
    new ValidationError('The given data was invalid.', { RAC_NAME: ['Required.'] }),
  );

  assert.equal(loggable.name, 'ValidationError');
  assert.equal(loggable.kind, 'validation');
  assert.equal(loggable.status, 422);
  assert.deepEqual(loggable.fields, ['RAC_NAME']);
  assert.equal(loggable.cause, undefined);
});

test('the first cause is summarised', () => {
  const error = new LocalStoreError('Cached Raids could not be read.', {}, {
    cause: new Error('SQLITE_BUSY'),
  });

  const context = createErrorLogContext({ event: 'sync.read.fallback_failed' }, error);

  assert.equal(context.event, 'sync.read.fallback_failed');
  assert.deepEqual(toLoggableError(error).cause, { name: 'Error', message: 'SQLITE_BUSY' });
  assert.equal(toLoggableError(error).kind, 'local-store');
});

test('non-error values become UnknownError', () => {
  assert.deepEqual(toLoggableError('boom'), { name: 'UnknownError', message: 'boom' });
  assert.deepEqual(toLoggableError(7), { name: 'UnknownError', message: 'Unknown error' });
});
