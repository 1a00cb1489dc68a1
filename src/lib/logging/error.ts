import type { LoggerContext } from '../../core/app/ports/logger';

export type LoggableError = {
  name: string;
  message: string;
  /** `SyncError` discriminant, when the error carries one. */
  kind?: string;
  /** HTTP status of the remote failure behind the error. */
  status?: number;
  fields?: string[];
  cause?: { name: string; message: string };
  stack?: string;
};

const readKind = (error: Error): string | undefined =>
  'kind' in error && typeof error.kind === 'string' ? error.kind : undefined;

const readStatus = (error: Error): number | undefined =>
  'status' in error && typeof error.status === 'number' ? error.status : undefined;

const readFields = (error: Error): string[] | undefined => {
  if (!('fieldErrors' in error) || !error.fieldErrors || typeof error.fieldErrors !== 'object') {
    return undefined;
  }

  const fields = Object.keys(error.fieldErrors);
  return fields.length > 0 ? fields : undefined;
};

export const toLoggableError = (error: unknown): LoggableError => {
  if (!(error instanceof Error)) {
    return {
      name: 'UnknownError',
      message: typeof error === 'string' ? error : 'Unknown error',
    };
  }

  const kind = readKind(error);
  const status = readStatus(error);
  const fields = readFields(error);
  const { cause } = error;

  return {
    name: error.name,
    message: error.message,
    ...(kind ? { kind } : {}),
    ...(status !== undefined ? { status } : {}),
    ...(fields ? { fields } : {}),
    ...(cause instanceof Error ? { cause: { name: cause.name, message: cause.message } } : {}),
    stack: error.stack ?? undefined,
  };
};

export const createErrorLogContext = (
  base: Omit<LoggerContext, 'error'>,
  error: unknown,
): LoggerContext => ({
  ...base,
  error: toLoggableError(error),
});
