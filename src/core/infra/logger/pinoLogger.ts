import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

import type { Logger, LoggerContext, LogLevel } from '../../app/ports/logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_LOG_DIRECTORY = join(process.cwd(), 'logs');
const DEFAULT_FILE_NAME_PREFIX = 'app';

export type CreatePinoLoggerOptions = {
  level?: string;
  disableFileLogs?: boolean;
  disableConsoleLogs?: boolean;
  logDirectory?: string;
  /** Writes `<prefix>.log` and `<prefix>-error.log`; the default writes `app.log` and `error.log`. */
  fileNamePrefix?: string;
};

type StreamEntry = { stream: DestinationStream; level?: LogLevel };

const serializeError = (value: unknown): Record<string, unknown> | undefined => {
  if (!value) {
    return undefined;
  }

  if (value instanceof Error) {
    const serialised: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };

    if (value.stack) {
      serialised.stack = value.stack;
    }

    if ('kind' in value && typeof value.kind === 'string') {
      serialised.kind = value.kind;
    }

    if ('code' in value && typeof value.code !== 'undefined') {
      serialised.code = value.code;
    }

    if (value.cause !== undefined) {
      serialised.cause = serializeError(value.cause);
    }

    return serialised;
  }

  if (typeof value === 'object') {
    return { ...value };
  }

  return { value: String(value) };
};

const serializeContext = (context?: LoggerContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  const output: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'undefined') {
      continue;
    }

    if (key === 'error') {
      const serialisedError = serializeError(value);
      if (serialisedError) {
        output.error = serialisedError;
      }
      continue;
    }

    output[key] = value;
  }

  return Object.keys(output).length > 0 ? output : undefined;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    const serialised = serializeContext(context) ?? {};
    return new PinoLoggerAdapter(this.instance.child(serialised));
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const serialised = serializeContext(context);

    if (serialised) {
      this.instance[level](serialised, message);
      return;
    }

    this.instance[level](message);
  }
}

const fileStream = (filePath: string, level?: LogLevel): StreamEntry => {
  const stream = pino.destination({ dest: filePath, mkdir: true, append: true, sync: false });
  return level ? { stream, level } : { stream };
};

const logFileNames = (prefix: string): { all: string; errors: string } =>
  prefix === DEFAULT_FILE_NAME_PREFIX
    ? { all: 'app.log', errors: 'error.log' }
    : { all: `${prefix}.log`, errors: `${prefix}-error.log` };

/**
 * JSON logger writing to stdout and, unless disabled, to a full log and a warn-level
 * log under `logDirectory`.
 */
export const createPinoLogger = (options: CreatePinoLoggerOptions = {}): Logger => {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const logDirectory = options.logDirectory ?? DEFAULT_LOG_DIRECTORY;
  const files = logFileNames(options.fileNamePrefix ?? DEFAULT_FILE_NAME_PREFIX);

  const streams: StreamEntry[] = [];

  if (!options.disableConsoleLogs) {
    streams.push({ stream: pino.destination({ dest: 1, sync: false }) });
  }

  if (!options.disableFileLogs) {
    mkdirSync(logDirectory, { recursive: true });

    streams.push(
      fileStream(join(logDirectory, files.all)),
      fileStream(join(logDirectory, files.errors), 'warn'),
    );
  }

  const instance = pino(
    {
      level,
      base: undefined,
      enabled: streams.length > 0,
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    pino.multistream(streams),
  );

  return new PinoLoggerAdapter(instance);
};
