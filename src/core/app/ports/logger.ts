export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  /** Machine friendly event name for querying (e.g. `sync.read.fallback`). */
  event?: string;
  /** Sync operation the entry belongs to, such as `races.forRaid`. */
  operation?: string;
  /** Lock scope touched by the operation. */
  scope?: string;
  /** Duration of the operation in milliseconds when applicable. */
  durationMs?: number;
  /** Outcome keyword such as `success`, `fallback`, `queued` or `failure`. */
  outcome?: string;
  /** Optional error instance or metadata to serialise. */
  error?: unknown;
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
}
