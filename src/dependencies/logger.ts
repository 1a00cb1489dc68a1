import type { EnvironmentConfig } from '../config/environment';
import type { Logger, LoggerContext } from '../core/app/ports/logger';
import { createPinoLogger } from '../core/infra/logger/pinoLogger';

export const createApplicationLogger = (logging: EnvironmentConfig['logging']): Logger =>
  createPinoLogger({
    level: logging.level,
    logDirectory: logging.directory,
    disableFileLogs: logging.disableFileLogs,
  });

export const getScopedLogger = (logger: Logger, context: LoggerContext): Logger =>
  logger.withContext(context);
