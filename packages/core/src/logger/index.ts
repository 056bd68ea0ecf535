export { createLogger, logger, isLogLevel, resolveLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
