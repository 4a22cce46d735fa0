export { logger, log, errorFields, setLogLevel } from './logger';
export type { LogLevel, LogEntry } from './logger';
