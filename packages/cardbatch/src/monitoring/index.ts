export { Logger, getLogger, redactObject, registerSecret } from './logger';
export type { LogLevel, LogEntry, LoggerOptions } from './logger';
