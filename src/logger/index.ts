export type { Logger, LogLevel } from './Logger';
export { ConsoleLogger } from './ConsoleLogger';
export { NULL_LOGGER } from './NullLogger';
export { fail, type ErrorFactory } from './helpers';
