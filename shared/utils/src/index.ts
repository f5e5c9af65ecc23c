// Logger
export { logger, Logger, type LogSink } from './logger';

// Errors
export * from './errors';

// Environment helpers
export * from './env';

// Event bus
export * from './event-bus';

// Timing helpers
export * from './timing';
