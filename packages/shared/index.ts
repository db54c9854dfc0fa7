/**
 * @inkline/shared — types, Event Bus and logger used by every package.
 */

export * from './types/index.js';
export { EventBus, getEventBus, createEvent, isChannel } from './event-bus/index.js';
export type { ChannelPattern } from './event-bus/index.js';
export { JsonLogger, createLogger, isLogLevel, LOG_LEVELS } from './logger/index.js';
export type { Logger, LogContext, LogLevel, LogSink } from './logger/index.js';
