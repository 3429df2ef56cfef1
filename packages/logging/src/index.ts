/**
 * @backstop/logging - Structured logging with pluggable transports
 */

export {
  LogLevel,
  type LogFormat,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
} from './types.js';

export { Logger, parseLogLevel } from './logger.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export { LoggerFactory, type LoggingSettings } from './factory.js';
