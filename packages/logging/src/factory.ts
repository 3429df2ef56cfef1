import { Logger, parseLogLevel } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { MemoryTransport } from './transports/memory-transport.js';
import { LogLevel, type LogFormat } from './types.js';

/**
 * Logging settings as they appear in a configuration file
 */
export interface LoggingSettings {
  level: string;
  format?: LogFormat;
  colors?: boolean;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Create a logger writing colored text to the console
   */
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: parseLogLevel(level),
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * Create a logger writing one JSON object per line to the console
   */
  static createStructuredLogger(
    component: string,
    level: LogLevel | string = LogLevel.INFO
  ): Logger {
    return new Logger({
      component,
      level: parseLogLevel(level),
      transports: [new ConsoleTransport({ format: 'json', colors: false })],
    });
  }

  /**
   * Create a logger that records entries in memory; the transport is returned for inspection
   */
  static createMemoryLogger(
    component: string,
    level: LogLevel | string = LogLevel.DEBUG
  ): { logger: Logger; transport: MemoryTransport } {
    const transport = new MemoryTransport();
    const logger = new Logger({
      component,
      level: parseLogLevel(level),
      transports: [transport],
    });
    return { logger, transport };
  }

  /**
   * Create a console logger from configuration file settings
   */
  static fromConfig(component: string, settings: LoggingSettings): Logger {
    const format = settings.format ?? 'text';
    const colors = settings.colors ?? format === 'text';
    return new Logger({
      component,
      level: parseLogLevel(settings.level),
      transports: [new ConsoleTransport({ format, colors })],
    });
  }
}
