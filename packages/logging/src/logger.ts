import { ConsoleTransport } from './transports/console-transport.js';
import {
  LogLevel,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
} from './types.js';

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
  ['WARN', LogLevel.WARN],
  ['WARNING', LogLevel.WARN],
  ['ERROR', LogLevel.ERROR],
]);

/**
 * Resolve a level name such as "warn" or "WARNING"; LogLevel values pass through
 */
export function parseLogLevel(level: LogLevel | string): LogLevel {
  if (typeof level !== 'string') {
    return level;
  }

  const parsed = LEVEL_NAMES.get(level.toUpperCase());
  if (parsed === undefined) {
    throw new Error(`Invalid log level: ${level}`);
  }
  return parsed;
}

/**
 * Structured logger writing to pluggable transports.
 * Child loggers share the parent's transport list.
 */
export class Logger {
  private minLevel: LogLevel;
  private readonly component: string;
  private readonly transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.minLevel = parseLogLevel(config.level);
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Logger for a sub-component, named `parent:child`
   */
  child(component: string): Logger {
    return new Logger({
      component: `${this.component}:${component}`,
      level: this.minLevel,
      transports: this.transports,
    });
  }

  debug(message: string, data?: LogData): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(LogLevel.WARN, message, data);
  }

  /**
   * Thrown values that are not Errors are recorded as `data.error`
   */
  error(message: string, error?: unknown, data?: LogData): void {
    if (error === undefined || error instanceof Error) {
      this.write(LogLevel.ERROR, message, data, error);
    } else {
      this.write(LogLevel.ERROR, message, { ...data, error: String(error) });
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  setLevel(level: LogLevel | string): void {
    this.minLevel = parseLogLevel(level);
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  getComponent(): string {
    return this.component;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  /**
   * Detach the first transport with the given name
   */
  removeTransport(name: string): void {
    const index = this.transports.findIndex(transport => transport.name === name);
    if (index !== -1) {
      this.transports.splice(index, 1);
    }
  }

  private write(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(data && { data }),
      ...(error && { error }),
    };

    for (const transport of this.transports) {
      transport.log(entry).catch((failure: unknown) => reportTransportFailure(transport, failure));
    }
  }
}

function reportTransportFailure(transport: LogTransport, failure: unknown): void {
  // eslint-disable-next-line no-console
  console.error(`Transport ${transport.name} failed:`, failure);
}
