/**
 * Log entries and the transports that receive them
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogFormat = 'json' | 'text';

export type LogData = Readonly<Record<string, unknown>>;

/**
 * One record handed to every transport of a logger
 */
export interface LogEntry {
  readonly timestamp: Date;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly data?: LogData;
  readonly error?: Error;
}

/**
 * Destination for log entries. A rejected `log` is reported on stderr and never
 * reaches the code that logged.
 */
export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): Promise<void>;
}

export interface LoggerConfig {
  readonly component: string;
  /** A LogLevel, or a level name accepted by parseLogLevel */
  readonly level: LogLevel | string;
  /** Defaults to a colored text console transport */
  readonly transports?: LogTransport[];
}

export interface ConsoleTransportConfig {
  readonly format?: LogFormat;
  readonly colors?: boolean;
}
