import {
  LogLevel,
  type ConsoleTransportConfig,
  type LogEntry,
  type LogTransport,
} from '../types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly config: Required<ConsoleTransportConfig>;

  constructor(config: ConsoleTransportConfig = {}) {
    this.config = {
      format: 'text',
      colors: true,
      ...config,
    };
  }

  async log(entry: LogEntry): Promise<void> {
    const output = this.format(entry);

    /* eslint-disable no-console */
    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      case LogLevel.ERROR:
        console.error(output);
        break;
    }
    /* eslint-enable no-console */
  }

  format(entry: LogEntry): string {
    return this.config.format === 'json' ? this.formatJson(entry) : this.formatText(entry);
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      component: entry.component,
      message: entry.message,
      ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  private formatText(entry: LogEntry): string {
    const levelName = LogLevel[entry.level];
    const level = this.config.colors
      ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}`
      : levelName;

    let message = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.error) {
      message += `\n${entry.error.stack ?? entry.error.message}`;
    }

    return message;
  }
}
