// Level-based logging for the stub parser and its CLI

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerOptions {
  level: LogLevel;
  debugMode?: boolean;
  sink?: (line: string) => void;
}

export class Logger {
  private level: LogLevel;
  private debugMode: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? ((line: string) => console.error(line));
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    if (level === LogLevel.DEBUG) {
      this.debugMode = true;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable or disable debug mode. When enabled, debug logs are shown.
   */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
    if (enabled && this.level > LogLevel.DEBUG) {
      this.level = LogLevel.DEBUG;
    }
  }

  isDebugEnabled(): boolean {
    return this.debugMode && this.level <= LogLevel.DEBUG;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.isDebugEnabled()) {
      this.log('DEBUG', message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, data);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, data);
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, data);
    }
  }

  private log(level: string, message: string, data?: Record<string, unknown>): void {
    let output = `[${level}] ${message}`;
    if (data && Object.keys(data).length > 0) {
      output += ` ${JSON.stringify(data)}`;
    }
    // stdout is reserved for printed stubs
    this.sink(output);
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

export const logger = new Logger({
  level: parseLogLevel(process.env['LOG_LEVEL']) ?? LogLevel.WARN,
  debugMode: process.env['DEBUG'] === 'true',
});
