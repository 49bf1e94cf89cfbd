/**
 * Structured logger for the rover controller.
 *
 * Supports both human-readable and JSON output formats.
 * All output goes to stderr (stdout is reserved for the MCP protocol).
 *
 * A logger and every child taken from it share one settings record, so a
 * level or format applied to the root after startup (CLI flags, config)
 * also reaches component loggers created earlier.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  component?: string;
}

interface LogSettings {
  level: LogLevel;
  format: LogFormat;
  output: (line: string) => void;
}

export class Logger {
  private settings: LogSettings;
  private readonly component: string;

  constructor(options: LoggerOptions = {}) {
    this.settings = {
      level: options.level ?? 'info',
      format: options.format ?? 'text',
      output: (line: string) => process.stderr.write(line + '\n'),
    };
    this.component = options.component ?? 'Rover';
  }

  /** Child logger for a component; settings stay shared with this logger */
  child(component: string): Logger {
    const child = new Logger({ component });
    child.settings = this.settings;
    return child;
  }

  /** Set the output function (useful for testing) */
  setOutput(fn: (line: string) => void): void {
    this.settings.output = fn;
  }

  getLevelName(): LogLevel {
    return this.settings.level;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  setFormat(format: LogFormat): void {
    this.settings.format = format;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.settings.level]) return;

    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (this.settings.format === 'json') {
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        component: this.component,
        message,
        ...(hasData ? { data } : {}),
      };
      this.settings.output(JSON.stringify(entry));
    } else {
      const prefix = `[${this.component}]`;
      const levelTag = level.toUpperCase().padEnd(5);
      const dataStr = hasData ? ' ' + JSON.stringify(data) : '';
      this.settings.output(`${prefix} ${levelTag} ${message}${dataStr}`);
    }
  }
}

/** Process-wide root logger; components take children of it */
export const logger = new Logger();
