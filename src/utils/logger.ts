/**
 * Structured logging to stderr
 * One JSON object per line: { ts, level, event, ...fields }
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEvent {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  event: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  #minLevel: LogLevel;
  #sink: LogSink;

  constructor(minLevel: LogLevel = 'info', sink: LogSink = stderrSink) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  getLevel(): LogLevel {
    return this.#minLevel;
  }

  private shouldLog(level: LogEvent['level']): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogEvent['level'], event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }
}

/**
 * Flatten an error (and its cause) into loggable fields
 */
export function errorFields(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { err_message: String(error) };
  }

  const fields: Record<string, unknown> = {
    err_name: error.name,
    err_message: error.message,
  };
  if (error.cause !== undefined) {
    fields.err_cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
  }
  return fields;
}

// Process-wide logger; the entry point sets its level from configuration
export const logger = new Logger();
