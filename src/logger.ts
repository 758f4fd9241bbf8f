export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  service?: string;
  hash?: string;
  language?: string;
  [key: string]: unknown;
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  context: LogContext;
}

export type LogSink = (record: LogRecord, line: string) => void;

export interface LoggerOptions {
  sink?: LogSink;
  minLevel?: LogLevel;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured logger shared by the pool engine.
 *
 * Line format:
 *   [UTC timestamp] [LEVEL] [service] [hash] message {extra}
 *
 * Usage:
 *   const log = logger.child({ service: "migration" });
 *   log.warn("Legacy record skipped", { hash });
 */
export class Logger {
  private readonly baseContext: LogContext;
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly now: () => Date;

  constructor(baseContext: LogContext = {}, options: LoggerOptions = {}) {
    this.baseContext = baseContext;
    this.sink = options.sink ?? consoleSink;
    this.minLevel = options.minLevel ?? defaultMinLevel();
    this.now = options.now ?? (() => new Date());
  }

  child(context: LogContext): Logger {
    return new Logger({ ...this.baseContext, ...context }, { sink: this.sink, minLevel: this.minLevel, now: this.now });
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const errorFields: LogContext = {};
    if (error instanceof Error) {
      errorFields.errorName = error.name;
      errorFields.errorMessage = error.message;
    } else if (error !== undefined) {
      errorFields.errorMessage = String(error);
    }
    this.log("error", message, { ...context, ...errorFields });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const record: LogRecord = {
      timestamp: this.now().toISOString(),
      level,
      message,
      context: { ...this.baseContext, ...context },
    };
    this.sink(record, formatLogLine(record));
  }
}

export function formatLogLine(record: LogRecord): string {
  const { service, hash, ...rest } = record.context;
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      extra[key] = value;
    }
  }
  const extraText = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : "";
  const level = record.level.toUpperCase().padEnd(5);
  return `[${record.timestamp}] [${level}] [${service ?? "-"}] [${hash ?? "-"}] ${record.message}${extraText}`;
}

export function createLogger(context: LogContext = {}, options: LoggerOptions = {}): Logger {
  return new Logger(context, options);
}

export function createSilentLogger(): Logger {
  return new Logger({}, { sink: () => undefined, minLevel: "error" });
}

export interface MemorySink {
  sink: LogSink;
  records: LogRecord[];
  lines: string[];
}

export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  const lines: string[] = [];
  return {
    records,
    lines,
    sink: (record, line) => {
      records.push(record);
      lines.push(line);
    },
  };
}

function consoleSink(record: LogRecord, line: string): void {
  switch (record.level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function defaultMinLevel(): LogLevel {
  return process.env.FUNCPOOL_DEBUG ? "debug" : "info";
}

export const logger = new Logger({ service: "funcpool" });
