// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  nodeId?: string;
  component?: string;
  serviceName?: string;
  instanceId?: string;
  requestId?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function definedContext(context: LogContext): Array<[string, string | number | boolean]> {
  const pairs: Array<[string, string | number | boolean]> = [];
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      pairs.push([key, value]);
    }
  }
  return pairs;
}

/**
 * Formats entries as single human-readable lines for a terminal.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ctx = definedContext(context)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}]` : "";
  const formatted = `${timestamp.toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
};

/**
 * Writes one JSON object per line, for log shippers.
 */
export const jsonLogHandler: LogHandler = (entry: LogEntry) => {
  const line: Record<string, unknown> = {
    time: entry.timestamp.toISOString(),
    level: entry.level,
    msg: entry.message,
    ...Object.fromEntries(definedContext(entry.context)),
  };
  if (entry.error) {
    line.err = { name: entry.error.name, message: entry.error.message };
  }
  process.stdout.write(`${JSON.stringify(line)}\n`);
};

class LoggerConfig {
  private _level: LogLevel = "info";
  private _handler: LogHandler = consoleLogHandler;

  get level(): LogLevel {
    return this._level;
  }

  set level(level: LogLevel) {
    this._level = level;
  }

  get handler(): LogHandler {
    return this._handler;
  }

  set handler(handler: LogHandler) {
    this._handler = handler;
  }

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this._level = options.level;
    }
    if (options.handler !== undefined) {
      this._handler = options.handler;
    }
  }

  /**
   * Applies LOG_LEVEL and LOG_FORMAT ("json" | "pretty") from the environment.
   * Unknown values are ignored.
   */
  configureFromEnv(env: NodeJS.ProcessEnv = process.env): void {
    const level = env.LOG_LEVEL?.toLowerCase();
    if (level && isLogLevel(level)) {
      this._level = level;
    }
    if (env.LOG_FORMAT === "json") {
      this._handler = jsonLogHandler;
    } else if (env.LOG_FORMAT === "pretty") {
      this._handler = consoleLogHandler;
    }
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * A structured logger carrying a fixed context into every entry.
 */
export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  private log(level: LogLevel, message: string, extra?: LogContext, error?: Error): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[loggerConfig.level]) {
      return;
    }

    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext): void {
    this.log("warn", message, extra);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

export function createLogger(component: string, nodeId?: string): Logger {
  return new Logger({ component, nodeId });
}

/**
 * Normalises an unknown thrown value into an Error for logging.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
