// =============================================================================
// @trendwire/shared — Structured JSON-lines logger
// =============================================================================
// Every component receives a Logger through its constructor or deps object;
// nothing in the core logs through a process-wide singleton. The server
// writes to stdout, the CLI to stderr so answers on stdout stay clean.
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

/** Anything with a `write(string)` method, e.g. process.stdout */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: string;
  sink?: LogSink;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_VALUES, value);
}

export function createLogger(options?: LoggerOptions): Logger {
  const levelName = options?.level ?? "info";
  const threshold = isLogLevel(levelName)
    ? LEVEL_VALUES[levelName]
    : LEVEL_VALUES.info;

  return buildLogger(threshold, options?.sink ?? process.stdout, {});
}

function buildLogger(
  threshold: number,
  sink: LogSink,
  bindings: Record<string, unknown>,
): Logger {
  function write(
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_VALUES[level] < threshold) return;

    const entry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      ...bindings,
      ...data,
    };

    sink.write(JSON.stringify(entry) + "\n");
  }

  return {
    trace: (msg, data) => write("trace", msg, data),
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    fatal: (msg, data) => write("fatal", msg, data),
    child: (childBindings) =>
      buildLogger(threshold, sink, { ...bindings, ...childBindings }),
  };
}
