import type { AgentId, LogEntry, LogLevel, TraceContext } from "@salvage/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const satisfies readonly LogLevel[];

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export interface LogContext {
  readonly traceCtx?: TraceContext;
  readonly agentId?: AgentId;
}

export interface Logger {
  readonly level: LogLevel;
  trace(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  debug(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  info(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  warn(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  error(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  fatal(message: string, data?: Record<string, unknown>, ctx?: LogContext): void;
  /** A logger for a sub-component, sharing this logger's level. */
  child(component: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives every entry that passes the level filter. Defaults to console JSON lines. */
  sink?: (entry: LogEntry) => void;
}

/** Writes one JSON line per entry; warn and above go to stderr. */
export function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.warn) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Structured logger emitting {@link LogEntry} records.
 *
 * @example
 * const log = createLogger("agent-loop", { level: "debug" });
 * log.info("Calling tool", { tool: "multiply" });
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[level];

  const emit =
    (entryLevel: LogLevel) =>
    (message: string, data?: Record<string, unknown>, ctx?: LogContext): void => {
      if (LEVEL_ORDER[entryLevel] < threshold) return;
      sink({
        timestamp: new Date().toISOString(),
        level: entryLevel,
        component,
        message,
        ...(ctx?.traceCtx ? { traceCtx: ctx.traceCtx } : {}),
        ...(ctx?.agentId ? { agentId: ctx.agentId } : {}),
        ...(data ? { data } : {}),
      });
    };

  return {
    level,
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
    child: (sub) => createLogger(`${component}.${sub}`, { level, sink }),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger("silent", { sink: () => {} });
