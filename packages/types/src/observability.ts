import type { AgentId, SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every event. Ties a user turn to the tool calls it caused.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per user turn. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly traceCtx?: TraceContext;
  readonly agentId?: AgentId;
  readonly data?: Record<string, unknown>;
}
