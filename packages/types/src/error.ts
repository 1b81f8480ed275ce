import type { AgentId } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Error codes shared by every package.
 * A string union rather than an enum so codes read well in logs.
 */
export type AgentErrorCode =
  | "PARSE_ERROR"             // Tool-call arguments could not be interpreted
  | "TOOL_NOT_FOUND"          // Tool name not recognized
  | "TOOL_ALREADY_REGISTERED" // Two tools share a name
  | "TOOL_VALIDATION_ERROR"   // Arguments do not match the tool's schema
  | "TOOL_EXECUTION_ERROR"    // Tool ran but threw
  | "MAX_ITERATIONS"          // Model kept calling tools past the limit
  | "MODEL_ERROR"             // Model adapter failed to produce a response
  | "CONFIG_ERROR"            // Configuration file unreadable or invalid
  | "INTERNAL_ERROR";         // Unexpected failure

export interface AgentErrorShape {
  readonly code: AgentErrorCode;
  readonly message: string;
  readonly traceCtx?: TraceContext;
  readonly agentId?: AgentId;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}
