import type { AgentErrorCode, AgentErrorShape, AgentId, TraceContext } from "@salvage/types";

/**
 * Base class for every error raised by the salvage packages.
 * Callers branch on `code`, never on the message text.
 */
export class AgentError extends Error implements AgentErrorShape {
  readonly code: AgentErrorCode;
  readonly traceCtx?: TraceContext;
  readonly agentId?: AgentId;

  constructor(
    code: AgentErrorCode,
    message: string,
    options: { cause?: unknown; traceCtx?: TraceContext; agentId?: AgentId } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "AgentError";
    this.code = code;
    this.traceCtx = options.traceCtx;
    this.agentId = options.agentId;
  }
}

/**
 * Raised when a tool call's argument payload cannot be turned into a mapping.
 * The agent loop reports it back to the model as a failed tool call.
 */
export class ParseError extends AgentError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

export interface ValidationIssue {
  /** Dotted path of the offending argument, "" for the mapping itself. */
  readonly path: string;
  readonly message: string;
}

/** Raised when an argument mapping does not satisfy a tool's parameter schema. */
export class ToolValidationError extends AgentError {
  readonly toolName: string;
  readonly issues: ReadonlyArray<ValidationIssue>;

  constructor(toolName: string, issues: ReadonlyArray<ValidationIssue>) {
    const detail = issues
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join("; ");
    super("TOOL_VALIDATION_ERROR", `Invalid arguments for tool "${toolName}": ${detail}`);
    this.name = "ToolValidationError";
    this.toolName = toolName;
    this.issues = issues;
  }
}

export class ConfigError extends AgentError {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown } = {}) {
    super("CONFIG_ERROR", `Invalid config ${path}: ${message}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

/** Narrow an unknown thrown value to an `AgentError`, optionally of a given code. */
export function isAgentError(err: unknown, code?: AgentErrorCode): err is AgentError {
  return err instanceof AgentError && (code === undefined || err.code === code);
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
