/**
 * A tool call as emitted by the model.
 *
 * `argumentsPayload` is the raw text of the model's argument field. It is
 * nominally a JSON object, but models regularly emit broken quoting, so it
 * is only turned into an {@link ArgumentMapping} by an {@link ArgumentParser}.
 */
export interface ToolCall {
  readonly id: string;
  /** Tool name, e.g. "multiply". */
  readonly name: string;
  readonly argumentsPayload: string;
}

/** Argument name → value, handed to the tool as its parameters. */
export type ArgumentMapping = Record<string, unknown>;

/**
 * Turns a raw argument payload into an argument mapping.
 * Throws a `ParseError` when no interpretation is possible.
 */
export type ArgumentParser = (argumentsPayload: string) => ArgumentMapping;

/**
 * Result of one parsing strategy.
 *
 * - `parsed`: the strategy produced the mapping; stop.
 * - `rejected`: the payload is well-formed but unusable; stop and fail.
 * - `not-applicable`: the strategy does not recognise the payload; try the next one.
 */
export type ParseOutcome =
  | { readonly kind: "parsed"; readonly args: ArgumentMapping }
  | { readonly kind: "rejected"; readonly message: string }
  | { readonly kind: "not-applicable"; readonly reason: string; readonly cause?: unknown };

export interface ParseStrategy {
  /** Short label, logged by parsers built with a logger. */
  readonly name: string;
  attempt(argumentsPayload: string): ParseOutcome;
}

/** One declared parameter of a tool, as shown to the model. */
export interface ToolParameterInfo {
  readonly name: string;
  /** JSON type name: "number", "string", "boolean", "object", "array". */
  readonly type: string;
  readonly required: boolean;
  readonly description?: string;
}

/** Model-facing description of a registered tool. */
export interface ToolDescription {
  readonly name: string;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameterInfo>;
}

/**
 * Record of one tool call made during a turn.
 * Returned to the caller as the response's sources.
 */
export interface ToolOutput {
  readonly callId: string;
  readonly toolName: string;
  /** The payload exactly as the model sent it. */
  readonly rawInput: string;
  /** The mapping the parser produced, absent if parsing failed. */
  readonly args?: ArgumentMapping;
  readonly output: string;
  readonly isError: boolean;
}
