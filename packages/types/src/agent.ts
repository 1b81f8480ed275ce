import type { AgentId } from "./foundational.js";
import type { ToolOutput } from "./tool.js";

/**
 * How the agent interprets tool-call arguments.
 *
 * - `strict`: JSON only; malformed payloads go back to the model for correction.
 * - `recovering`: JSON first, then the `name = "..."` heuristic.
 */
export type ArgumentRecoveryMode = "strict" | "recovering";

/**
 * Configuration for instantiating an agent.
 */
export interface AgentConfig {
  readonly id: AgentId;
  readonly name: string;
  /** The system prompt / persona instructions for this agent. */
  readonly systemPrompt: string;
  /** Model identifier, informational only (e.g. "scripted", "gpt-3.5-turbo-0613"). */
  readonly model: string;
  /** Upper bound on model calls within a single turn. */
  readonly maxIterations: number;
  /** Log every tool call and its output at info level. */
  readonly verbose: boolean;
}

/**
 * The final response from an agent after processing a turn.
 */
export interface AgentResponse {
  /** The agent's final message/output. */
  readonly message: string;
  /** Every tool call made during the turn, in order. */
  readonly sources: ReadonlyArray<ToolOutput>;
}
