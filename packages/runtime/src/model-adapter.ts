import { v7 as uuidv7 } from "uuid";
import type { ToolCall, ToolDescription } from "@salvage/types";
import { AgentError } from "@salvage/core";

/**
 * Messages as the agent loop keeps them and hands them to the model adapter.
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  name?: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
}

export interface GenerationResult {
  text: string;
  /** Tool calls with their arguments still in raw text form. */
  toolCalls?: ToolCall[];
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full conversation plus the tools the model may call.
 */
export interface ModelAdapter {
  generate(
    messages: ReadonlyArray<ChatMessage>,
    tools: ReadonlyArray<ToolDescription>
  ): Promise<GenerationResult>;
}

/** Build a tool call the way a model would emit it. */
export function toolCall(name: string, argumentsPayload: string, id: string = uuidv7()): ToolCall {
  return { id, name, argumentsPayload };
}

/** A scripted reply, fixed or computed from the conversation so far. */
export type ScriptStep =
  | GenerationResult
  | ((messages: ReadonlyArray<ChatMessage>) => GenerationResult);

/**
 * Model adapter that replays a script, one step per `generate()` call.
 * Used by the tests and the calculator example in place of a hosted model.
 */
export class ScriptedModelAdapter implements ModelAdapter {
  private readonly steps: ScriptStep[];
  private readonly seen: ChatMessage[][] = [];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async generate(
    messages: ReadonlyArray<ChatMessage>,
    _tools: ReadonlyArray<ToolDescription>
  ): Promise<GenerationResult> {
    this.seen.push(messages.map((m) => ({ ...m })));
    const step = this.steps.shift();
    if (!step) {
      throw new AgentError("MODEL_ERROR", `Scripted model has no reply for call ${this.seen.length}`);
    }
    return typeof step === "function" ? step(messages) : step;
  }

  /** Number of `generate()` calls so far. */
  get callCount(): number {
    return this.seen.length;
  }

  /** Snapshot of the conversation passed to each call. */
  get requests(): ReadonlyArray<ReadonlyArray<ChatMessage>> {
    return this.seen;
  }

  get remaining(): number {
    return this.steps.length;
  }
}

/** Content of the most recent tool message, if any. */
export function lastToolResult(messages: ReadonlyArray<ChatMessage>): string | undefined {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === "tool") return messages[i].content;
  }
  return undefined;
}
