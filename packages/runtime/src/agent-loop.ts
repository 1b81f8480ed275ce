import type {
  AgentConfig,
  AgentErrorPayload,
  AgentEvent,
  AgentResponse,
  ArgumentMapping,
  ArgumentParser,
  EventBus,
  EventTopic,
  Subscription,
  ToolCall,
  ToolDescription,
  ToolOutput,
  ToolRequestPayload,
  TraceContext,
  TurnPayload,
} from "@salvage/types";
import {
  AgentError,
  createEvent,
  createLogger,
  createTraceContext,
  errorMessage,
  isAgentError,
  type Logger,
} from "@salvage/core";
import type { ToolRegistry } from "@salvage/tools";
import type { ModelAdapter, ChatMessage } from "./model-adapter.js";
import { buildSystemPrompt } from "./prompt-builder.js";
import { strictArgumentParser } from "./argument-parser.js";

/**
 * Options for AgentLoop construction.
 */
export interface AgentLoopOptions {
  bus: EventBus;
  model: ModelAdapter;
  tools: ToolRegistry;
  config: AgentConfig;
  /**
   * Turns each tool call's raw arguments into a mapping.
   * Defaults to {@link strictArgumentParser}.
   */
  argumentParser?: ArgumentParser;
  logger?: Logger;
}

/**
 * Failures reported back to the model as a tool result instead of aborting
 * the turn, so the model can issue a corrected call.
 */
const RECOVERABLE_CODES = new Set([
  "PARSE_ERROR",
  "TOOL_NOT_FOUND",
  "TOOL_VALIDATION_ERROR",
  "TOOL_EXECUTION_ERROR",
]);

/**
 * The agent loop.
 *
 * Runs the think→tool→think cycle for one user message at a time, either
 * directly through `chat()` or driven by `agent.turn` events once `start()`
 * has been called. History lives in memory for the lifetime of the instance.
 */
export class AgentLoop {
  private history: ChatMessage[] = [];
  private readonly bus: EventBus;
  private readonly model: ModelAdapter;
  private readonly tools: ToolRegistry;
  private readonly config: AgentConfig;
  private readonly parseArguments: ArgumentParser;
  private readonly log: Logger;
  private readonly toolDescriptions: ToolDescription[];
  private subscription?: Subscription;

  constructor(opts: AgentLoopOptions) {
    this.bus = opts.bus;
    this.model = opts.model;
    this.tools = opts.tools;
    this.config = opts.config;
    this.parseArguments = opts.argumentParser ?? strictArgumentParser;
    this.log = opts.logger ?? createLogger("agent-loop");
    this.toolDescriptions = this.tools.describe();
    this.reset();
  }

  /** Start listening for agent.turn events targeted at this agent. */
  async start(): Promise<void> {
    if (this.subscription) return;

    this.subscription = this.bus.subscribe<TurnPayload>(
      { topics: ["agent.turn"], targetAgentId: this.config.id },
      async (event) => {
        const trace = createTraceContext(event.traceCtx);
        try {
          const response = await this.chat(event.payload.message, trace);
          await this.publish("agent.complete", response, trace);
        } catch (err: unknown) {
          this.log.error("Turn failed", { error: errorMessage(err) }, { traceCtx: trace, agentId: this.config.id });
          const payload: AgentErrorPayload = {
            code: isAgentError(err) ? err.code : "INTERNAL_ERROR",
            error: errorMessage(err),
          };
          await this.publish("agent.error", payload, trace);
        }
      }
    );

    this.log.info(`Agent "${this.config.name}" started.`, { tools: this.toolDescriptions.map((t) => t.name) });
  }

  /** Stop listening for turn events. History is kept. */
  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  /**
   * Send one user message and run tool calls until the model answers.
   * Rejects with `MAX_ITERATIONS` if the model keeps calling tools.
   */
  async chat(message: string, trace: TraceContext = createTraceContext()): Promise<AgentResponse> {
    this.history.push({ role: "user", content: message });
    return this.runLoop(trace);
  }

  /** Drop the conversation, keeping only the system prompt. */
  reset(): void {
    this.history = [
      { role: "system", content: buildSystemPrompt(this.config, this.toolDescriptions) },
    ];
  }

  getHistory(): ReadonlyArray<ChatMessage> {
    return this.history;
  }

  private async runLoop(trace: TraceContext): Promise<AgentResponse> {
    const sources: ToolOutput[] = [];

    for (let i = 0; i < this.config.maxIterations; i++) {
      const result = await this.generate();

      if (result.text) {
        this.history.push({ role: "assistant", content: result.text });
      }

      // No tool calls → done
      if (!result.toolCalls || result.toolCalls.length === 0) {
        return { message: result.text, sources };
      }

      this.history.push({
        role: "assistant",
        content: "",
        toolCalls: result.toolCalls,
      });

      for (const call of result.toolCalls) {
        const output = await this.executeToolCall(call, createTraceContext(trace));
        sources.push(output);
        this.history.push({
          role: "tool",
          toolCallId: call.id,
          name: call.name,
          content: output.output,
        });
      }
      // Loop continues so the model can see tool results
    }

    throw new AgentError(
      "MAX_ITERATIONS",
      `Max iterations (${this.config.maxIterations}) reached`,
      { traceCtx: trace, agentId: this.config.id }
    );
  }

  private async generate() {
    try {
      return await this.model.generate(this.history, this.toolDescriptions);
    } catch (err: unknown) {
      if (isAgentError(err)) throw err;
      throw new AgentError("MODEL_ERROR", `Model call failed: ${errorMessage(err)}`, {
        cause: err,
        agentId: this.config.id,
      });
    }
  }

  private async executeToolCall(call: ToolCall, trace: TraceContext): Promise<ToolOutput> {
    const request: ToolRequestPayload = {
      callId: call.id,
      toolName: call.name,
      argumentsPayload: call.argumentsPayload,
    };
    await this.publish("tool.request", request, trace);
    this.logCall("=== Calling Function ===", { tool: call.name, arguments: call.argumentsPayload }, trace);

    let args: ArgumentMapping | undefined;
    let output: ToolOutput;
    try {
      args = this.parseArguments(call.argumentsPayload);
      const text = await this.tools.invoke(call.name, args);
      output = { callId: call.id, toolName: call.name, rawInput: call.argumentsPayload, args, output: text, isError: false };
    } catch (err: unknown) {
      if (!isAgentError(err) || !RECOVERABLE_CODES.has(err.code)) throw err;
      this.log.warn(
        "Tool call failed",
        { tool: call.name, code: err.code, error: err.message },
        { traceCtx: trace, agentId: this.config.id }
      );
      output = {
        callId: call.id,
        toolName: call.name,
        rawInput: call.argumentsPayload,
        ...(args ? { args } : {}),
        output: `Error: ${err.message}`,
        isError: true,
      };
    }

    this.logCall("=== Function Output ===", { tool: call.name, output: output.output }, trace);
    await this.publish("tool.result", output, trace);
    return output;
  }

  private logCall(message: string, data: Record<string, unknown>, trace: TraceContext): void {
    const ctx = { traceCtx: trace, agentId: this.config.id };
    if (this.config.verbose) {
      this.log.info(message, data, ctx);
    } else {
      this.log.debug(message, data, ctx);
    }
  }

  private async publish<T>(topic: EventTopic, payload: T, trace: TraceContext): Promise<void> {
    const event: AgentEvent<T> = createEvent(topic, payload, trace, this.config.id);
    await this.bus.publish(event);
  }
}
