import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { AgentConfig, AgentId, AgentResponse, LogEntry, ToolOutput, ToolRequestPayload } from "@salvage/types";
import { InMemoryEventBus, createEvent, createLogger, createTraceContext, silentLogger } from "@salvage/core";
import { ToolRegistry, defineTool, multiplyTool } from "@salvage/tools";
import { AgentLoop, type AgentLoopOptions } from "./agent-loop.js";
import { ScriptedModelAdapter, lastToolResult, toolCall, type ScriptStep } from "./model-adapter.js";
import { recoveringArgumentParser } from "./argument-parser.js";

const AGENT_ID = "agent-test" as AgentId;

const runCodeTool = defineTool({
  name: "run_code",
  description: "Run a snippet and report its size.",
  parameters: z.object({ code: z.string() }).strict(),
  execute: ({ code }) => `ran ${code.length} chars`,
});

function makeConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    id: AGENT_ID,
    name: "TestAgent",
    systemPrompt: "You are a test agent.",
    model: "scripted",
    maxIterations: 5,
    verbose: false,
    ...overrides,
  };
}

function makeAgent(steps: ScriptStep[], opts: Partial<AgentLoopOptions> = {}) {
  const bus = new InMemoryEventBus(silentLogger);
  const model = new ScriptedModelAdapter(steps);
  const agent = new AgentLoop({
    bus,
    model,
    tools: new ToolRegistry([runCodeTool, multiplyTool]),
    config: makeConfig(),
    logger: silentLogger,
    ...opts,
  });
  return { bus, model, agent };
}

const MALFORMED = `code = """print('hi')"""`;
const reportResult: ScriptStep = (messages) => ({ text: `Result: ${lastToolResult(messages)}` });

describe("AgentLoop", () => {
  it("dispatches a recovered payload without a corrective model call", async () => {
    const { model, agent } = makeAgent(
      [{ text: "", toolCalls: [toolCall("run_code", MALFORMED, "call_1")] }, reportResult],
      { argumentParser: recoveringArgumentParser }
    );

    const response = await agent.chat("Run it");

    expect(response.message).toBe("Result: ran 11 chars");
    expect(response.sources).toEqual([
      {
        callId: "call_1",
        toolName: "run_code",
        rawInput: MALFORMED,
        args: { code: "print('hi')" },
        output: "ran 11 chars",
        isError: false,
      },
    ]);
    expect(model.callCount).toBe(2);
  });

  it("sends a malformed payload back to the model under the default parser", async () => {
    const { model, agent } = makeAgent([
      { text: "", toolCalls: [toolCall("run_code", MALFORMED, "call_1")] },
      { text: "", toolCalls: [toolCall("run_code", `{"code": "print('hi')"}`, "call_2")] },
      reportResult,
    ]);

    const response = await agent.chat("Run it");

    expect(model.callCount).toBe(3);
    expect(response.message).toBe("Result: ran 11 chars");
    expect(response.sources).toHaveLength(2);
    expect(response.sources[0].isError).toBe(true);
    expect(response.sources[0].output.startsWith("Error: Invalid tool call: ")).toBe(true);
    expect(response.sources[0]).not.toHaveProperty("args");

    const correction = model.requests[1][model.requests[1].length - 1];
    expect(correction.role).toBe("tool");
    expect(correction.toolCallId).toBe("call_1");
    expect(correction.content).toBe(response.sources[0].output);
  });

  it("reports a recovered mapping that fails the tool schema", async () => {
    const { agent } = makeAgent(
      [{ text: "", toolCalls: [toolCall("multiply", 'a = "363"', "call_1")] }, reportResult],
      { argumentParser: recoveringArgumentParser }
    );

    const response = await agent.chat("Multiply");

    expect(response.sources[0]).toEqual({
      callId: "call_1",
      toolName: "multiply",
      rawInput: 'a = "363"',
      args: { a: "363" },
      output: 'Error: Invalid arguments for tool "multiply": a: Expected number, received string; b: Required',
      isError: true,
    });
  });

  it("reports unknown tools to the model", async () => {
    const { agent } = makeAgent([
      { text: "", toolCalls: [toolCall("divide", '{"a": 1, "b": 2}', "call_1")] },
      reportResult,
    ]);

    const response = await agent.chat("Divide");

    expect(response.message).toBe('Result: Error: Tool "divide" not found');
  });

  it("passes the empty payload of a parameterless call as an empty mapping", async () => {
    const pingTool = defineTool({
      name: "ping",
      description: "Reply with pong.",
      parameters: z.object({}).strict(),
      execute: () => "pong",
    });
    const model = new ScriptedModelAdapter([
      { text: "", toolCalls: [toolCall("ping", "", "call_1")] },
      reportResult,
    ]);
    const agent = new AgentLoop({
      bus: new InMemoryEventBus(silentLogger),
      model,
      tools: new ToolRegistry([pingTool]),
      config: makeConfig(),
      logger: silentLogger,
    });

    const response = await agent.chat("Ping");

    expect(response.message).toBe("Result: pong");
    expect(response.sources[0].args).toEqual({});
  });

  it("gives up after maxIterations model calls", async () => {
    const call = { text: "", toolCalls: [toolCall("multiply", '{"a": 2, "b": 2}')] };
    const { model, agent } = makeAgent([call, call, call], { config: makeConfig({ maxIterations: 2 }) });

    await expect(agent.chat("Loop")).rejects.toMatchObject({
      code: "MAX_ITERATIONS",
      message: "Max iterations (2) reached",
    });
    expect(model.callCount).toBe(2);
  });

  it("wraps model failures as MODEL_ERROR", async () => {
    const { agent } = makeAgent([
      () => {
        throw new Error("rate limited");
      },
    ]);

    await expect(agent.chat("Hi")).rejects.toMatchObject({
      code: "MODEL_ERROR",
      message: "Model call failed: rate limited",
    });
  });

  it("starts each conversation from the system prompt", async () => {
    const { agent } = makeAgent([{ text: "Hello" }]);

    await agent.chat("Hi");
    expect(agent.getHistory().map((m) => m.role)).toEqual(["system", "user", "assistant"]);

    agent.reset();
    expect(agent.getHistory()).toHaveLength(1);
    expect(agent.getHistory()[0].content).toContain("- run_code(code: string)");
  });

  it("logs calls at info level when verbose", async () => {
    const entries: LogEntry[] = [];
    const { agent } = makeAgent(
      [{ text: "", toolCalls: [toolCall("multiply", '{"a": 6, "b": 7}', "call_1")] }, reportResult],
      {
        config: makeConfig({ verbose: true }),
        logger: createLogger("agent-loop", { level: "info", sink: (e) => entries.push(e) }),
      }
    );

    await agent.chat("Multiply");

    expect(entries.map((e) => [e.message, e.data])).toEqual([
      ["=== Calling Function ===", { tool: "multiply", arguments: '{"a": 6, "b": 7}' }],
      ["=== Function Output ===", { tool: "multiply", output: "42" }],
    ]);
  });
});

describe("AgentLoop events", () => {
  it("answers agent.turn events and publishes each tool call", async () => {
    const { bus, agent } = makeAgent([
      { text: "", toolCalls: [toolCall("multiply", '{"a": 6, "b": 7}', "call_1")] },
      reportResult,
    ]);
    const requests: ToolRequestPayload[] = [];
    const results: ToolOutput[] = [];
    bus.subscribe<ToolRequestPayload>({ topics: ["tool.request"] }, (e) => {
      requests.push(e.payload);
    });
    bus.subscribe<ToolOutput>({ topics: ["tool.result"] }, (e) => {
      results.push(e.payload);
    });
    await agent.start();

    const trace = createTraceContext();
    const reply = await bus.request<unknown, AgentResponse>(
      createEvent("agent.turn", { message: "6 times 7?" }, trace, undefined, AGENT_ID),
      { topics: ["agent.complete", "agent.error"] },
      1000
    );

    expect(reply.topic).toBe("agent.complete");
    expect(reply.sourceAgentId).toBe(AGENT_ID);
    expect(reply.traceCtx.traceId).toBe(trace.traceId);
    expect(reply.payload.message).toBe("Result: 42");
    expect(requests).toEqual([{ callId: "call_1", toolName: "multiply", argumentsPayload: '{"a": 6, "b": 7}' }]);
    expect(results.map((r) => r.output)).toEqual(["42"]);

    agent.stop();
  });

  it("publishes agent.error when the turn fails", async () => {
    const { bus, agent } = makeAgent([]);
    await agent.start();

    const reply = await bus.request<unknown, { code: string; error: string }>(
      createEvent("agent.turn", { message: "Hi" }, createTraceContext(), undefined, AGENT_ID),
      { topics: ["agent.complete", "agent.error"] },
      1000
    );

    expect(reply.topic).toBe("agent.error");
    expect(reply.payload).toEqual({ code: "MODEL_ERROR", error: "Scripted model has no reply for call 1" });
  });
});
