import { fileURLToPath } from "node:url";
import { InMemoryEventBus, createLogger, loadAppConfig } from "@salvage/core";
import { AgentLoop, ScriptedModelAdapter, resolveArgumentParser } from "@salvage/runtime";
import { ToolRegistry, addTool, multiplyTool } from "@salvage/tools";
import { QUESTION, calculatorScript } from "./conversation.js";

// ─── Configuration ──────────────────────────────────────────────────────────

const CONFIG_PATH = fileURLToPath(new URL("../calculator.config.yaml", import.meta.url));

const config = await loadAppConfig(CONFIG_PATH);
const log = createLogger("calculator-demo", { level: config.logLevel });

// ─── Initialize Components ─────────────────────────────────────────

const bus = new InMemoryEventBus(log.child("bus"));
const tools = new ToolRegistry([multiplyTool, addTool]);

const agent = new AgentLoop({
  bus,
  model: new ScriptedModelAdapter(calculatorScript()),
  tools,
  config: config.agent,
  argumentParser: resolveArgumentParser(config.argumentRecovery),
  logger: log.child("agent"),
});

// ─── Run ────────────────────────────────────────────────────────────────────

log.info("Asking", { question: QUESTION, argumentRecovery: config.argumentRecovery });
const response = await agent.chat(QUESTION);

for (const source of response.sources) {
  console.log(`${source.toolName}(${source.rawInput}) -> ${source.output}`);
}
console.log(response.message);
