export { AgentLoop } from "./agent-loop.js";
export type { AgentLoopOptions } from "./agent-loop.js";
export { buildSystemPrompt } from "./prompt-builder.js";
export { ScriptedModelAdapter, toolCall, lastToolResult } from "./model-adapter.js";
export type { ModelAdapter, ChatMessage, GenerationResult, ScriptStep } from "./model-adapter.js";
export {
  strictJsonStrategy,
  assignmentStrategy,
  createArgumentParser,
  strictArgumentParser,
  recoveringArgumentParser,
  resolveArgumentParser,
  NOT_A_DICTIONARY,
  INVALID_TOOL_CALL,
} from "./argument-parser.js";
