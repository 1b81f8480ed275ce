export { defineTool, stringifyResult, type Tool, type ToolSpec } from "./tool.js";
export { ToolRegistry } from "./registry.js";
export { MultiplySchema, AddSchema, multiply, add, multiplyTool, addTool } from "./arithmetic.js";
