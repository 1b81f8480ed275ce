import type { AgentConfig, ToolDescription } from "@salvage/types";

function formatTool(tool: ToolDescription): string {
  const params = tool.parameters
    .map((p) => `${p.name}${p.required ? "" : "?"}: ${p.type}`)
    .join(", ");
  return `- ${tool.name}(${params}) — ${tool.description}`;
}

/**
 * Builds the system prompt for an agent from its persona and its tools.
 */
export function buildSystemPrompt(config: AgentConfig, tools: ReadonlyArray<ToolDescription>): string {
  const toolList = tools.length > 0 ? tools.map(formatTool).join("\n") : "- (no tools registered)";

  return `${config.systemPrompt}

# Identity
Name: ${config.name}
Model: ${config.model}

# Tools
${toolList}

# Calling Tools
Pass arguments as a JSON object whose keys are the parameter names.
If a tool result starts with "Error:", fix the call and try again.
When you have the answer, reply to the user without calling a tool.
`;
}
