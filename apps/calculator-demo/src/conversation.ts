import { lastToolResult, toolCall, type ScriptStep } from "@salvage/runtime";

export const QUESTION = "What is (121 * 3) + 42?";

/**
 * Plays the model's side of the example conversation: multiply, then add the
 * product to 42, then answer with whatever the tools returned.
 */
export function calculatorScript(): ScriptStep[] {
  return [
    { text: "", toolCalls: [toolCall("multiply", '{"a": 121, "b": 3}')] },
    (messages) => {
      const product = lastToolResult(messages) ?? "null";
      return { text: "", toolCalls: [toolCall("add", `{"a": ${product}, "b": 42}`)] };
    },
    (messages) => ({ text: `(121 * 3) + 42 = ${lastToolResult(messages) ?? "?"}` }),
  ];
}
