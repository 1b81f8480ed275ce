import { z } from "zod";
import { defineTool } from "./tool.js";

export const MultiplySchema = z
  .object({
    a: z.number().describe("First factor"),
    b: z.number().describe("Second factor"),
  })
  .strict();

export const AddSchema = z
  .object({
    a: z.number().describe("First addend"),
    b: z.number().describe("Second addend"),
  })
  .strict();

export function multiply({ a, b }: z.infer<typeof MultiplySchema>): number {
  return a * b;
}

export function add({ a, b }: z.infer<typeof AddSchema>): number {
  return a + b;
}

export const multiplyTool = defineTool({
  name: "multiply",
  description: "Multiply two numbers and return the product.",
  parameters: MultiplySchema,
  execute: multiply,
});

export const addTool = defineTool({
  name: "add",
  description: "Add two numbers and return the sum.",
  parameters: AddSchema,
  execute: add,
});
