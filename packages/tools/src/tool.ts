import { z } from "zod";
import type { ArgumentMapping, ToolDescription, ToolParameterInfo } from "@salvage/types";
import { AgentError, ToolValidationError, errorMessage } from "@salvage/core";

/**
 * What a tool author writes: a schema and a handler typed by it.
 */
export interface ToolSpec<S extends z.AnyZodObject> {
  readonly name: string;
  /** Shown to the model; say what the tool returns. */
  readonly description: string;
  readonly parameters: S;
  execute(args: z.infer<S>): unknown;
}

/**
 * A registered tool. `invoke` is the only way to run the handler, so arguments
 * are always validated first.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: z.AnyZodObject;
  invoke(args: ArgumentMapping): Promise<string>;
  describe(): ToolDescription;
}

export function defineTool<S extends z.AnyZodObject>(definition: ToolSpec<S>): Tool {
  const { name, description, parameters } = definition;
  // Same schema, seen as a plain validator so its output feeds `execute`.
  const validator: z.ZodTypeAny = parameters;

  return {
    name,
    description,
    parameters,

    async invoke(args: ArgumentMapping): Promise<string> {
      const parsed = validator.safeParse(args);
      if (!parsed.success) {
        throw new ToolValidationError(
          name,
          parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          }))
        );
      }

      let result: unknown;
      try {
        result = await definition.execute(parsed.data);
      } catch (err: unknown) {
        throw new AgentError("TOOL_EXECUTION_ERROR", `Tool "${name}" failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      return stringifyResult(result);
    },

    describe(): ToolDescription {
      return { name, description, parameters: describeParameters(parameters) };
    },
  };
}

export function stringifyResult(result: unknown): string {
  if (typeof result === "string") return result;
  if (result === undefined) return "";
  return JSON.stringify(result);
}

function describeParameters(schema: z.AnyZodObject): ToolParameterInfo[] {
  return Object.entries(schema.shape).map(([name, field]) => {
    const type: z.ZodTypeAny = field instanceof z.ZodType ? field : z.unknown();
    return {
      name,
      type: jsonTypeName(type),
      required: !type.isOptional(),
      ...(type.description ? { description: type.description } : {}),
    };
  });
}

function jsonTypeName(type: z.ZodTypeAny): string {
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) {
    return jsonTypeName(type.unwrap());
  }
  if (type instanceof z.ZodDefault) return jsonTypeName(type.removeDefault());
  if (type instanceof z.ZodNumber) return "number";
  if (type instanceof z.ZodString || type instanceof z.ZodEnum) return "string";
  if (type instanceof z.ZodBoolean) return "boolean";
  if (type instanceof z.ZodArray) return "array";
  if (type instanceof z.ZodObject || type instanceof z.ZodRecord) return "object";
  return "any";
}
