import type {
  ArgumentMapping,
  ArgumentParser,
  ArgumentRecoveryMode,
  ParseOutcome,
  ParseStrategy,
} from "@salvage/types";
import { ParseError, type Logger } from "@salvage/core";

export const NOT_A_DICTIONARY = "Tool call must be a dictionary.";
export const INVALID_TOOL_CALL = "Invalid tool call: ";

function isPlainObject(value: unknown): value is ArgumentMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON decoding.
 *
 * Empty or whitespace-only payloads decode to `{}`: the chat APIs send `""`
 * for functions declared without parameters. Valid JSON that is not an object
 * is rejected outright; later strategies never see it.
 */
export const strictJsonStrategy: ParseStrategy = {
  name: "strict-json",
  attempt(argumentsPayload: string): ParseOutcome {
    if (argumentsPayload.trim() === "") {
      return { kind: "parsed", args: {} };
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(argumentsPayload);
    } catch (err: unknown) {
      if (err instanceof SyntaxError) {
        return { kind: "not-applicable", reason: err.message, cause: err };
      }
      throw err;
    }

    if (!isPlainObject(decoded)) {
      return { kind: "rejected", message: NOT_A_DICTIONARY };
    }
    return { kind: "parsed", args: decoded };
  },
};

// name = "value". The lookahead takes the whole opening quote run, which the
// engine may not give back. At each start position the closing run is first
// the opening run repeated, then any quote run, then (for a bare run of two
// or more quotes) the empty string.
const ASSIGNMENT = /([A-Za-z_]\w*)\s*=\s*(?=(["']+))\2(?:(.*?)\2|(.*?)["']+|(?<=["']{2})())/s;

/**
 * Recovers a single `name = "value"` assignment from a payload that is not JSON.
 *
 * Large string arguments (source code mostly) tend to come back as
 * `code = """..."""` or with broken escaping. The leftmost assignment wins and
 * its value is returned verbatim: no unescaping, no type coercion. Only one
 * key is ever recovered; a tool needing more fails schema validation.
 */
export const assignmentStrategy: ParseStrategy = {
  name: "assignment",
  attempt(argumentsPayload: string): ParseOutcome {
    const match = ASSIGNMENT.exec(argumentsPayload);
    if (!match) {
      return { kind: "not-applicable", reason: "no name = \"value\" assignment found" };
    }
    const value = match[3] ?? match[4] ?? match[5] ?? "";
    return { kind: "parsed", args: { [match[1]]: value } };
  },
};

/**
 * Build a parser that tries `strategies` in order.
 *
 * The first `parsed` outcome wins and the first `rejected` one fails. When no
 * strategy applies, the error carries the first strategy's reason, which for
 * the built-in chains is the JSON syntax error. With `log`, every attempt is
 * logged at debug level under the strategy's name.
 */
export function createArgumentParser(
  strategies: ReadonlyArray<ParseStrategy>,
  log?: Logger
): ArgumentParser {
  if (strategies.length === 0) {
    throw new Error("createArgumentParser needs at least one strategy");
  }

  return (argumentsPayload: string): ArgumentMapping => {
    let first: { reason: string; cause?: unknown } | undefined;

    for (const strategy of strategies) {
      const outcome = strategy.attempt(argumentsPayload);
      log?.debug("Parse strategy attempted", { strategy: strategy.name, outcome: outcome.kind });
      switch (outcome.kind) {
        case "parsed":
          return outcome.args;
        case "rejected":
          throw new ParseError(outcome.message);
        case "not-applicable":
          first ??= { reason: outcome.reason, cause: outcome.cause };
          break;
      }
    }

    throw new ParseError(`${INVALID_TOOL_CALL}${first?.reason ?? "unrecognised payload"}`, {
      cause: first?.cause,
    });
  };
}

/** JSON only. The agent's default. */
export const strictArgumentParser: ArgumentParser = createArgumentParser([strictJsonStrategy]);

/** JSON, then the assignment heuristic. */
export const recoveringArgumentParser: ArgumentParser = createArgumentParser([
  strictJsonStrategy,
  assignmentStrategy,
]);

export function resolveArgumentParser(mode: ArgumentRecoveryMode): ArgumentParser {
  switch (mode) {
    case "strict":
      return strictArgumentParser;
    case "recovering":
      return recoveringArgumentParser;
  }
}
