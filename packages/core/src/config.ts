import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import type { AgentConfig, AgentId, ArgumentRecoveryMode, LogLevel } from "@salvage/types";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, isLogLevel } from "./logger.js";

/** Environment variable that overrides `logLevel` from the file. */
export const LOG_LEVEL_ENV = "SALVAGE_LOG_LEVEL";

const AgentSectionSchema = z
  .object({
    id: z.string().min(1).default("calculator"),
    name: z.string().min(1).default("Calculator"),
    systemPrompt: z
      .string()
      .default("You are a careful assistant. Use the tools for every arithmetic step."),
    model: z.string().default("scripted"),
    maxIterations: z.number().int().positive().default(10),
    verbose: z.boolean().default(false),
  })
  .strict();

const FileSchema = z
  .object({
    agent: AgentSectionSchema.default({}),
    argumentRecovery: z.enum(["strict", "recovering"]).default("recovering"),
    logLevel: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export interface AppConfig {
  readonly agent: AgentConfig;
  readonly argumentRecovery: ArgumentRecoveryMode;
  readonly logLevel: LogLevel;
}

/**
 * Validate an already-parsed config document and apply defaults.
 * `source` only labels errors.
 */
export function parseAppConfig(
  doc: unknown,
  source = "<inline>",
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  // An empty YAML file loads as undefined.
  const result = FileSchema.safeParse(doc ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(source, detail, { cause: result.error });
  }

  const { agent, argumentRecovery } = result.data;
  let logLevel: LogLevel = result.data.logLevel;
  const override = env[LOG_LEVEL_ENV];
  if (override) {
    if (!isLogLevel(override)) {
      throw new ConfigError(source, `${LOG_LEVEL_ENV}="${override}" is not one of ${LOG_LEVELS.join(", ")}`);
    }
    logLevel = override;
  }

  return {
    agent: { ...agent, id: agent.id as AgentId },
    argumentRecovery,
    logLevel,
  };
}

/**
 * Load configuration from a YAML file.
 * A missing file yields the defaults; an unreadable or invalid one throws `ConfigError`.
 */
export async function loadAppConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return parseAppConfig({}, path, env);
    }
    throw new ConfigError(path, "unreadable", { cause: err });
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err: unknown) {
    const reason = err instanceof yaml.YAMLException ? err.reason : String(err);
    throw new ConfigError(path, `malformed YAML (${reason})`, { cause: err });
  }
  return parseAppConfig(doc, path, env);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
