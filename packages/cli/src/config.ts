import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "@docsum/core";

export const DEFAULT_MODEL = "gpt-4o-mini";

export const CliConfig = z.object({
  provider: z.enum(["openai", "echo"]),
  model: z.string().min(1, "Model name must not be empty"),
  prompt: z.string().optional(),
  apiKey: z.string().min(1).optional(),
  traceDir: z.string().min(1),
  blocking: z.boolean(),
  json: z.boolean(),
});
export type CliConfig = z.infer<typeof CliConfig>;

export interface CliFlags {
  model?: string;
  prompt?: string;
  promptFile?: string;
  traceDir?: string;
  echo?: boolean;
  sync?: boolean;
  json?: boolean;
}

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  cwd?: string;
  readFile?: (file: string) => string;
}

/** Flags win over environment, environment over defaults. */
export function loadCliConfig(flags: CliFlags, env: Env, options: LoadConfigOptions = {}): CliConfig {
  const cwd = options.cwd ?? process.cwd();
  const readFile = options.readFile ?? ((file: string) => fs.readFileSync(file, "utf-8"));

  if (flags.prompt !== undefined && flags.promptFile !== undefined) {
    throw new ConfigurationError("Use either --prompt or --prompt-file, not both");
  }
  const prompt =
    flags.promptFile !== undefined
      ? readFile(path.resolve(cwd, flags.promptFile))
      : flags.prompt ?? nonEmpty(env.DOCSUM_PROMPT);

  const result = CliConfig.safeParse({
    provider: flags.echo ? "echo" : "openai",
    model: flags.model ?? nonEmpty(env.DOCSUM_MODEL) ?? DEFAULT_MODEL,
    prompt,
    apiKey: nonEmpty(env.OPENAI_API_KEY),
    traceDir: path.resolve(cwd, flags.traceDir ?? nonEmpty(env.DOCSUM_TRACE_DIR) ?? "traces"),
    blocking: flags.sync ?? false,
    json: flags.json ?? false,
  });
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const config = result.data;
  if (config.provider === "openai" && !config.apiKey) {
    throw new ConfigurationError("Set OPENAI_API_KEY or pass --echo to run without a model provider");
  }
  if (config.provider === "openai" && config.blocking) {
    throw new ConfigurationError("--sync is only available with --echo; the OpenAI model is async-only");
  }
  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}
