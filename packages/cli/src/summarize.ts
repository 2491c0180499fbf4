import fs from "fs";
import path from "path";
import { ChatModel, RunResult, TraceSink, createRuntime } from "@docsum/core";
import { createEchoChatModel, createOpenAIChatModel } from "@docsum/llm";
import { Document, OutputSchema, createInlineSummarizer } from "@docsum/summarize";
import type { CliConfig } from "./config.js";

export async function readDocuments(files: string[], cwd: string = process.cwd()): Promise<Document[]> {
  return Promise.all(
    files.map(async (file) => {
      const source = path.resolve(cwd, file);
      const content = await fs.promises.readFile(source, "utf-8");
      return { content, metadata: { source } };
    }),
  );
}

export function createModel(config: CliConfig): ChatModel {
  if (config.provider === "echo") return createEchoChatModel();
  return createOpenAIChatModel({ model: config.model, apiKey: config.apiKey });
}

export interface SummarizeFilesOptions {
  cwd?: string;
  model?: ChatModel;
  sink?: TraceSink;
}

export async function summarizeFiles(
  files: string[],
  config: CliConfig,
  options: SummarizeFilesOptions = {},
): Promise<RunResult<OutputSchema>> {
  const documents = await readDocuments(files, options.cwd);
  const workflow = createInlineSummarizer(options.model ?? createModel(config), config.prompt);
  const runtime = createRuntime({ trace: { directory: config.traceDir, sink: options.sink } });
  const input = { documents };
  return config.blocking ? runtime.runSync(workflow, input) : runtime.run(workflow, input);
}
