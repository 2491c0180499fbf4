import { Command } from "commander";
import { CliFlags, loadCliConfig } from "./config.js";
import { summarizeFiles } from "./summarize.js";

export function createProgram(env: Record<string, string | undefined> = process.env): Command {
  const program = new Command();
  program
    .name("docsum")
    .description("Summarize text documents in a single model call");

  program
    .command("summarize")
    .argument("<files...>", "Text files to summarize, in order")
    .option("--prompt <text>", "Custom system instruction")
    .option("--prompt-file <file>", "Read the system instruction from a file")
    .option("--model <name>", "Model name")
    .option("--trace-dir <dir>", "Directory for JSONL traces")
    .option("--echo", "Use the offline echo model")
    .option("--sync", "Use the blocking invocation path")
    .option("--json", "Print output and run record as JSON")
    .action(async (files: string[], flags: CliFlags) => {
      const config = loadCliConfig(flags, env);
      const { output, record } = await summarizeFiles(files, config);
      if (config.json) {
        console.log(JSON.stringify({ output, record }, null, 2));
      } else {
        console.log(output.summary);
      }
    });

  return program;
}
