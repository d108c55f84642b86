import { Command, InvalidArgumentError } from "commander";

import { executeShowConfigCommand } from "./commands/show-config";
import { executeSummarizeCommand } from "./commands/summarize";
import { bootstrapEnvFromDotenv } from "./env";
import { CliError } from "./errors";
import { printCommandResult } from "./output";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`invalid positive integer: ${value}`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`invalid non-negative integer: ${value}`);
  }
  return parsed;
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--config <path>", "digest YAML config (default: config/digest.yaml or DIGEST_CONFIG)")
    .option("--timeout-ms <ms>", "Mistral request timeout in milliseconds", parsePositiveInt)
    .option("--min-stories <n>", "minimum translated stories to accept", parseNonNegativeInt)
    .option("--json", "JSON output");
}

async function run() {
  bootstrapEnvFromDotenv();

  const program = new Command();
  program
    .name("greek-digest")
    .description("Translate and summarize Greek news articles into an HTML digest")
    .version("0.1.0");

  addCommonOptions(
    program
      .command("summarize")
      .description("Summarize a JSON file of scraped articles")
      .requiredOption("--input <file>", "JSON array of {title, source, url, content}")
      .option("--out <file>", "write the HTML to a file instead of stdout")
      .option("--document", "wrap the digest in a standalone HTML document")
      .action(async (options) => {
        const result = await executeSummarizeCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  addCommonOptions(
    program
      .command("config")
      .description("Show the resolved configuration (API key masked)")
      .action(async (options) => {
        const result = await executeShowConfigCommand(options);
        printCommandResult(result, Boolean(options.json));
      }),
  );

  await program.parseAsync(process.argv);
}

function printError(error: unknown): void {
  const jsonMode = process.argv.includes("--json");
  if (error instanceof CliError) {
    if (jsonMode) {
      process.stderr.write(`${JSON.stringify(error.toJSON(), null, 2)}\n`);
    } else {
      process.stderr.write(`Error: ${error.message}\n`);
      if (error.hint) {
        process.stderr.write(`Hint: ${error.hint}\n`);
      }
      if (error.path) {
        process.stderr.write(`Path: ${error.path}\n`);
      }
    }
    process.exit(error.code);
  }

  const message = error instanceof Error ? error.message : String(error);
  if (jsonMode) {
    process.stderr.write(`${JSON.stringify({ ok: false, error: { code: 1, message } }, null, 2)}\n`);
  } else {
    process.stderr.write(`Error: ${message}\n`);
  }
  process.exit(1);
}

run().catch(printError);
