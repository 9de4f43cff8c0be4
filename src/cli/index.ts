/**
 * Parley CLI - Main entry point
 */

import { Command, InvalidArgumentError } from "commander";
import type { CliOptions } from "./types.js";
import { runCommand } from "./commands/run.js";
import { configShow } from "./commands/config.js";

/** Helper to get CLI options from a command */
function getCliOptions(command: Command): CliOptions {
  const opts = command.opts<CliOptions>();
  return {
    json: opts.json ?? false,
    verbose: opts.verbose ?? false,
  };
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/** Create CLI program */
export function createCli(): Command {
  const program = new Command();

  program
    .name("parley")
    .description("Task orchestration and conversation state engine")
    .version("0.1.0");

  // Global options
  program.option("--json", "Output in JSON format");
  program.option("--verbose", "Verbose output");

  program.command("run")
    .description("Submit the events in a JSON file and report the outcome")
    .argument("<events>", "Path to a JSON array of events")
    .option("-w, --workers <n>", "Number of concurrent workers", parsePositiveInt)
    .option("--timeout <ms>", "Maximum time to wait for each task", parsePositiveInt)
    .option("--persist", "Store conversations under the configured storage directory")
    .option("--openai", "Use the OpenAI executor (needs OPENAI_API_KEY)")
    .action(async (events: string, options: { workers?: number; timeout?: number; persist?: boolean; openai?: boolean }) => {
      const cliOptions = getCliOptions(program);
      await runCommand(events, { ...cliOptions, ...options });
    });

  program.command("config")
    .description("Show the resolved configuration")
    .action(async () => {
      const options = getCliOptions(program);
      await configShow(options);
    });

  return program;
}

/** Run CLI */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
