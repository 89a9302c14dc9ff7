import { Command } from "commander";
import { ZodError } from "zod";
import { createAzureCli } from "./azure/client";
import { getConfig, resolveOptions, type CliFlags, type PurgeOptions } from "./config";
import { createReadlinePrompter } from "./confirmation/prompter";
import { DEFAULT_WORKERS } from "./deletion/deleter";
import { createCommandExecutor } from "./exec/command-executor";
import { findAzCommand } from "./exec/locate";
import { createLogger } from "./logger";
import { runPurge } from "./purge";

export function buildProgram(): Command {
  return new Command()
    .name("rg-purge")
    .description("Delete Azure resource groups across all subscriptions, with exclusion patterns")
    .option(
      "--exclude <patterns...>",
      "group names to keep (exact or regex), e.g. --exclude rg-prod rg-important 'rg-.*-prod'",
    )
    .option("-w, --workers <n>", `number of parallel workers (default: ${DEFAULT_WORKERS})`)
    .option("-q, --quiet", "quiet mode (hide informational messages)")
    .option("--dry-run", "simulation mode - list groups without deleting them")
    .showHelpAfterError();
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);

  let options: PurgeOptions;
  try {
    options = resolveOptions(program.opts<CliFlags>(), getConfig());
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      program.error(`Invalid option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? err.message}`);
    }
    throw err;
  }
  const logger = createLogger({ quiet: options.quiet });

  const az = options.azPath ?? findAzCommand();
  logger.info(`Using command: ${az}`);

  const prompter = createReadlinePrompter();
  try {
    const result = await runPurge(
      {
        cli: createAzureCli(createCommandExecutor(), az),
        prompter,
        logger,
        write: (line) => console.log(line),
      },
      { exclude: options.exclude, workers: options.workers, dryRun: options.dryRun },
    );
    return result.exitCode;
  } finally {
    prompter.close();
  }
}
