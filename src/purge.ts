import type { AzureCli } from "./azure/client";
import { classifyGroups, type Classification } from "./classification/classifier";
import { confirmDeletion } from "./confirmation/gate";
import type { Prompter } from "./confirmation/prompter";
import { deleteGroups, type DeletionOutcome } from "./deletion/deleter";
import { collectInventory, type InventoryResult } from "./enumeration/collector";
import { PurgeError, type ListingError } from "./errors";
import type { Logger } from "./logger";
import { renderPreview, renderSummary } from "./reporting/report";

export type PurgeStatus = "aborted" | "nothing-to-delete" | "rejected" | "completed" | "simulated";

export interface PurgeResult {
  status: PurgeStatus;
  classification: Classification;
  outcome: DeletionOutcome;
  listingErrors: ListingError[];
  exitCode: 0 | 1;
}

export interface PurgeDeps {
  cli: AzureCli;
  prompter: Prompter;
  logger: Logger;
  write: (line: string) => void;
}

export interface RunOptions {
  exclude: string[];
  workers: number;
  dryRun: boolean;
}

function aborted(listingErrors: ListingError[] = []): PurgeResult {
  return {
    status: "aborted",
    classification: { toDelete: [], toKeep: [] },
    outcome: { deleted: [], failed: [] },
    listingErrors,
    exitCode: 1,
  };
}

/**
 * Collect, classify, confirm, delete and report.
 *
 * Only failed preconditions and an empty subscription listing abort the run.
 * Everything else degrades: the summary is always printed and the exit code
 * is 1 iff at least one deletion failed.
 */
export async function runPurge(deps: PurgeDeps, options: RunOptions): Promise<PurgeResult> {
  const { cli, prompter, logger, write } = deps;

  let inventory: InventoryResult;
  try {
    inventory = await collectInventory(cli, logger);
  } catch (err) {
    if (err instanceof PurgeError) {
      logger.error(err.message);
      return aborted();
    }
    throw err;
  }
  if (!inventory.ok) {
    return aborted(inventory.listingErrors);
  }

  const classification = classifyGroups(inventory.groups, options.exclude, logger);
  logger.info(
    `Found ${inventory.groups.length} group(s): ${classification.toDelete.length} to delete, ${classification.toKeep.length} to keep`,
  );

  if (options.dryRun) {
    for (const line of renderPreview(classification)) write(line);
  }

  const decision = await confirmDeletion({
    classification,
    dryRun: options.dryRun,
    prompter,
    write,
  });

  let status: PurgeStatus;
  let outcome: DeletionOutcome = { deleted: [], failed: [] };

  if (decision === "rejected") {
    status = classification.toDelete.length === 0 ? "nothing-to-delete" : "rejected";
    if (status === "nothing-to-delete") logger.warn("No groups to delete");
  } else {
    outcome = await deleteGroups(classification.toDelete, {
      cli,
      workers: options.workers,
      dryRun: options.dryRun,
      logger,
    });
    status = options.dryRun ? "simulated" : "completed";
  }

  for (const line of renderSummary({ classification, outcome, dryRun: options.dryRun })) write(line);

  return {
    status,
    classification,
    outcome,
    listingErrors: inventory.listingErrors,
    exitCode: outcome.failed.length === 0 ? 0 : 1,
  };
}
