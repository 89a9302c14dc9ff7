import type { AzureCli } from "../azure/client";
import { displayName, type GroupRecord } from "../enumeration/types";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { runPooled } from "./pool";

export interface FailedGroup extends GroupRecord {
  error: string;
}

export interface DeletionOutcome {
  deleted: GroupRecord[];
  failed: FailedGroup[];
}

export interface DeleteOptions {
  cli: AzureCli;
  workers: number;
  dryRun: boolean;
  logger: Logger;
}

type TaskResult = { ok: true } | { ok: false; error: string };

export const DEFAULT_WORKERS = 5;

/**
 * Submit one delete request per group through a bounded pool and collect
 * every outcome. Deletes are fire-and-forget on the Azure side (`--no-wait`),
 * so "deleted" means the request was accepted.
 */
export async function deleteGroups(
  toDelete: readonly GroupRecord[],
  options: DeleteOptions,
): Promise<DeletionOutcome> {
  const { cli, workers, dryRun, logger } = options;
  const outcome: DeletionOutcome = { deleted: [], failed: [] };

  if (toDelete.length === 0) {
    logger.warn("No groups to delete");
    return outcome;
  }

  logger.info(`Starting parallel deletion of ${toDelete.length} group(s) with ${workers} worker(s)...`);

  const deleteOne = async (group: GroupRecord): Promise<TaskResult> => {
    const label = displayName(group);
    if (dryRun) {
      logger.info(`[DRY-RUN] Would delete: ${label}`);
      return { ok: true };
    }

    logger.info(`Deleting group: ${label}`);
    const result = await cli.deleteGroup(group.name, group.subscriptionId);
    if (result.exitCode !== 0) {
      const error = result.stderr.trim() || `exit code ${result.exitCode}`;
      logger.error(`Failed to delete '${label}': ${error}`);
      return { ok: false, error };
    }
    return { ok: true };
  };

  const results = await runPooled(toDelete, deleteOne, workers, (group, settled) => {
    const label = displayName(group);
    if (settled.status === "rejected") {
      logger.error(`Exception while deleting '${label}': ${errorMessage(settled.reason)}`);
    } else if (settled.value.ok) {
      logger.success(`${dryRun ? "Simulated deletion" : "Deleted successfully"}: ${label}`);
    }
  });

  // Outcome lists follow submission order, not completion order.
  results.forEach((settled, idx) => {
    const group = toDelete[idx];
    if (settled.status === "rejected") {
      outcome.failed.push({ ...group, error: `Unexpected error: ${errorMessage(settled.reason)}` });
    } else if (settled.value.ok) {
      outcome.deleted.push(group);
    } else {
      outcome.failed.push({ ...group, error: settled.value.error });
    }
  });

  return outcome;
}
