import type { ZodType, ZodTypeDef } from "zod";
import type { CommandExecutor, CommandResult } from "../exec/command-executor";
import {
  resourceGroupListSchema,
  subscriptionListSchema,
  type AzureResourceGroup,
  type AzureSubscription,
  type ListResult,
} from "./types";

/**
 * The subset of the Azure CLI the purge pipeline talks to.
 */
export interface AzureCli {
  version(): Promise<CommandResult>;
  accountShow(): Promise<CommandResult>;
  listSubscriptions(): Promise<ListResult<AzureSubscription>>;
  listGroups(subscriptionId: string): Promise<ListResult<AzureResourceGroup>>;
  /** Requests deletion without waiting for it to finish (`--no-wait`). */
  deleteGroup(name: string, subscriptionId: string): Promise<CommandResult>;
}

/**
 * Parse `az ... --output json` stdout into validated records.
 */
export function parseJsonList<T>(
  result: CommandResult,
  schema: ZodType<T[], ZodTypeDef, unknown>,
  what: string,
): ListResult<T> {
  if (result.exitCode !== 0) {
    return { ok: false, error: `Failed to list ${what}: ${result.stderr.trim()}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(result.stdout);
  } catch {
    return { ok: false, error: `Failed to parse JSON response for ${what}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    return { ok: false, error: `Invalid ${what} record${where}: ${issue?.message ?? "unknown issue"}` };
  }

  return { ok: true, items: parsed.data };
}

export function createAzureCli(executor: CommandExecutor, az: string): AzureCli {
  return {
    version() {
      return executor.run(az, ["version"]);
    },

    accountShow() {
      return executor.run(az, ["account", "show"]);
    },

    async listSubscriptions() {
      const result = await executor.run(az, ["account", "list", "--output", "json"]);
      return parseJsonList(result, subscriptionListSchema, "subscriptions");
    },

    async listGroups(subscriptionId) {
      const result = await executor.run(az, [
        "group",
        "list",
        "--subscription",
        subscriptionId,
        "--output",
        "json",
      ]);
      return parseJsonList(result, resourceGroupListSchema, `groups in subscription ${subscriptionId}`);
    },

    deleteGroup(name, subscriptionId) {
      return executor.run(az, [
        "group",
        "delete",
        "--name",
        name,
        "--subscription",
        subscriptionId,
        "--yes",
        "--no-wait",
      ]);
    },
  };
}
