import type { AzureCli } from "../azure/client";
import { ListingError, NotAuthenticatedError, ToolUnavailableError } from "../errors";
import type { Logger } from "../logger";
import type { GroupRecord, SubscriptionRecord } from "./types";

export const UNKNOWN_SUBSCRIPTION_NAME = "Unknown";

export type InventoryResult =
  | { ok: true; subscriptions: SubscriptionRecord[]; groups: GroupRecord[]; listingErrors: ListingError[] }
  | { ok: false; listingErrors: ListingError[] };

/**
 * Verify the Azure CLI is installed and signed in.
 *
 * @throws ToolUnavailableError when `az version` fails
 * @throws NotAuthenticatedError when `az account show` fails
 */
export async function checkPreconditions(cli: AzureCli, logger: Logger): Promise<void> {
  logger.info("Checking Azure CLI...");

  const version = await cli.version();
  if (version.exitCode !== 0) {
    throw new ToolUnavailableError(version.stderr.trim() || `exit code ${version.exitCode}`);
  }
  logger.info("Azure CLI found");

  const account = await cli.accountShow();
  if (account.exitCode !== 0) {
    throw new NotAuthenticatedError(account.stderr.trim() || `exit code ${account.exitCode}`);
  }
  logger.info("Authenticated with Azure");
}

/**
 * Enumerate every resource group in every visible subscription.
 *
 * A failure listing one subscription's groups is recorded and the remaining
 * subscriptions are still collected.
 */
export async function collectInventory(cli: AzureCli, logger: Logger): Promise<InventoryResult> {
  await checkPreconditions(cli, logger);

  logger.info("Fetching subscriptions...");
  const subs = await cli.listSubscriptions();
  if (!subs.ok) {
    const err = new ListingError(subs.error);
    logger.warn(err.message);
    return { ok: false, listingErrors: [err] };
  }
  if (subs.items.length === 0) {
    logger.warn("No subscriptions found");
    return { ok: false, listingErrors: [] };
  }

  const subscriptions: SubscriptionRecord[] = subs.items.map((s) => ({
    id: s.id,
    name: s.name || UNKNOWN_SUBSCRIPTION_NAME,
  }));
  logger.info(`Processing ${subscriptions.length} subscription(s)...`);

  const groups: GroupRecord[] = [];
  const listingErrors: ListingError[] = [];

  for (const sub of subscriptions) {
    logger.info(`Listing groups in subscription: ${sub.name}`);
    const result = await cli.listGroups(sub.id);
    if (!result.ok) {
      const err = new ListingError(result.error, sub.id);
      logger.error(err.message);
      listingErrors.push(err);
      continue;
    }
    for (const group of result.items) {
      groups.push({
        name: group.name,
        subscriptionId: sub.id,
        subscriptionName: sub.name,
        providerId: group.id,
      });
    }
  }

  return { ok: true, subscriptions, groups, listingErrors };
}
