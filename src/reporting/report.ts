import type { Classification } from "../classification/classifier";
import type { DeletionOutcome } from "../deletion/deleter";
import { displayName } from "../enumeration/types";

export const RULER = "=".repeat(80);

export const DRY_RUN_BANNER = "[DRY-RUN] Simulation mode enabled - no group was actually deleted";

/**
 * Group records by subscription name. Subscriptions are sorted by code point; records keep
 * their encounter order within a subscription.
 */
export function groupBySubscription<T extends { subscriptionName: string }>(
  records: readonly T[],
): Array<[string, T[]]> {
  const bySub = new Map<string, T[]>();
  for (const record of records) {
    const list = bySub.get(record.subscriptionName);
    if (list) {
      list.push(record);
    } else {
      bySub.set(record.subscriptionName, [record]);
    }
  }
  return [...bySub.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function renderGrouped<T extends { name: string; subscriptionName: string }>(
  records: readonly T[],
  bullet: string,
  suffix: (record: T) => string = () => "",
): string[] {
  const lines: string[] = [];
  for (const [sub, list] of groupBySubscription(records)) {
    lines.push(`Subscription: ${sub}`);
    for (const record of list) {
      lines.push(`   ${bullet} ${displayName(record)}${suffix(record)}`);
    }
    lines.push("");
  }
  return lines;
}

export function renderPreview(classification: Classification): string[] {
  const { toDelete, toKeep } = classification;
  const lines = ["", RULER, "PREVIEW: GROUPS TO DELETE", RULER, ""];

  if (toDelete.length === 0) {
    lines.push("No group will be deleted.", "");
    return lines;
  }

  lines.push(`Total groups to delete: ${toDelete.length}`, "");
  lines.push(...renderGrouped(toDelete, "•"));
  lines.push(RULER, "");

  if (toKeep.length > 0) {
    lines.push(RULER, "GROUPS TO KEEP (EXCLUDED)", RULER, "");
    lines.push(...renderGrouped(toKeep, "✓", (g) => ` (matched: ${g.excludedBy})`));
    lines.push(RULER);
  }

  return lines;
}

export interface SummaryInput {
  classification: Classification;
  outcome: DeletionOutcome;
  dryRun: boolean;
}

export function renderSummary({ classification, outcome, dryRun }: SummaryInput): string[] {
  const lines = ["", RULER, "OPERATION SUMMARY", RULER, ""];

  if (dryRun) {
    lines.push(DRY_RUN_BANNER, "");
  }

  lines.push(`Groups kept (excluded): ${classification.toKeep.length}`);
  lines.push(...renderGrouped(classification.toKeep, "✓"));
  if (classification.toKeep.length === 0) lines.push("");

  lines.push(`Groups deleted successfully: ${outcome.deleted.length}`);
  lines.push(...renderGrouped(outcome.deleted, "✓"));
  if (outcome.deleted.length === 0) lines.push("");

  lines.push(`Groups that failed to delete: ${outcome.failed.length}`);
  lines.push(...renderGrouped(outcome.failed, "✗", (g) => ` - ${g.error}`));
  if (outcome.failed.length === 0) lines.push("");

  lines.push(`Groups identified for deletion: ${classification.toDelete.length}`);
  lines.push(RULER);
  return lines;
}
