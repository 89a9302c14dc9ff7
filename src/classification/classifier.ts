import type { GroupRecord } from "../enumeration/types";
import type { Logger } from "../logger";
import { compilePatterns, matchExclusion } from "./exclusions";

export interface KeptGroup extends GroupRecord {
  /** The exclusion pattern that matched first. */
  excludedBy: string;
}

export interface Classification {
  toDelete: GroupRecord[];
  toKeep: KeptGroup[];
}

/**
 * Partition the inventory into groups to delete and groups to keep.
 * Both lists preserve inventory order.
 */
export function classifyGroups(
  groups: readonly GroupRecord[],
  patterns: readonly string[],
  logger: Logger,
): Classification {
  const compiled = compilePatterns(patterns, logger);
  const toDelete: GroupRecord[] = [];
  const toKeep: KeptGroup[] = [];

  for (const group of groups) {
    const match = matchExclusion(group.name, compiled);
    if (match) {
      toKeep.push({ ...group, excludedBy: match.source });
    } else {
      toDelete.push(group);
    }
  }

  return { toDelete, toKeep };
}
