import type { Classification } from "../classification/classifier";
import { renderPreview } from "../reporting/report";
import type { Prompter } from "./prompter";

export type GateDecision = "confirmed" | "rejected" | "auto-confirmed";

const YES = new Set(["y", "yes", "s", "sim"]);
const NO = new Set(["n", "no", "nao", "não"]);

export type Answer = "yes" | "no" | "invalid";

export function parseAnswer(raw: string): Answer {
  const answer = raw.trim().toLowerCase();
  if (YES.has(answer)) return "yes";
  if (NO.has(answer)) return "no";
  return "invalid";
}

export interface GateOptions {
  classification: Classification;
  dryRun: boolean;
  prompter: Prompter;
  write: (line: string) => void;
}

/**
 * Ask the operator to approve the deletion plan.
 *
 * Dry runs are approved without prompting. An empty plan is rejected
 * without prompting. End of input counts as a rejection.
 */
export async function confirmDeletion(options: GateOptions): Promise<GateDecision> {
  const { classification, dryRun, prompter, write } = options;

  if (dryRun) {
    write("");
    write("[DRY-RUN] Simulating deletion without actually deleting any group.");
    return "auto-confirmed";
  }

  if (classification.toDelete.length === 0) {
    return "rejected";
  }

  for (const line of renderPreview(classification)) write(line);

  write("");
  write("⚠️  WARNING: This operation is IRREVERSIBLE!");
  write(`You are about to delete ${classification.toDelete.length} resource group(s).`);
  write(`${classification.toKeep.length} group(s) will be kept.`);
  write("");

  for (;;) {
    const raw = await prompter.ask("Continue? (y/n): ");
    if (raw === null) {
      write("");
      write("No answer received. Operation cancelled.");
      return "rejected";
    }

    switch (parseAnswer(raw)) {
      case "yes":
        return "confirmed";
      case "no":
        write("Operation cancelled by user.");
        return "rejected";
      case "invalid":
        write("Invalid answer. Type 'y' for yes or 'n' for no.");
        break;
    }
  }
}
