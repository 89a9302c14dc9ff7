export type PurgeErrorKind = "tool-unavailable" | "not-authenticated" | "listing-failure";

/**
 * Base error for the purge pipeline. `tool-unavailable` and
 * `not-authenticated` are thrown; listing failures are collected into results.
 * Invalid patterns are warnings and delete failures are `FailedGroup` entries.
 */
export class PurgeError extends Error {
  readonly kind: PurgeErrorKind;

  constructor(kind: PurgeErrorKind, message: string) {
    super(message);
    this.name = "PurgeError";
    this.kind = kind;
  }
}

export class ToolUnavailableError extends PurgeError {
  constructor(detail: string) {
    super("tool-unavailable", `Azure CLI is not installed or not accessible: ${detail}`);
    this.name = "ToolUnavailableError";
  }
}

export class NotAuthenticatedError extends PurgeError {
  constructor(detail: string) {
    super("not-authenticated", `Not authenticated with Azure. Run: az login (${detail})`);
    this.name = "NotAuthenticatedError";
  }
}

export class ListingError extends PurgeError {
  readonly subscriptionId?: string;

  constructor(message: string, subscriptionId?: string) {
    super("listing-failure", message);
    this.name = "ListingError";
    this.subscriptionId = subscriptionId;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
