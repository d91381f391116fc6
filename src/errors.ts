// CHANGE: Typed crawl errors carrying a machine-readable code.
// WHY: Callers branch on the failure kind without parsing messages.

export type CrawlErrorCode = "state_corrupt" | "listing_unavailable";

export function toErrorMessage(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return String(reason);
}

function causeOf(reason: unknown): unknown {
  if (reason instanceof Error) {
    return reason.cause ?? reason;
  }
  return reason;
}

export class CrawlError extends Error {
  readonly code: CrawlErrorCode;
  readonly cause?: unknown;

  constructor(args: { code: CrawlErrorCode; message: string; cause?: unknown }) {
    super(args.message);
    this.name = "CrawlError";
    this.code = args.code;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The persisted state exists but cannot be read as a crawl state. Fatal for the run.
 */
export class StateCorruptError extends CrawlError {
  readonly path: string;

  constructor(path: string, reason: unknown) {
    super({
      code: "state_corrupt",
      message: `State file ${path} is unreadable: ${toErrorMessage(reason)}`,
      cause: causeOf(reason)
    });
    this.name = "StateCorruptError";
    this.path = path;
  }
}

/**
 * The full identifier listing could not be fetched. The scanner falls back to its cached ordering.
 */
export class ListingUnavailableError extends CrawlError {
  constructor(reason: unknown) {
    super({
      code: "listing_unavailable",
      message: `Identifier listing unavailable: ${toErrorMessage(reason)}`,
      cause: causeOf(reason)
    });
    this.name = "ListingUnavailableError";
  }
}
