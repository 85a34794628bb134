import { fail, type ResultError } from "../utils/result.ts";
import type { ChannelName, ProviderErrorKind } from "./types.ts";

export class ProviderError extends Error {
  constructor(
    public kind: ProviderErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ProviderError";
  }

  /** Wrap anything a provider threw, classifying it unless it already is one. */
  static from(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    return new ProviderError(classifyProviderError(error), errorMessage(error));
  }

  toResult(): ResultError<{ kind: ProviderErrorKind }> {
    return fail(this.message, { kind: this.kind });
  }
}

export class TimeoutExceeded extends Error {
  constructor(public timeoutMs: number) {
    super(`Completion request exceeded its ${timeoutMs}ms deadline`);
    this.name = "TimeoutExceeded";
  }
}

export class AnchorMismatch extends Error {
  constructor(
    public expected: { offset: number; version: number },
    public actual: { offset: number; version: number },
  ) {
    super(
      `Buffer changed under pending suggestion (anchor ${expected.offset}@v${expected.version}, now ${actual.offset}@v${actual.version})`,
    );
    this.name = "AnchorMismatch";
  }
}

export class ChannelUnavailable extends Error {
  constructor(
    public channel: ChannelName,
    reason: string,
  ) {
    super(`Display channel ${channel} unavailable: ${reason}`);
    this.name = "ChannelUnavailable";
  }
}

/** Programming error. Never absorbed; callers let it propagate. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolation";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Map a thrown provider failure onto a ProviderErrorKind. */
export function classifyProviderError(error: unknown): ProviderErrorKind {
  if (error instanceof ProviderError) {
    return error.kind;
  }
  if (typeof error === "object" && error !== null && "status" in error) {
    if (error.status === 401 || error.status === 403) {
      return "authentication";
    }
    if (error.status === 429) {
      return "rate-limit";
    }
  }

  const message = errorMessage(error).toLowerCase();
  if (
    message.includes("network") ||
    message.includes("fetch") ||
    message.includes("connection") ||
    message.includes("econnrefused")
  ) {
    return "network";
  }
  if (message.includes("api key") || message.includes("authentication")) {
    return "authentication";
  }
  if (message.includes("rate limit")) {
    return "rate-limit";
  }
  return "unknown";
}
