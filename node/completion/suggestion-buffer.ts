import type { Logger } from "../logger.ts";
import type { BufferAccessor } from "../buffer/buffer-accessor.ts";
import { runInTransaction } from "../buffer/transaction.ts";
import { fail, ok, type Result } from "../utils/result.ts";
import type { ChannelHandle, DisplayChannelChain } from "./display-channels.ts";
import {
  AnchorMismatch,
  ChannelUnavailable,
  InvariantViolation,
  errorMessage,
} from "./errors.ts";
import { computeRemainder } from "./incremental.ts";
import type { PendingSuggestion } from "./types.ts";

export type ShowError = { kind: "anchor-mismatch" | "diverged" | "no-channel" };
export type AcceptError = {
  kind: "no-suggestion" | "anchor-mismatch" | "buffer-error";
};

type Pending = {
  suggestion: PendingSuggestion;
  handle: ChannelHandle;
  /** buffer version right after the channel rendered */
  expectedVersion: number;
};

/**
 * Owns the single pending suggestion and every buffer edit made on its behalf.
 */
export class SuggestionBuffer {
  private pending: Pending | undefined;

  constructor(
    private context: {
      buffer: BufferAccessor;
      chain: DisplayChannelChain;
      logger: Logger;
      now: () => number;
      /** shortest repeat of the typed text stripped from a suggestion */
      minOverlap: number;
    },
  ) {}

  getPending(): PendingSuggestion | undefined {
    return this.pending?.suggestion;
  }

  hasPending(): boolean {
    return this.pending != undefined;
  }

  /** True when the buffer was edited by someone else since the suggestion was shown. */
  isStale(): boolean {
    return (
      this.pending != undefined &&
      this.context.buffer.version() !== this.pending.expectedVersion
    );
  }

  /**
   * Present `text` at `anchor`, minus whatever part of it the user already
   * typed. `typedSince` is text the user typed in front of `anchor` after
   * `text` was requested; it is subtracted exactly and must agree with the
   * suggestion. Returns the remainder that is now showing; empty when there
   * was nothing left to suggest.
   */
  show(
    text: string,
    anchor: number,
    typedSince = "",
  ): Result<string, ShowError> {
    if (this.pending) {
      throw new InvariantViolation(
        "a suggestion is already pending at " + this.pending.suggestion.anchorOffset,
      );
    }

    const { buffer, chain, logger } = this.context;
    const cursor = buffer.cursorOffset();
    if (cursor !== anchor) {
      logger.debug(
        `Not showing suggestion: anchor ${anchor} is not the cursor ${cursor}`,
      );
      return fail(`anchor ${anchor} is not the cursor ${cursor}`, {
        kind: "anchor-mismatch",
      });
    }

    const before = buffer.textAround(text.length + typedSince.length, 0).before;
    const requestedAt = before.slice(0, before.length - typedSince.length);
    const continuation = computeRemainder(
      requestedAt,
      text,
      this.context.minOverlap,
    );
    if (!before.endsWith(typedSince) || !continuation.startsWith(typedSince)) {
      logger.debug("Not showing suggestion: text typed since disagrees with it");
      return fail("text typed since the request disagrees with the suggestion", {
        kind: "diverged",
      });
    }
    const remainder = continuation.slice(typedSince.length);
    if (remainder.length === 0) {
      logger.debug("Suggestion was already typed in full");
      return ok("");
    }

    let handle: ChannelHandle;
    try {
      handle = chain.activate({ anchorOffset: anchor, text: remainder });
    } catch (error) {
      if (error instanceof ChannelUnavailable) {
        logger.warn(error.message);
        return fail(error.message, { kind: "no-channel" });
      }
      throw error;
    }

    this.pending = {
      suggestion: {
        anchorOffset: anchor,
        suggestedText: remainder,
        activeChannel: handle.channel.name,
        createdAt: this.context.now(),
      },
      handle,
      expectedVersion: buffer.version(),
    };
    return ok(remainder);
  }

  /** Commit the pending suggestion into the buffer. Returns the inserted text. */
  accept(): Result<string, AcceptError> {
    const pending = this.pending;
    if (!pending) {
      return fail("no pending suggestion", { kind: "no-suggestion" });
    }

    const { buffer, chain, logger } = this.context;
    const { anchorOffset, suggestedText } = pending.suggestion;
    const actual = { offset: buffer.cursorOffset(), version: buffer.version() };
    if (
      actual.version !== pending.expectedVersion ||
      actual.offset !== anchorOffset
    ) {
      const mismatch = new AnchorMismatch(
        { offset: anchorOffset, version: pending.expectedVersion },
        actual,
      );
      logger.debug(mismatch.message);
      this.reject();
      return fail(mismatch.message, { kind: "anchor-mismatch" });
    }

    this.pending = undefined;
    const { handle } = pending;
    try {
      runInTransaction(buffer, logger, (tx) => {
        if (handle.channel.insertsOnAccept) {
          chain.deactivate(handle);
          tx.insert(anchorOffset, suggestedText);
        }
        tx.moveCursor(anchorOffset + suggestedText.length);
        chain.release(handle);
      });
    } catch (error) {
      logger.warn(`Failed to accept suggestion: ${errorMessage(error)}`);
      this.deactivateQuietly(handle);
      return fail(errorMessage(error), { kind: "buffer-error" });
    }

    logger.debug(
      `Accepted ${suggestedText.length} chars through ${handle.channel.name}`,
    );
    return ok(suggestedText);
  }

  /** Remove the pending suggestion without a trace. Safe to call repeatedly. */
  reject(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = undefined;
    this.deactivateQuietly(pending.handle);
  }

  private deactivateQuietly(handle: ChannelHandle): void {
    try {
      this.context.chain.deactivate(handle);
    } catch (error) {
      this.context.logger.warn(
        `Failed to clear ${handle.channel.name} suggestion: ${errorMessage(error)}`,
      );
    }
  }
}
