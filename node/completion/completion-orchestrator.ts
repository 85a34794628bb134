import type { Logger } from "../logger.ts";
import type { CompletionOptions } from "../options.ts";
import type {
  BufferAccessor,
  OverlayHost,
  PopupHost,
} from "../buffer/buffer-accessor.ts";
import type { CompletionProvider } from "../providers/provider-types.ts";
import { assertUnreachable } from "../utils/assertUnreachable.ts";
import { fail, type Result } from "../utils/result.ts";
import { createDisplayChannelChain } from "./display-channels.ts";
import {
  errorMessage,
  InvariantViolation,
  ProviderError,
  TimeoutExceeded,
} from "./errors.ts";
import { transition } from "./state-machine.ts";
import { SuggestionBuffer, type AcceptError } from "./suggestion-buffer.ts";
import { TimeoutEstimator } from "./timeout-estimator.ts";
import { shouldTrigger, type TriggerEvent } from "./trigger-policy.ts";
import type {
  CompletionMode,
  CompletionMsg,
  CompletionRequest,
  CompletionStatus,
  KeystrokeEvent,
  OrchestratorState,
  PendingSuggestion,
  ProviderResult,
  RequestSeq,
  TriggerKind,
} from "./types.ts";

export type StatusListener = (status: CompletionStatus) => void;

export type OrchestratorContext = {
  buffer: BufferAccessor;
  provider: CompletionProvider;
  options: CompletionOptions;
  logger: Logger;
  overlayHost?: OverlayHost | undefined;
  popupHost?: PopupHost | undefined;
  /** reference entries (glossary, codex) relevant to the text around the cursor */
  collectReferences?: ((before: string, after: string) => string[]) | undefined;
  now?: (() => number) | undefined;
};

type Timer = ReturnType<typeof setTimeout>;

/**
 * Decides when to ask the provider for a continuation, keeps at most one
 * request in flight, and resolves the resulting suggestion against the
 * buffer.
 *
 * Everything asynchronous (provider results, deadlines, debounce) comes back
 * through `update` as a message; nothing mutates state from a callback.
 */
export class CompletionOrchestrator {
  private state: OrchestratorState = { type: "idle" };
  private mode: CompletionMode;
  private lastSeq = 0;
  private lastKeystrokeAt: number | undefined;
  private status: CompletionStatus = { type: "idle" };
  private statusListeners = new Set<StatusListener>();
  private destroyed = false;

  private deadlineTimer: Timer | undefined;
  private debounceTimer: Timer | undefined;
  private followUpTimer: Timer | undefined;
  private errorStatusTimer: Timer | undefined;

  private estimator: TimeoutEstimator;
  private suggestions: SuggestionBuffer;
  private myDispatch: (msg: CompletionMsg) => void;

  constructor(private context: OrchestratorContext) {
    const { buffer, logger, options } = context;
    this.mode = options.mode;
    this.estimator = new TimeoutEstimator({
      logger,
      options: options.timeout,
      now: () => this.now(),
    });
    this.suggestions = new SuggestionBuffer({
      buffer,
      chain: createDisplayChannelChain({
        buffer,
        overlayHost: context.overlayHost,
        popupHost: context.popupHost,
        logger,
      }),
      logger,
      now: () => this.now(),
      minOverlap: options.minOverlapChars,
    });
    this.myDispatch = (msg) => this.update(msg);
  }

  update(msg: CompletionMsg): void {
    if (this.destroyed) {
      return;
    }

    switch (msg.type) {
      case "provider-result":
        this.onProviderResult(msg.seq, msg.result);
        return;
      case "deadline-elapsed":
        this.onTimeout(msg.seq);
        return;
      case "debounce-elapsed":
        this.debounceTimer = undefined;
        this.evaluate({ type: "debounce-elapsed", at: this.now() });
        return;
      case "follow-up-request":
        this.followUpTimer = undefined;
        this.request("auto");
        return;
      case "clear-error-status":
        this.errorStatusTimer = undefined;
        if (this.status.type === "error") {
          this.setStatus({ type: "idle" });
        }
        return;
      default:
        assertUnreachable(msg);
    }
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getMode(): CompletionMode {
    return this.mode;
  }

  getStatus(): CompletionStatus {
    return this.status;
  }

  getPendingSuggestion(): PendingSuggestion | undefined {
    return this.suggestions.getPending();
  }

  getTimeoutEstimator(): TimeoutEstimator {
    return this.estimator;
  }

  onStatus(listener: StatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  setMode(mode: CompletionMode): void {
    if (mode === this.mode) {
      return;
    }
    const previous = this.mode;
    this.mode = mode;
    this.context.logger.info(`Completion mode: ${previous} -> ${mode}`);

    if (mode !== "auto-assist") {
      this.clearTimer("debounceTimer");
      this.clearTimer("followUpTimer");
    }
    if (mode === "disabled") {
      this.cancel();
    }
  }

  /**
   * Start a request if the current state allows it. Returns whether a request
   * was issued.
   */
  request(kind: TriggerKind): boolean {
    const { buffer, logger, options } = this.context;

    if (this.destroyed) {
      return false;
    }
    if (this.mode === "disabled") {
      logger.debug(`Ignoring ${kind} request: completion disabled`);
      return false;
    }
    if (this.state.type !== "idle") {
      logger.debug(`Ignoring ${kind} request while ${this.state.type}`);
      return false;
    }
    if (kind === "auto" && this.mode === "manual-only") {
      logger.debug("Ignoring auto request in manual-only mode");
      return false;
    }

    this.suggestions.reject();
    this.clearTimer("followUpTimer");

    const around = buffer.textAround(
      options.contextCharsBefore,
      options.contextCharsAfter,
    );
    const request: CompletionRequest = {
      textBeforeCursor: around.before,
      textAfterCursor: around.after,
      cursorOffset: buffer.cursorOffset(),
      triggerKind: kind,
      issuedAt: this.now(),
      bufferVersion: buffer.version(),
      references: this.collectReferences(around.before, around.after),
    };
    const timeoutMs = this.estimator.estimate(request);

    this.lastSeq += 1;
    const seq = this.lastSeq as RequestSeq;
    this.state = transition(this.state, {
      type: "request",
      seq,
      request,
      timeoutMs,
    });
    logger.debug(
      `Request ${seq} (${kind}) at ${request.cursorOffset}, deadline ${Math.round(timeoutMs)}ms`,
    );
    this.setStatus({ type: "requesting", triggerKind: kind });

    this.deadlineTimer = setTimeout(() => {
      this.myDispatch({ type: "deadline-elapsed", seq });
    }, timeoutMs);
    this.callProvider(seq, request);
    return true;
  }

  accept(): Result<string, AcceptError> {
    if (!this.suggestions.hasPending()) {
      return fail("no pending suggestion", { kind: "no-suggestion" });
    }

    const result = this.suggestions.accept();
    this.setStatus({ type: "idle" });
    if (result.status === "error") {
      this.context.logger.debug(`Suggestion not accepted: ${result.error}`);
      return result;
    }

    const { continueAfterAcceptMs } = this.context.options;
    if (this.mode === "auto-assist" && continueAfterAcceptMs > 0) {
      this.clearTimer("followUpTimer");
      this.followUpTimer = setTimeout(() => {
        this.myDispatch({ type: "follow-up-request" });
      }, continueAfterAcceptMs);
    }
    return result;
  }

  reject(): void {
    if (!this.suggestions.hasPending()) {
      return;
    }
    this.suggestions.reject();
    this.setStatus({ type: "idle" });
  }

  /** Abandon the in-flight request, if any, and any pending suggestion. */
  cancel(): void {
    const previous = this.state;
    const next = transition(previous, { type: "cancel" });
    if (next !== previous) {
      this.clearTimer("deadlineTimer");
      this.state = next;
      this.context.logger.debug(
        `Cancelled request ${previous.type === "requesting" ? previous.seq : "?"}`,
      );
      this.state = transition(this.state, { type: "settle" });
    }

    this.suggestions.reject();
    if (this.status.type === "requesting" || this.status.type === "suggestion-ready") {
      this.setStatus({ type: "idle" });
    }
  }

  /** The host reports a keystroke after applying it to the buffer. */
  notifyKeystroke(event: KeystrokeEvent): void {
    if (this.destroyed) {
      return;
    }
    const at = this.now();
    this.lastKeystrokeAt = at;
    this.clearTimer("followUpTimer");

    this.evaluate({ type: "keystroke", key: event.key, text: event.text, at });

    if (this.suggestions.isStale()) {
      this.invalidate("buffer edited under the suggestion");
    }

    const isManualKey = this.context.options.manualTriggerKeys.includes(
      event.key,
    );
    if (this.mode === "auto-assist" && !isManualKey) {
      this.clearTimer("debounceTimer");
      this.debounceTimer = setTimeout(() => {
        this.myDispatch({ type: "debounce-elapsed" });
      }, this.context.options.debounceMs);
    }
  }

  notifyManualTrigger(): void {
    if (this.destroyed) {
      return;
    }
    this.evaluate({ type: "manual-trigger" });
  }

  /** Any edit the host did not report as a keystroke (paste, undo, formatting). */
  notifyBufferChanged(): void {
    if (this.suggestions.isStale()) {
      this.invalidate("buffer changed");
    }
  }

  notifyCursorMoved(): void {
    const pending = this.suggestions.getPending();
    if (
      pending &&
      this.context.buffer.cursorOffset() !== pending.anchorOffset
    ) {
      this.invalidate("cursor left the suggestion");
    }
  }

  destroy(): void {
    this.cancel();
    this.clearTimer("debounceTimer");
    this.clearTimer("followUpTimer");
    this.clearTimer("errorStatusTimer");
    this.statusListeners.clear();
    this.destroyed = true;
  }

  private evaluate(event: TriggerEvent): void {
    const around = this.context.buffer.textAround(
      this.context.options.contextCharsBefore,
      this.context.options.contextCharsAfter,
    );
    const decision = shouldTrigger(event, {
      mode: this.mode,
      requesting: this.state.type === "requesting",
      hasPending: this.suggestions.hasPending(),
      lastKeystrokeAt: this.lastKeystrokeAt,
      textBefore: around.before,
      textAfter: around.after,
      options: this.context.options,
    });

    switch (decision.type) {
      case "fire":
        this.request(decision.kind);
        return;
      case "invalidate":
        this.invalidate("keystroke");
        return;
      case "suppress":
        if (decision.reason !== "no-action") {
          this.context.logger.debug(
            `Suppressed ${event.type}: ${decision.reason}`,
          );
        }
        return;
      default:
        assertUnreachable(decision);
    }
  }

  private invalidate(reason: string): void {
    if (!this.suggestions.hasPending()) {
      return;
    }
    this.context.logger.debug(`Discarding suggestion: ${reason}`);
    this.suggestions.reject();
    if (this.status.type === "suggestion-ready") {
      this.setStatus({ type: "idle" });
    }
  }

  private callProvider(seq: RequestSeq, request: CompletionRequest): void {
    let pending: Promise<ProviderResult>;
    try {
      pending = this.context.provider.complete(request);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending
      .then(
        (result) => {
          this.myDispatch({ type: "provider-result", seq, result });
        },
        (error: unknown) => {
          this.myDispatch({
            type: "provider-result",
            seq,
            result: ProviderError.from(error).toResult(),
          });
        },
      )
      .catch((error: unknown) => {
        this.context.logger.error(
          `Error handling result of request ${seq}:`,
          error,
        );
      });
  }

  private onProviderResult(seq: RequestSeq, result: ProviderResult): void {
    const previous = this.state;
    if (previous.type !== "requesting" || previous.seq !== seq) {
      this.context.logger.debug(`Dropping stale result for request ${seq}`);
      return;
    }

    const durationMs = this.now() - previous.request.issuedAt;
    const next = transition(previous, {
      type: "result",
      seq,
      result,
      durationMs,
    });
    this.clearTimer("deadlineTimer");
    this.state = next;

    switch (next.type) {
      case "completed":
        this.estimator.record(durationMs, next.request, "success");
        this.state = transition(next, { type: "settle" });
        this.presentSuggestion(next.request, next.text);
        return;
      case "failed":
        this.estimator.record(durationMs, next.request, "failure");
        if (next.kind === "rate-limit") {
          this.context.logger.debug(`Request ${seq} rate limited: ${next.error}`);
        } else {
          this.context.logger.warn(
            `Request ${seq} failed (${next.kind}): ${next.error}`,
          );
        }
        this.state = transition(next, { type: "settle" });
        this.setErrorStatus("provider", next.error);
        return;
      default:
        throw new InvariantViolation(
          `provider result moved request ${seq} to ${next.type}`,
        );
    }
  }

  private onTimeout(seq: RequestSeq): void {
    const previous = this.state;
    if (previous.type !== "requesting" || previous.seq !== seq) {
      return;
    }

    this.deadlineTimer = undefined;
    const durationMs = this.now() - previous.request.issuedAt;
    this.state = transition(previous, { type: "timeout", seq, durationMs });
    this.estimator.record(durationMs, previous.request, "timeout");

    const error = new TimeoutExceeded(Math.round(previous.timeoutMs));
    this.context.logger.warn(`Request ${seq}: ${error.message}`);
    this.suggestions.reject();

    this.state = transition(this.state, { type: "settle" });
    this.setErrorStatus("timeout", error.message);
  }

  private presentSuggestion(request: CompletionRequest, text: string): void {
    const { buffer, logger } = this.context;
    const cursor = buffer.cursorOffset();

    // the cursor may only have advanced over text typed since the request
    const typedCount = cursor - request.cursorOffset;
    const unedited = buffer.version() === request.bufferVersion;
    if (typedCount < 0 || (unedited && typedCount !== 0)) {
      logger.debug(
        `Dropping suggestion: cursor moved from ${request.cursorOffset} to ${cursor}`,
      );
      this.setStatus({ type: "idle" });
      return;
    }

    let typedSince = "";
    if (!unedited) {
      const before = buffer.textAround(
        request.textBeforeCursor.length + typedCount,
        0,
      ).before;
      typedSince = before.slice(before.length - typedCount);
      if (before !== request.textBeforeCursor + typedSince) {
        logger.debug("Dropping suggestion: buffer diverged from it");
        this.setStatus({ type: "idle" });
        return;
      }
    }

    const shown = this.suggestions.show(text, cursor, typedSince);
    if (shown.status === "error") {
      if (shown.kind === "diverged") {
        logger.debug("Dropping suggestion: buffer diverged from it");
        this.setStatus({ type: "idle" });
        return;
      }
      this.setErrorStatus("provider", shown.error);
      return;
    }

    const pending = this.suggestions.getPending();
    if (shown.value.length === 0 || !pending) {
      this.setStatus({ type: "idle" });
      return;
    }
    this.setStatus({
      type: "suggestion-ready",
      text: pending.suggestedText,
      channel: pending.activeChannel,
    });
  }

  private setErrorStatus(kind: "provider" | "timeout", message: string): void {
    this.setStatus({ type: "error", kind, message });
    this.errorStatusTimer = setTimeout(() => {
      this.myDispatch({ type: "clear-error-status" });
    }, this.context.options.errorStatusMs);
  }

  private setStatus(status: CompletionStatus): void {
    this.clearTimer("errorStatusTimer");
    if (status.type === "idle" && this.status.type === "idle") {
      return;
    }
    this.status = status;
    for (const listener of this.statusListeners) {
      try {
        listener(status);
      } catch (error) {
        this.context.logger.warn("Status listener threw:", error);
      }
    }
  }

  private collectReferences(before: string, after: string): string[] {
    const { collectReferences } = this.context;
    if (!collectReferences) {
      return [];
    }
    try {
      return collectReferences(before, after);
    } catch (error) {
      this.context.logger.warn(
        `Failed to collect reference entries: ${errorMessage(error)}`,
      );
      return [];
    }
  }

  private clearTimer(
    name:
      | "deadlineTimer"
      | "debounceTimer"
      | "followUpTimer"
      | "errorStatusTimer",
  ): void {
    const timer = this[name];
    if (timer) {
      clearTimeout(timer);
      this[name] = undefined;
    }
  }

  private now(): number {
    return (this.context.now ?? Date.now)();
  }
}
