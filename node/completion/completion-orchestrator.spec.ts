import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ProviderError } from "./errors.ts";
import { createHarness } from "../test/harness.ts";
import { flushMicrotasks } from "../test/preamble.ts";

describe("CompletionOrchestrator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("auto-assist walkthrough", () => {
    async function suggestMat(opts: { overlay?: boolean; popup?: boolean } = {}) {
      const h = createHarness({
        text: "The cat sat on the",
        options: { mode: "auto-assist" },
        ...opts,
      });
      h.type(" ");
      vi.advanceTimersByTime(300);

      expect(h.provider.requests.length).toBe(1);
      const { request } = h.provider.lastRequest();
      expect(request).toMatchObject({
        textBeforeCursor: "The cat sat on the ",
        textAfterCursor: "",
        cursorOffset: 19,
        triggerKind: "auto",
      });
      expect(h.orchestrator.getState().type).toBe("requesting");

      h.provider.lastRequest().respond("The cat sat on the mat.");
      await flushMicrotasks();
      return h;
    }

    it("fires after the debounce and shows only the missing text", async () => {
      const h = await suggestMat();

      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.orchestrator.getPendingSuggestion()).toMatchObject({
        anchorOffset: 19,
        suggestedText: "mat.",
        activeChannel: "overlay",
      });
      expect(h.overlayHost.shown).toEqual({ offset: 19, text: "mat." });
      expect(h.buffer.getText()).toBe("The cat sat on the ");
    });

    it("inserts the suggestion on accept", async () => {
      const h = await suggestMat();

      expect(h.orchestrator.accept()).toEqual({ status: "ok", value: "mat." });
      expect(h.buffer.getText()).toBe("The cat sat on the mat.");
      expect(h.buffer.cursorOffset()).toBe(23);
      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("publishes the status stream", async () => {
      const h = await suggestMat();
      h.orchestrator.accept();

      expect(h.statuses).toEqual([
        { type: "requesting", triggerKind: "auto" },
        { type: "suggestion-ready", text: "mat.", channel: "overlay" },
        { type: "idle" },
      ]);
    });

    it("drops the suggestion when the user keeps typing", async () => {
      const h = await suggestMat();
      h.type("x");

      expect(h.buffer.getText()).toBe("The cat sat on the x");
      expect(h.overlayHost.shown).toBeUndefined();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
    });

    it("removes literally inserted text when the user keeps typing", async () => {
      const h = await suggestMat({ overlay: false, popup: false });
      expect(h.buffer.getText()).toBe("The cat sat on the mat.");
      expect(h.buffer.cursorOffset()).toBe(19);

      h.type("x");
      expect(h.buffer.getText()).toBe("The cat sat on the x");
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("accepts a literally inserted suggestion", async () => {
      const h = await suggestMat({ overlay: false, popup: false });
      expect(h.orchestrator.getPendingSuggestion()?.activeChannel).toBe(
        "literal",
      );

      h.orchestrator.accept();
      expect(h.buffer.getText()).toBe("The cat sat on the mat.");
      expect(h.buffer.cursorOffset()).toBe(23);
    });

    it("falls back to the popup", async () => {
      const h = await suggestMat({ overlay: false });
      expect(h.popupHost.shown).toEqual({ offset: 19, text: "mat." });

      h.orchestrator.reject();
      expect(h.popupHost.shown).toBeUndefined();
    });

    it("requests a follow-up after an accept", async () => {
      const h = await suggestMat();
      h.orchestrator.accept();

      vi.advanceTimersByTime(499);
      expect(h.provider.requests.length).toBe(1);
      vi.advanceTimersByTime(1);
      expect(h.provider.requests.length).toBe(2);
      expect(h.provider.lastRequest().request).toMatchObject({
        textBeforeCursor: "The cat sat on the mat.",
        triggerKind: "auto",
      });
    });

    it("skips the follow-up when the user types first", async () => {
      const h = await suggestMat();
      h.orchestrator.accept();
      h.buffer.type(" ");
      h.orchestrator.notifyKeystroke({ key: "Enter", text: "" });

      vi.advanceTimersByTime(299);
      expect(h.provider.requests.length).toBe(1);
    });
  });

  describe("request lifecycle", () => {
    it("keeps at most one request in flight", () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.orchestrator.notifyManualTrigger();
      expect(h.orchestrator.request("manual")).toBe(false);
      expect(h.orchestrator.request("manual")).toBe(false);

      expect(h.provider.requests.length).toBe(1);
      expect(h.orchestrator.getState()).toMatchObject({
        type: "requesting",
        seq: 1,
      });
    });

    it("ignores the result of a cancelled request", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      const first = h.provider.lastRequest();
      h.orchestrator.cancel();
      expect(h.orchestrator.getState()).toEqual({ type: "idle" });

      h.orchestrator.notifyManualTrigger();
      const second = h.provider.lastRequest();

      first.respond("stale text");
      await flushMicrotasks();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.orchestrator.getState()).toMatchObject({
        type: "requesting",
        seq: 2,
      });

      second.respond("world");
      await flushMicrotasks();
      expect(h.orchestrator.getPendingSuggestion()?.suggestedText).toBe(
        "world",
      );
      expect(
        h.orchestrator
          .getTimeoutEstimator()
          .getHistory()
          .map((metric) => metric.outcome),
      ).toEqual(["success"]);
    });

    it("times out, records it and drops the late result", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();

      vi.advanceTimersByTime(16_400);
      expect(h.orchestrator.getState().type).toBe("requesting");
      vi.advanceTimersByTime(200);

      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.orchestrator.getStatus()).toEqual({
        type: "error",
        kind: "timeout",
        message: "Completion request exceeded its 16500ms deadline",
      });
      expect(
        h.orchestrator
          .getTimeoutEstimator()
          .getHistory()
          .map((metric) => metric.outcome),
      ).toEqual(["timeout"]);

      h.provider.lastRequest().respond("too late");
      await flushMicrotasks();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();

      vi.advanceTimersByTime(2000);
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
    });

    it("clears the deadline when the result arrives first", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("world");
      await flushMicrotasks();

      vi.advanceTimersByTime(60_000);
      expect(h.orchestrator.getStatus()).toEqual({
        type: "suggestion-ready",
        text: "world",
        channel: "overlay",
      });
    });

    it("reports provider failures and returns to idle", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().fail("network");
      await flushMicrotasks();

      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.statuses).toEqual([
        { type: "requesting", triggerKind: "manual" },
        { type: "error", kind: "provider", message: "mock network error" },
      ]);
      expect(
        h.orchestrator.getTimeoutEstimator().getHistory()[0]?.outcome,
      ).toBe("failure");
    });

    it("treats an empty completion as a failure", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("");
      await flushMicrotasks();

      expect(h.orchestrator.getStatus()).toMatchObject({
        type: "error",
        kind: "provider",
      });
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("absorbs a rejected provider promise", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().reject(new Error("fetch failed"));
      await flushMicrotasks();

      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.orchestrator.getStatus()).toEqual({
        type: "error",
        kind: "provider",
        message: "fetch failed",
      });
    });

    it("absorbs a provider that throws synchronously", async () => {
      const h = createHarness({ text: "Hello " });
      h.provider.throwOnNextCall = new Error("boom");
      h.orchestrator.notifyManualTrigger();
      expect(h.orchestrator.getState().type).toBe("requesting");

      await flushMicrotasks();
      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      expect(h.orchestrator.getStatus()).toMatchObject({
        type: "error",
        message: "boom",
      });
    });

    it("keeps the kind of a thrown provider error", async () => {
      const h = createHarness({ text: "Hello " });
      const debug = vi.spyOn(h.logger, "debug");
      h.provider.throwOnNextCall = new ProviderError("rate-limit", "slow down");
      h.orchestrator.notifyManualTrigger();
      await flushMicrotasks();

      expect(debug).toHaveBeenCalledWith("Request 1 rate limited: slow down");
      expect(h.orchestrator.getStatus()).toMatchObject({
        type: "error",
        message: "slow down",
      });
    });

    it("shows nothing when the suggestion was already typed", async () => {
      const h = createHarness({ text: "Hello" });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("Hello");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
      expect(
        h.orchestrator.getTimeoutEstimator().getHistory()[0]?.outcome,
      ).toBe("success");
    });

    it("accounts for text typed while the request was in flight", async () => {
      const h = createHarness({ text: "The cat sat on the " });
      h.orchestrator.notifyManualTrigger();
      h.type("m");
      h.provider.lastRequest().respond("The cat sat on the mat.");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toMatchObject({
        anchorOffset: 20,
        suggestedText: "at.",
      });
    });

    it("drops a suggestion the user has typed away from", async () => {
      const h = createHarness({ text: "The cat sat on the " });
      h.orchestrator.notifyManualTrigger();
      h.type("d");
      h.provider.lastRequest().respond("mat.");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
    });

    it("drops a result when the cursor moved away during the request", async () => {
      const h = createHarness({ text: "The cat sat on the " });
      h.orchestrator.notifyManualTrigger();
      h.buffer.setCursorOffset(4);
      h.orchestrator.notifyCursorMoved();
      h.provider.lastRequest().respond("mat.");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.overlayHost.shown).toBeUndefined();
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
      expect(h.orchestrator.accept()).toEqual({
        status: "error",
        error: "no pending suggestion",
        kind: "no-suggestion",
      });
      expect(h.buffer.getText()).toBe("The cat sat on the ");
    });

    it("drops a result when the cursor moved forward without typing", async () => {
      const h = createHarness({ text: "Hello world" });
      h.buffer.setCursorOffset(6);
      h.orchestrator.notifyManualTrigger();
      h.buffer.setCursorOffset(8);
      h.provider.lastRequest().respond("there");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
      expect(h.buffer.getText()).toBe("Hello world");
    });

    it("keeps a continuation that starts with the last typed character", async () => {
      const h = createHarness({ text: "She kept the book" });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("keeper's ledger.");
      await flushMicrotasks();

      expect(h.orchestrator.accept()).toEqual({
        status: "ok",
        value: "keeper's ledger.",
      });
      expect(h.buffer.getText()).toBe("She kept the bookkeeper's ledger.");
    });

    it("subtracts exactly the characters typed during the request", async () => {
      const h = createHarness({ text: "She kept the book" });
      h.orchestrator.notifyManualTrigger();
      h.type("k");
      h.provider.lastRequest().respond("keeper's ledger.");
      await flushMicrotasks();

      expect(h.orchestrator.getPendingSuggestion()).toMatchObject({
        anchorOffset: 18,
        suggestedText: "eeper's ledger.",
      });
      h.orchestrator.accept();
      expect(h.buffer.getText()).toBe("She kept the bookkeeper's ledger.");
    });

    it("snapshots the configured amount of context and the references", () => {
      const h = createHarness({
        text: "Hello world",
        options: { contextCharsBefore: 5 },
        collectReferences: (before) => [`entry for ${before}`],
      });
      h.buffer.setCursorOffset(8);
      h.orchestrator.notifyManualTrigger();

      expect(h.provider.lastRequest().request).toMatchObject({
        textBeforeCursor: "lo wo",
        textAfterCursor: "rld",
        cursorOffset: 8,
        references: ["entry for lo wo"],
      });
    });

    it("still requests when collecting references fails", () => {
      const h = createHarness({
        text: "Hello ",
        collectReferences: () => {
          throw new Error("index unavailable");
        },
      });
      h.orchestrator.notifyManualTrigger();
      expect(h.provider.lastRequest().request.references).toEqual([]);
    });
  });

  describe("modes", () => {
    it("ignores every trigger when disabled", () => {
      const h = createHarness({ text: "Hello ", options: { mode: "disabled" } });
      h.orchestrator.notifyManualTrigger();
      h.type("a");
      vi.advanceTimersByTime(1000);

      expect(h.orchestrator.request("manual")).toBe(false);
      expect(h.provider.requests.length).toBe(0);
    });

    it("never requests automatically in manual-only", () => {
      const h = createHarness({ text: "Hello" });
      h.type(" ");
      vi.advanceTimersByTime(1000);
      expect(h.orchestrator.request("auto")).toBe(false);
      expect(h.provider.requests.length).toBe(0);

      h.orchestrator.notifyKeystroke({ key: "Ctrl+Space", text: "" });
      expect(h.provider.lastRequest().request.triggerKind).toBe("manual");
    });

    it("restarts the debounce on every keystroke", () => {
      const h = createHarness({ text: "Hello", options: { mode: "auto-assist" } });
      h.type(" ");
      vi.advanceTimersByTime(200);
      h.type("w");
      vi.advanceTimersByTime(200);
      expect(h.provider.requests.length).toBe(0);

      h.type(" ");
      vi.advanceTimersByTime(300);
      expect(h.provider.requests.length).toBe(1);
    });

    it("does not fire automatically in the middle of a word", () => {
      const h = createHarness({ text: "Hello", options: { mode: "auto-assist" } });
      h.buffer.setCursorOffset(2);
      h.orchestrator.notifyKeystroke({ key: "Right", text: "" });
      vi.advanceTimersByTime(300);
      expect(h.provider.requests.length).toBe(0);
    });

    it("cancels everything when switched to disabled", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.orchestrator.setMode("disabled");

      expect(h.orchestrator.getMode()).toBe("disabled");
      expect(h.orchestrator.getState()).toEqual({ type: "idle" });
      h.provider.lastRequest().respond("world");
      await flushMicrotasks();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("discards a pending suggestion when switched to disabled", async () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("world");
      await flushMicrotasks();

      h.orchestrator.setMode("disabled");
      expect(h.overlayHost.shown).toBeUndefined();
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
    });

    it("cancels a pending debounce when leaving auto-assist", () => {
      const h = createHarness({ text: "Hello", options: { mode: "auto-assist" } });
      h.type(" ");
      h.orchestrator.setMode("manual-only");
      vi.advanceTimersByTime(300);
      expect(h.provider.requests.length).toBe(0);
    });
  });

  describe("pending suggestion", () => {
    async function withSuggestion() {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.notifyManualTrigger();
      h.provider.lastRequest().respond("world");
      await flushMicrotasks();
      expect(h.overlayHost.shown).toEqual({ offset: 6, text: "world" });
      return h;
    }

    it("is discarded when the buffer changes outside keystrokes", async () => {
      const h = await withSuggestion();
      h.buffer.insertAt(0, "# ");
      h.orchestrator.notifyBufferChanged();

      expect(h.overlayHost.shown).toBeUndefined();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("survives a buffer notification without changes", async () => {
      const h = await withSuggestion();
      h.orchestrator.notifyBufferChanged();
      expect(h.orchestrator.getPendingSuggestion()).toBeDefined();
    });

    it("is discarded when the cursor leaves the anchor", async () => {
      const h = await withSuggestion();
      h.buffer.setCursorOffset(0);
      h.orchestrator.notifyCursorMoved();
      expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    });

    it("is never force-inserted after an unreported edit", async () => {
      const h = await withSuggestion();
      h.buffer.insertAt(0, "# ");

      const result = h.orchestrator.accept();
      expect(result.status === "error" && result.kind).toBe("anchor-mismatch");
      expect(h.buffer.getText()).toBe("# Hello ");
      expect(h.overlayHost.shown).toBeUndefined();
    });

    it("is replaced by a new manual request", async () => {
      const h = await withSuggestion();
      h.orchestrator.notifyManualTrigger();

      expect(h.overlayHost.shown).toBeUndefined();
      expect(h.provider.requests.length).toBe(2);
    });

    it("rejects idempotently", async () => {
      const h = await withSuggestion();
      h.orchestrator.reject();
      h.orchestrator.reject();

      expect(h.buffer.getText()).toBe("Hello ");
      expect(h.overlayHost.clearCount).toBe(1);
      expect(h.statuses.at(-1)).toEqual({ type: "idle" });
    });

    it("reports accepting with nothing pending", () => {
      const h = createHarness({ text: "Hello " });
      const result = h.orchestrator.accept();
      expect(result.status === "error" && result.kind).toBe("no-suggestion");
    });
  });

  describe("status listeners", () => {
    it("stop receiving updates once unsubscribed", () => {
      const h = createHarness({ text: "Hello " });
      const seen: string[] = [];
      const unsubscribe = h.orchestrator.onStatus((status) =>
        seen.push(status.type),
      );
      h.orchestrator.notifyManualTrigger();
      unsubscribe();
      h.orchestrator.cancel();

      expect(seen).toEqual(["requesting"]);
      expect(h.orchestrator.getStatus()).toEqual({ type: "idle" });
    });

    it("do not break the orchestrator when they throw", () => {
      const h = createHarness({ text: "Hello " });
      h.orchestrator.onStatus(() => {
        throw new Error("listener bug");
      });
      h.orchestrator.notifyManualTrigger();
      expect(h.orchestrator.getState().type).toBe("requesting");
    });
  });

  it("leaves no timers or suggestions behind after destroy", async () => {
    const h = createHarness({ text: "Hello", options: { mode: "auto-assist" } });
    h.type(" ");
    vi.advanceTimersByTime(300);
    h.type("x");
    h.orchestrator.destroy();

    expect(vi.getTimerCount()).toBe(0);
    h.provider.lastRequest().respond("world");
    await flushMicrotasks();
    expect(h.orchestrator.getPendingSuggestion()).toBeUndefined();
    expect(h.orchestrator.request("manual")).toBe(false);
  });
});
