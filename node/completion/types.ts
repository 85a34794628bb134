import type { Result } from "../utils/result.ts";

export type CompletionMode = "disabled" | "manual-only" | "auto-assist";

export const COMPLETION_MODES: ReadonlyArray<CompletionMode> = [
  "disabled",
  "manual-only",
  "auto-assist",
];

export type TriggerKind = "manual" | "auto";

export type CompletionRequest = Readonly<{
  textBeforeCursor: string;
  textAfterCursor: string;
  cursorOffset: number;
  triggerKind: TriggerKind;
  issuedAt: number;
  /** buffer version at the moment the snapshot was taken */
  bufferVersion: number;
  /** injected reference entries (glossary / codex snippets) */
  references: ReadonlyArray<string>;
}>;

export type ProviderErrorKind =
  | "network"
  | "authentication"
  | "rate-limit"
  | "empty-completion"
  | "unknown";

export type ProviderResult = Result<string, { kind: ProviderErrorKind }>;

export type RequestOutcome = "success" | "failure" | "timeout";

export type RequestMetric = {
  durationMs: number;
  complexityScore: number;
  succeeded: boolean;
  outcome: RequestOutcome;
  timestamp: number;
};

export type ChannelName = "overlay" | "popup" | "literal";

export type PendingSuggestion = Readonly<{
  anchorOffset: number;
  suggestedText: string;
  activeChannel: ChannelName;
  createdAt: number;
}>;

export type RequestSeq = number & { __requestSeq: true };

export type OrchestratorState =
  | { type: "idle" }
  | {
      type: "requesting";
      seq: RequestSeq;
      request: CompletionRequest;
      timeoutMs: number;
    }
  | {
      type: "completed";
      seq: RequestSeq;
      request: CompletionRequest;
      text: string;
      durationMs: number;
    }
  | {
      type: "failed";
      seq: RequestSeq;
      request: CompletionRequest;
      error: string;
      kind: ProviderErrorKind;
      durationMs: number;
    }
  | {
      type: "timed-out";
      seq: RequestSeq;
      request: CompletionRequest;
      durationMs: number;
    }
  | { type: "cancelled"; seq: RequestSeq; request: CompletionRequest };

export type CompletionStatus =
  | { type: "idle" }
  | { type: "requesting"; triggerKind: TriggerKind }
  | { type: "suggestion-ready"; text: string; channel: ChannelName }
  | { type: "error"; kind: "provider" | "timeout"; message: string };

export type KeystrokeEvent = {
  /** key name as reported by the host, e.g. "a", "Backspace", "Ctrl+Space" */
  key: string;
  /** text the keystroke inserted, empty for non-printing keys */
  text: string;
};

/** Messages delivered back onto the orchestrator from timers and the provider. */
export type CompletionMsg =
  | { type: "provider-result"; seq: RequestSeq; result: ProviderResult }
  | { type: "deadline-elapsed"; seq: RequestSeq }
  | { type: "debounce-elapsed" }
  | { type: "follow-up-request" }
  | { type: "clear-error-status" };
