import type { CompletionOptions, ProgrammaticEditOptions } from "../options.ts";
import type { CompletionMode, TriggerKind } from "./types.ts";

export type TriggerEvent =
  | { type: "keystroke"; key: string; text: string; at: number }
  | { type: "manual-trigger" }
  | { type: "debounce-elapsed"; at: number };

export type TriggerContext = {
  mode: CompletionMode;
  requesting: boolean;
  hasPending: boolean;
  lastKeystrokeAt: number | undefined;
  textBefore: string;
  textAfter: string;
  options: Pick<
    CompletionOptions,
    "debounceMs" | "manualTriggerKeys" | "programmaticEdit"
  >;
};

export type SuppressReason =
  | "disabled"
  | "programmatic-edit"
  | "requesting"
  | "not-auto-assist"
  | "debouncing"
  | "suggestion-pending"
  | "no-trigger-context"
  | "no-action";

export type TriggerDecision =
  | { type: "fire"; kind: TriggerKind }
  | { type: "suppress"; reason: SuppressReason }
  | { type: "invalidate" };

export function shouldTrigger(
  event: TriggerEvent,
  context: TriggerContext,
): TriggerDecision {
  const { options } = context;
  if (context.mode === "disabled") {
    return { type: "suppress", reason: "disabled" };
  }

  const isManual =
    event.type === "manual-trigger" ||
    (event.type === "keystroke" && options.manualTriggerKeys.includes(event.key));

  if (
    !isManual &&
    isProgrammaticEdit(
      context.textBefore,
      context.textAfter,
      options.programmaticEdit,
    )
  ) {
    return { type: "suppress", reason: "programmatic-edit" };
  }

  if (context.requesting) {
    return { type: "suppress", reason: "requesting" };
  }

  if (isManual) {
    return { type: "fire", kind: "manual" };
  }

  if (event.type === "debounce-elapsed") {
    if (context.mode !== "auto-assist") {
      return { type: "suppress", reason: "not-auto-assist" };
    }
    if (
      context.lastKeystrokeAt == undefined ||
      event.at - context.lastKeystrokeAt < options.debounceMs
    ) {
      return { type: "suppress", reason: "debouncing" };
    }
    if (context.hasPending) {
      return { type: "suppress", reason: "suggestion-pending" };
    }
    if (!isTriggerContext(context.textBefore, context.textAfter)) {
      return { type: "suppress", reason: "no-trigger-context" };
    }
    return { type: "fire", kind: "auto" };
  }

  if (event.type === "keystroke" && event.text.length > 0 && context.hasPending) {
    return { type: "invalidate" };
  }

  return { type: "suppress", reason: "no-action" };
}

/**
 * Heuristic for text that was generated rather than typed: one printable
 * character dominating the window around the cursor (pasted rulers, key
 * repeat, macro output).
 */
export function isProgrammaticEdit(
  textBefore: string,
  textAfter: string,
  options: ProgrammaticEditOptions,
): boolean {
  const window =
    (options.lookbehind > 0 ? textBefore.slice(-options.lookbehind) : "") +
    textAfter.slice(0, options.lookahead);
  if (window.length <= options.minWindow) {
    return false;
  }

  const counts = new Map<string, number>();
  let mostFrequent = 0;
  for (const char of window) {
    if (/\s/.test(char) || char < " ") {
      continue;
    }
    const count = (counts.get(char) ?? 0) + 1;
    counts.set(char, count);
    mostFrequent = Math.max(mostFrequent, count);
  }

  return mostFrequent / window.length > options.threshold;
}

/** Non-blank text before the cursor and the cursor not inside a word. */
export function isTriggerContext(textBefore: string, textAfter: string): boolean {
  return textBefore.trim().length > 0 && (textAfter.length === 0 || /^\s/.test(textAfter));
}
