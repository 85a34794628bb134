import { CURSOR_MARKER } from "./prompt.ts";

/**
 * Strips all <think>...</think> sections from a text. Nested sections are
 * removed as a whole; an unterminated section is left in place.
 */
export function stripThinking(text: string): string {
  const openTag = "<think>";
  const closeTag = "</think>";

  let result = "";
  let i = 0;

  while (i < text.length) {
    const openIndex = text.indexOf(openTag, i);
    if (openIndex === -1) {
      result += text.substring(i);
      break;
    }
    result += text.substring(i, openIndex);

    let depth = 1;
    let j = openIndex + openTag.length;
    while (depth > 0) {
      const nextOpen = text.indexOf(openTag, j);
      const nextClose = text.indexOf(closeTag, j);
      if (nextClose === -1) {
        return result + text.substring(openIndex);
      }
      if (nextOpen !== -1 && nextOpen < nextClose) {
        depth++;
        j = nextOpen + openTag.length;
      } else {
        depth--;
        j = nextClose + closeTag.length;
      }
    }
    i = j;
  }

  return result;
}

const FENCE = /^\s*```[^\n]*\n([\s\S]*?)\n?```\s*$/;

/** Turn raw model output into text that can be inserted at the cursor. */
export function cleanCompletionText(raw: string): string {
  let text = stripThinking(raw);

  const fenced = FENCE.exec(text);
  if (fenced) {
    text = fenced[1] ?? "";
  }

  // models sometimes echo the marker they were shown
  if (text.startsWith(CURSOR_MARKER)) {
    text = text.slice(CURSOR_MARKER.length);
  }

  return text.trimEnd();
}
