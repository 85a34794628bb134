import type { CompletionRequest } from "../completion/types.ts";

export const CURSOR_MARKER = "│";

export const COMPLETION_SYSTEM_PROMPT = `You are a writing assistant embedded in a text editor, continuing the author's text at the cursor position (marked with ${CURSOR_MARKER}).

Requirements:
- Provide ONLY the text that should be inserted at the cursor position
- Continue in the author's voice, tense and point of view
- Keep the continuation short: finish the current sentence, or add at most one more
- Do not repeat text that already appears before the cursor
- Do not wrap the answer in quotes or code fences, and do not explain it`;

export function buildCompletionPrompt(request: CompletionRequest): string {
  let prompt = "";

  if (request.references.length > 0) {
    prompt += `Reference entries relevant to this document:
${request.references.map((entry) => `- ${entry}`).join("\n")}

`;
  }

  prompt += `Text around the cursor:
${request.textBeforeCursor}${CURSOR_MARKER}${request.textAfterCursor}`;

  if (request.triggerKind === "manual") {
    prompt += `

The author asked for this continuation explicitly.`;
  }

  return prompt;
}
