import { describe, expect, it } from "vitest";
import { buildCompletionPrompt } from "./prompt.ts";
import { makeRequest } from "../test/preamble.ts";

describe("buildCompletionPrompt", () => {
  it("marks the cursor inside the surrounding text", () => {
    const prompt = buildCompletionPrompt(
      makeRequest({ textBeforeCursor: "The cat sat on the ", textAfterCursor: "\nNext" }),
    );
    expect(prompt).toBe("Text around the cursor:\nThe cat sat on the │\nNext");
  });

  it("lists reference entries first", () => {
    const prompt = buildCompletionPrompt(
      makeRequest({
        textBeforeCursor: "Mira drew her ",
        references: ["Mira: a cartographer", "Vell: the northern city"],
      }),
    );
    expect(prompt).toBe(
      "Reference entries relevant to this document:\n" +
        "- Mira: a cartographer\n" +
        "- Vell: the northern city\n" +
        "\n" +
        "Text around the cursor:\n" +
        "Mira drew her │",
    );
  });

  it("notes explicit requests", () => {
    const prompt = buildCompletionPrompt(
      makeRequest({ textBeforeCursor: "Once", triggerKind: "manual" }),
    );
    expect(prompt).toBe(
      "Text around the cursor:\nOnce│\n\nThe author asked for this continuation explicitly.",
    );
  });
});
