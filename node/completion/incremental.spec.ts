import { describe, expect, it } from "vitest";
import { computeRemainder, typedOverlap } from "./incremental.ts";

describe("computeRemainder", () => {
  it("drops the part of the suggestion that was already typed", () => {
    expect(computeRemainder("The cat sat on the ", "The cat sat on the mat.")).toBe(
      "mat.",
    );
  });

  it("handles text typed after the request was issued", () => {
    expect(computeRemainder("The cat sat on the m", "the mat.")).toBe("at.");
  });

  it("returns the whole suggestion when nothing overlaps", () => {
    expect(computeRemainder("Hello ", "world")).toBe("world");
    expect(computeRemainder("", "world")).toBe("world");
  });

  it("returns an empty remainder when everything was typed", () => {
    expect(computeRemainder("it was a dark night", "dark night")).toBe("");
  });

  it("prefers the longest overlap", () => {
    // "aa" and "a" are both suffixes of the typed text
    expect(typedOverlap("baa", "aab")).toBe(2);
    expect(computeRemainder("baa", "aab")).toBe("b");
  });

  it("keeps a continuation that only shares a short run with the typed text", () => {
    expect(typedOverlap("She kept the book", "keeper's ledger.", 5)).toBe(0);
    expect(computeRemainder("She kept the book", "keeper's ledger.", 5)).toBe(
      "keeper's ledger.",
    );
  });

  it("still strips a repeat at least as long as the minimum", () => {
    expect(computeRemainder("The cat sat on the m", "the mat.", 5)).toBe("at.");
    expect(computeRemainder("Hello, dear", "dear friend", 5)).toBe("dear friend");
    expect(computeRemainder("Hello, dear", "dear friend", 4)).toBe(" friend");
  });
});
