import type { BufferAccessor } from "./buffer-accessor.ts";

/**
 * In-memory buffer. Serves as the reference host for the orchestrator and as
 * the stand-in editor in tests.
 */
export class TextBuffer implements BufferAccessor {
  private text: string;
  private cursor: number;
  private revision = 0;

  constructor(initialText = "", cursor?: number) {
    this.text = initialText;
    this.cursor = cursor ?? initialText.length;
    this.assertOffset(this.cursor);
  }

  getText(): string {
    return this.text;
  }

  cursorOffset(): number {
    return this.cursor;
  }

  setCursorOffset(offset: number): void {
    this.assertOffset(offset);
    this.cursor = offset;
  }

  textAround(before: number, after: number): { before: string; after: string } {
    return {
      before: this.text.slice(Math.max(0, this.cursor - before), this.cursor),
      after: this.text.slice(this.cursor, this.cursor + after),
    };
  }

  insertAt(offset: number, text: string): void {
    this.assertOffset(offset);
    if (text.length === 0) {
      return;
    }
    this.text = this.text.slice(0, offset) + text + this.text.slice(offset);
    if (this.cursor >= offset) {
      this.cursor += text.length;
    }
    this.revision += 1;
  }

  removeRange(start: number, end: number): void {
    this.assertOffset(start);
    this.assertOffset(end);
    if (end < start) {
      throw new Error(`Invalid range ${start}-${end}`);
    }
    if (end === start) {
      return;
    }
    this.text = this.text.slice(0, start) + this.text.slice(end);
    if (this.cursor >= end) {
      this.cursor -= end - start;
    } else if (this.cursor > start) {
      this.cursor = start;
    }
    this.revision += 1;
  }

  version(): number {
    return this.revision;
  }

  /** Simulates the user typing at the cursor. */
  type(text: string): void {
    this.insertAt(this.cursor, text);
  }

  /** Simulates a backspace at the cursor. */
  backspace(count = 1): void {
    const start = Math.max(0, this.cursor - count);
    this.removeRange(start, this.cursor);
  }

  private assertOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.text.length) {
      throw new RangeError(
        `Offset ${offset} outside buffer of length ${this.text.length}`,
      );
    }
  }
}
