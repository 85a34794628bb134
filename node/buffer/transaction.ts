import type { Logger } from "../logger.ts";
import type { BufferAccessor } from "./buffer-accessor.ts";

type UndoStep = { description: string; undo: () => void };

/**
 * Records the inverse of every edit made through it, so a failed operation
 * can put the buffer back exactly as it found it.
 */
export class BufferTransaction {
  private undoSteps: UndoStep[] = [];

  constructor(private buffer: BufferAccessor) {}

  insert(offset: number, text: string): void {
    this.buffer.insertAt(offset, text);
    this.undoSteps.push({
      description: `insert ${text.length} chars at ${offset}`,
      undo: () => this.buffer.removeRange(offset, offset + text.length),
    });
  }

  /** `removedText` must be the text currently occupying the range. */
  remove(start: number, removedText: string): void {
    this.buffer.removeRange(start, start + removedText.length);
    this.undoSteps.push({
      description: `remove ${removedText.length} chars at ${start}`,
      undo: () => this.buffer.insertAt(start, removedText),
    });
  }

  moveCursor(offset: number): void {
    const previous = this.buffer.cursorOffset();
    this.buffer.setCursorOffset(offset);
    this.undoSteps.push({
      description: `move cursor ${previous} -> ${offset}`,
      undo: () => this.buffer.setCursorOffset(previous),
    });
  }

  rollback(logger: Logger): void {
    let step = this.undoSteps.pop();
    while (step) {
      try {
        step.undo();
      } catch (error) {
        logger.error(`Failed to roll back "${step.description}":`, error);
      }
      step = this.undoSteps.pop();
    }
  }
}

export function runInTransaction<T>(
  buffer: BufferAccessor,
  logger: Logger,
  fn: (tx: BufferTransaction) => T,
): T {
  const tx = new BufferTransaction(buffer);
  try {
    return fn(tx);
  } catch (error) {
    tx.rollback(logger);
    throw error;
  }
}
