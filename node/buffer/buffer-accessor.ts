/**
 * The narrow view of the host's text buffer. Offsets are UTF-16 code unit
 * indices into the whole document.
 *
 * The host owns the buffer and may mutate it between any two calls, so
 * callers must not hold on to anything read from it beyond one operation.
 */
export interface BufferAccessor {
  cursorOffset(): number;
  setCursorOffset(offset: number): void;
  /** up to `before` characters ending at the cursor and `after` starting at it */
  textAround(before: number, after: number): { before: string; after: string };
  insertAt(offset: number, text: string): void;
  removeRange(start: number, end: number): void;
  /** monotonic, bumped on every mutation of the text */
  version(): number;
}

/** Host support for rendering ghost text inside the buffer without touching its content. */
export interface OverlayHost {
  supportsOverlay(): boolean;
  showOverlay(offset: number, text: string): void;
  clearOverlay(): void;
}

/** Host support for a transient popup next to the cursor. */
export interface PopupHost {
  canShowPopup(): boolean;
  showPopup(offset: number, text: string): void;
  hidePopup(): void;
}
