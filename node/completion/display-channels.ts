import type { Logger } from "../logger.ts";
import type {
  BufferAccessor,
  OverlayHost,
  PopupHost,
} from "../buffer/buffer-accessor.ts";
import { ChannelUnavailable, errorMessage } from "./errors.ts";
import type { ChannelName } from "./types.ts";

export type Placement = Readonly<{ anchorOffset: number; text: string }>;

/**
 * A way of presenting a pending suggestion. `clear` must undo everything
 * `render` did to the host.
 */
export interface DisplayChannel {
  readonly name: ChannelName;
  /** false when render already put the text into the buffer */
  readonly insertsOnAccept: boolean;
  isAvailable(): boolean;
  render(placement: Placement): void;
  clear(placement: Placement): void;
}

export class GhostOverlayChannel implements DisplayChannel {
  readonly name = "overlay";
  readonly insertsOnAccept = true;

  constructor(private host: OverlayHost | undefined) {}

  isAvailable(): boolean {
    return this.host?.supportsOverlay() ?? false;
  }

  render(placement: Placement): void {
    if (!this.host) {
      throw new ChannelUnavailable(this.name, "no overlay host");
    }
    this.host.showOverlay(placement.anchorOffset, placement.text);
  }

  clear(): void {
    this.host?.clearOverlay();
  }
}

export class PopupChannel implements DisplayChannel {
  readonly name = "popup";
  readonly insertsOnAccept = true;

  constructor(private host: PopupHost | undefined) {}

  isAvailable(): boolean {
    return this.host?.canShowPopup() ?? false;
  }

  render(placement: Placement): void {
    if (!this.host) {
      throw new ChannelUnavailable(this.name, "no popup host");
    }
    this.host.showPopup(placement.anchorOffset, placement.text);
  }

  clear(): void {
    this.host?.hidePopup();
  }
}

/**
 * Last resort: writes the suggestion into the buffer after the cursor and
 * leaves the cursor at the anchor. Always available.
 */
export class LiteralInsertionChannel implements DisplayChannel {
  readonly name = "literal";
  readonly insertsOnAccept = false;
  private insertedAtVersion: number | undefined;

  constructor(
    private context: { buffer: BufferAccessor; logger: Logger },
  ) {}

  isAvailable(): boolean {
    return true;
  }

  render(placement: Placement): void {
    const { buffer } = this.context;
    buffer.insertAt(placement.anchorOffset, placement.text);
    try {
      buffer.setCursorOffset(placement.anchorOffset);
    } catch (error) {
      buffer.removeRange(
        placement.anchorOffset,
        placement.anchorOffset + placement.text.length,
      );
      throw error;
    }
    this.insertedAtVersion = buffer.version();
  }

  clear(placement: Placement): void {
    const { buffer, logger } = this.context;
    const insertedAtVersion = this.insertedAtVersion;
    this.insertedAtVersion = undefined;
    const length = placement.text.length;

    if (buffer.version() === insertedAtVersion) {
      buffer.removeRange(placement.anchorOffset, placement.anchorOffset + length);
      return;
    }

    // the user typed in front of the ghost text, so it now follows the cursor
    if (buffer.textAround(0, length).after === placement.text) {
      const cursor = buffer.cursorOffset();
      buffer.removeRange(cursor, cursor + length);
      return;
    }

    logger.warn(
      `Inserted suggestion text no longer found after the cursor, leaving the buffer as is`,
    );
  }
}

export type ChannelHandle = {
  id: number;
  channel: DisplayChannel;
  placement: Placement;
  active: boolean;
};

/** Tries each channel in priority order; the first that renders owns the suggestion. */
export class DisplayChannelChain {
  private nextHandleId = 1;

  constructor(
    private context: { channels: DisplayChannel[]; logger: Logger },
  ) {}

  activate(placement: Placement): ChannelHandle {
    const { logger } = this.context;
    for (const channel of this.context.channels) {
      let available: boolean;
      try {
        available = channel.isAvailable();
      } catch (error) {
        logger.warn(
          new ChannelUnavailable(channel.name, errorMessage(error)).message,
        );
        continue;
      }
      if (!available) {
        logger.debug(
          new ChannelUnavailable(channel.name, "precondition not met").message,
        );
        continue;
      }

      try {
        channel.render(placement);
      } catch (error) {
        logger.warn(
          new ChannelUnavailable(channel.name, errorMessage(error)).message,
        );
        continue;
      }

      logger.debug(
        `Suggestion rendered through ${channel.name} at ${placement.anchorOffset}`,
      );
      return {
        id: this.nextHandleId++,
        channel,
        placement,
        active: true,
      };
    }

    throw new ChannelUnavailable(
      "literal",
      "every display channel failed to render the suggestion",
    );
  }

  /** Undo the channel's presentation. Calling it again does nothing. */
  deactivate(handle: ChannelHandle): void {
    if (!handle.active) {
      return;
    }
    handle.active = false;
    handle.channel.clear(handle.placement);
  }

  /** Hand the presentation over to the buffer without undoing it. */
  release(handle: ChannelHandle): void {
    handle.active = false;
  }
}

export function createDisplayChannelChain(context: {
  buffer: BufferAccessor;
  overlayHost?: OverlayHost | undefined;
  popupHost?: PopupHost | undefined;
  logger: Logger;
}): DisplayChannelChain {
  return new DisplayChannelChain({
    channels: [
      new GhostOverlayChannel(context.overlayHost),
      new PopupChannel(context.popupHost),
      new LiteralInsertionChannel({
        buffer: context.buffer,
        logger: context.logger,
      }),
    ],
    logger: context.logger,
  });
}
