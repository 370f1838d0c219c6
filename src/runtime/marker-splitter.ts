/**
 * Marker Splitter
 *
 * Separates a chunked text stream into visible text and hidden text
 * wrapped in an open/close marker pair (e.g. `<thinking>...</thinking>`).
 * Markers may be split across any number of chunks.
 *
 * The splitter starts in `detecting` mode and buffers until `lookahead`
 * characters have arrived (or the stream ends). Outside a marker it keeps
 * scanning for the open delimiter, holding back only a trailing fragment
 * that could still become one. Everything from an open marker on is held
 * until the close marker arrives. Visible text, once returned, is never
 * revised.
 */

import type { MarkerPair } from "../types/config";

export type SplitterMode = "detecting" | "inside" | "passthrough";

export interface MarkerSplitterOptions extends MarkerPair {
  /** Characters to buffer before deciding whether a marker opens the stream */
  lookahead: number;
}

export class MarkerSplitter {
  private readonly open: string;
  private readonly close: string;
  private readonly lookahead: number;
  private _mode: SplitterMode = "detecting";
  private pending = "";
  private hiddenBuffer = "";
  private resolvedHidden: string | undefined;

  constructor(options: MarkerSplitterOptions) {
    this.open = options.open;
    this.close = options.close;
    this.lookahead = options.lookahead;
  }

  /**
   * Feed the next chunk; returns the text now known to be visible
   */
  feed(chunk: string): string {
    if (!chunk) return "";

    switch (this._mode) {
      case "passthrough":
        this.pending += chunk;
        return this.scanOutside();

      case "inside":
        this.hiddenBuffer += chunk;
        return this.resolveInside();

      case "detecting":
        this.pending += chunk;
        if (this.pending.length < this.lookahead) return "";
        this._mode = "passthrough";
        return this.scanOutside();
    }
  }

  /**
   * Signal end of stream. Releases text still held back; an unclosed
   * marker's content is dropped.
   */
  end(): string {
    let visible = "";
    if (this._mode === "detecting") {
      this._mode = "passthrough";
      visible = this.scanOutside();
    }
    if (this._mode === "inside") {
      this.hiddenBuffer = "";
      this._mode = "passthrough";
    }
    visible += this.pending;
    this.pending = "";
    return visible;
  }

  reset(): void {
    this._mode = "detecting";
    this.pending = "";
    this.hiddenBuffer = "";
    this.resolvedHidden = undefined;
  }

  /**
   * Interior of the last complete marker pair, if any
   */
  get hiddenText(): string | undefined {
    return this.resolvedHidden;
  }

  get mode(): SplitterMode {
    return this._mode;
  }

  get insideMarker(): boolean {
    return this._mode === "inside";
  }

  private scanOutside(): string {
    const text = this.pending;
    this.pending = "";

    const start = text.indexOf(this.open);
    if (start === -1) {
      const held = partialSuffix(text, this.open);
      this.pending = text.slice(text.length - held);
      return text.slice(0, text.length - held);
    }

    this._mode = "inside";
    this.hiddenBuffer = text.slice(start);
    return text.slice(0, start) + this.resolveInside();
  }

  // hiddenBuffer always begins with the open marker here
  private resolveInside(): string {
    const closeAt = this.hiddenBuffer.indexOf(this.close, this.open.length);
    if (closeAt === -1) return "";

    this.resolvedHidden = this.hiddenBuffer.slice(this.open.length, closeAt);
    this.pending = this.hiddenBuffer.slice(closeAt + this.close.length);
    this.hiddenBuffer = "";
    this._mode = "passthrough";
    return this.scanOutside();
  }
}

/**
 * Length of the longest proper prefix of `marker` that `text` ends with
 */
function partialSuffix(text: string, marker: string): number {
  const longest = Math.min(marker.length - 1, text.length);
  for (let length = longest; length > 0; length--) {
    if (text.endsWith(marker.slice(0, length))) return length;
  }
  return 0;
}

export interface SplitText {
  visible: string;
  hidden?: string;
}

/**
 * Split a complete text in one pass. Complete pairs are removed from the
 * visible text (the last one's interior is returned as hidden); an
 * unclosed open marker hides everything after it.
 */
export function splitMarkedText(text: string, markers: MarkerPair): SplitText {
  let visible = "";
  let hidden: string | undefined;
  let rest = text;

  for (;;) {
    const start = rest.indexOf(markers.open);
    if (start === -1) {
      visible += rest;
      break;
    }
    visible += rest.slice(0, start);

    const closeAt = rest.indexOf(markers.close, start + markers.open.length);
    if (closeAt === -1) break;

    hidden = rest.slice(start + markers.open.length, closeAt);
    rest = rest.slice(closeAt + markers.close.length);
  }

  return hidden === undefined ? { visible } : { visible, hidden };
}
