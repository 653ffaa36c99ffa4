import type { Range, TextBuffer } from "./types";
import { SpannedText } from "./spanned";
import { applyReplace, clampRange, normalizeState, type BufferState } from "./state";

/** In-memory TextBuffer for hosts that do not own one. */
export class MemoryBuffer implements TextBuffer {
  private state: BufferState;

  constructor(text: SpannedText | string = "", cursor?: number) {
    this.state = normalizeState({ text, cursor });
  }

  get text(): SpannedText {
    return this.state.text;
  }

  toString(): string {
    return this.state.text.text;
  }

  read(range: Range): SpannedText {
    const r = clampRange(range, this.state.text.length);
    return this.state.text.slice(r.start, r.end);
  }

  replace(range: Range, text: SpannedText, cursor?: number): void {
    this.state = applyReplace(this.state, range, text, cursor);
  }

  length(): number {
    return this.state.text.length;
  }

  selectionEnd(): number {
    return this.state.cursor;
  }

  setSelection(cursor: number): void {
    this.state = normalizeState({ text: this.state.text, cursor });
  }

  setText(text: SpannedText | string, cursor?: number): void {
    this.state = normalizeState({ text, cursor });
  }
}
