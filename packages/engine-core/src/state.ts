import type { Range } from "./types";
import { SpannedText } from "./spanned";

export type BufferState = {
  text: SpannedText;
  cursor: number;
};

export function normalizeState(input: { text?: SpannedText | string; cursor?: number }): BufferState {
  const text = SpannedText.from(input.text ?? "");
  const cursor = input.cursor ?? text.length;
  return { text, cursor: Math.max(0, Math.min(cursor, text.length)) };
}

export function clampRange(range: Range, length: number): Range {
  const start = Math.max(0, Math.min(range.start, length));
  return { start, end: Math.max(start, Math.min(range.end, length)) };
}

/** Cursor position after `[start, end)` was replaced by `insertedLength` characters. */
export function moveCursor(cursor: number, range: Range, insertedLength: number): number {
  if (cursor <= range.start) return cursor;
  if (cursor >= range.end) return cursor + insertedLength - (range.end - range.start);
  return range.start + insertedLength;
}

export function applyReplace(state: BufferState, range: Range, replacement: SpannedText, cursor?: number): BufferState {
  const r = clampRange(range, state.text.length);
  const text = state.text.replace(r, replacement);
  const next = cursor ?? moveCursor(state.cursor, r, replacement.length);
  return { text, cursor: Math.max(0, Math.min(next, text.length)) };
}
