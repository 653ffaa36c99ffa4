import type { Range, TextBuffer } from "@listedit/engine-core/src/types";
import type { SpannedText } from "@listedit/engine-core/src/spanned";
import { applyReplace, clampRange } from "@listedit/engine-core/src/state";

export type BufferSnapshot = {
  text: SpannedText;
  cursor: number;
  composing: Range | null;
};

export type BufferAccess = {
  get: () => BufferSnapshot;
  set: (next: BufferSnapshot) => void;
};

function shiftComposing(composing: Range | null, edit: Range, insertedLength: number): Range | null {
  if (!composing) return null;
  if (composing.end <= edit.start) return composing;
  if (composing.start >= edit.end) {
    const delta = insertedLength - (edit.end - edit.start);
    return { start: composing.start + delta, end: composing.end + delta };
  }
  return null;
}

/** TextBuffer view over the field store; every replace writes a new snapshot. */
export function createStoreBuffer(access: BufferAccess): TextBuffer {
  return {
    read(range) {
      const { text } = access.get();
      const r = clampRange(range, text.length);
      return text.slice(r.start, r.end);
    },
    replace(range, text, cursor) {
      const s = access.get();
      const r = clampRange(range, s.text.length);
      const next = applyReplace({ text: s.text, cursor: s.cursor }, r, text, cursor);
      access.set({ ...next, composing: shiftComposing(s.composing, r, text.length) });
    },
    length() {
      return access.get().text.length;
    },
    selectionEnd() {
      return access.get().cursor;
    },
    finishComposing() {
      const s = access.get();
      if (s.composing) access.set({ text: s.text, cursor: s.cursor, composing: null });
    }
  };
}
