import type { ReplacementMarker, TextBuffer } from "./types";
import { SpannedText } from "./spanned";

/**
 * True while the inserted text is still in place and the cursor sits right
 * after it, i.e. a backward delete now would undo the whole completion.
 */
export function canRevertReplacement(buffer: TextBuffer, marker: ReplacementMarker): boolean {
  if (buffer.selectionEnd() !== marker.end) return false;
  if (marker.end > buffer.length()) return false;
  return buffer.read({ start: marker.start, end: marker.end }).text === marker.inserted;
}

/** Puts back the text the completion replaced; returns false if the marker is stale. */
export function revertReplacement(buffer: TextBuffer, marker: ReplacementMarker): boolean {
  if (!canRevertReplacement(buffer, marker)) return false;
  buffer.replace(
    { start: marker.start, end: marker.end },
    SpannedText.of(marker.original),
    marker.start + marker.original.length
  );
  return true;
}
