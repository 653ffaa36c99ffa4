import type { Range, Span } from "./types";
import { EngineError } from "./errors";

function clamp(n: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(n, hi));
}

function spliceText(text: string, start: number, end: number, insert: string): string {
  return text.substring(0, start) + insert + text.substring(end);
}

function bySpanOrder(a: Span, b: Span): number {
  return a.start - b.start || a.end - b.end;
}

/**
 * Immutable text with formatting spans. Every edit returns a new value; the
 * spans of the receiver are never touched.
 */
export class SpannedText {
  readonly text: string;
  readonly spans: readonly Span[];

  private constructor(text: string, spans: readonly Span[]) {
    this.text = text;
    this.spans = spans;
  }

  static of(text: string, spans: readonly Span[] = []): SpannedText {
    for (const s of spans) {
      if (s.start < 0 || s.end < s.start || s.end > text.length) {
        throw EngineError.invalidSpan(s.start, s.end, text.length);
      }
    }
    return new SpannedText(text, spans.map((s) => ({ ...s })).sort(bySpanOrder));
  }

  static from(value: SpannedText | string): SpannedText {
    return typeof value === "string" ? SpannedText.of(value) : value;
  }

  get length(): number {
    return this.text.length;
  }

  toString(): string {
    return this.text;
  }

  /** Spans are clipped to the slice and re-based at 0; empty leftovers are dropped. */
  slice(start: number, end: number = this.text.length): SpannedText {
    const s0 = clamp(start, 0, this.text.length);
    const e0 = clamp(end, s0, this.text.length);
    const spans: Span[] = [];
    for (const s of this.spans) {
      const ns = Math.max(s.start, s0);
      const ne = Math.min(s.end, e0);
      if (ns < ne) spans.push({ start: ns - s0, end: ne - s0, attributes: s.attributes });
    }
    return new SpannedText(this.text.slice(s0, e0), spans);
  }

  /** Appended characters carry no spans. */
  append(suffix: string): SpannedText {
    return new SpannedText(this.text + suffix, this.spans);
  }

  replace(range: Range, replacement: SpannedText | string): SpannedText {
    const start = clamp(range.start, 0, this.text.length);
    const end = clamp(range.end, start, this.text.length);
    const insert = SpannedText.from(replacement);
    const delta = insert.length - (end - start);
    const spans: Span[] = [];

    for (const s of this.spans) {
      if (s.end <= start) {
        spans.push(s);
        continue;
      }
      if (s.start >= end) {
        spans.push({ start: s.start + delta, end: s.end + delta, attributes: s.attributes });
        continue;
      }
      // Overlaps the replaced range: keep only what lies outside it.
      if (s.start < start) spans.push({ start: s.start, end: start, attributes: s.attributes });
      if (s.end > end) spans.push({ start: end + delta, end: s.end + delta, attributes: s.attributes });
    }
    for (const s of insert.spans) {
      spans.push({ start: s.start + start, end: s.end + start, attributes: s.attributes });
    }

    return new SpannedText(spliceText(this.text, start, end, insert.text), spans.sort(bySpanOrder));
  }
}
