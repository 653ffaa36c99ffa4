import type { FilterDecision, Range, Tokenizer } from "./types";

export function enoughToFilter(tokenizer: Tokenizer | null, text: string, cursor: number, threshold: number): boolean {
  if (cursor < 0) return false;
  if (!tokenizer) return text.length >= threshold;
  const end = Math.min(cursor, text.length);
  const start = tokenizer.findTokenStart(text, end);
  return end - start >= threshold;
}

/** Range of the token being typed: from its start up to the cursor. */
export function activeTokenRange(tokenizer: Tokenizer, text: string, cursor: number): Range {
  const end = Math.max(0, Math.min(cursor, text.length));
  return { start: tokenizer.findTokenStart(text, end), end };
}

export function decideFilter(tokenizer: Tokenizer | null, text: string, cursor: number, threshold: number): FilterDecision {
  if (!enoughToFilter(tokenizer, text, cursor, threshold)) return { kind: "dismiss" };
  if (!tokenizer) return { kind: "query", query: text, range: { start: 0, end: text.length } };
  const range = activeTokenRange(tokenizer, text, cursor);
  return { kind: "query", query: text.slice(range.start, range.end), range };
}
