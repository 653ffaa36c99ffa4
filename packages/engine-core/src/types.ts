import type { SpannedText } from "./spanned";

export type Range = {
  start: number; // absolute offset in the buffer
  end: number;   // exclusive
};

export type SpanAttributes = Readonly<Record<string, string | number | boolean>>;

export type Span = {
  start: number;
  end: number;
  attributes: SpanAttributes;
};

export interface Tokenizer {
  /** Start of the token that ends at `cursor`, leading spaces excluded. */
  findTokenStart(text: string, cursor: number): number;
  /** End of the token that begins at `cursor`, exclusive of the separator. */
  findTokenEnd(text: string, cursor: number): number;
  /** `text`, with the separator appended unless it already ends with one. */
  terminateToken(text: SpannedText): SpannedText;
}

export interface Validator {
  isValid(token: string): boolean;
  fixText(token: string): string;
}

/**
 * Host-owned text field. The engine only reads ranges and asks for range
 * replacements; it never keeps a reference to the text itself.
 */
export interface TextBuffer {
  read(range: Range): SpannedText;
  /** `cursor`, when given, is where the selection ends up after the edit. */
  replace(range: Range, text: SpannedText, cursor?: number): void;
  length(): number;
  selectionEnd(): number;
  /** Commit any IME composing text so a replacement does not fight the composer. */
  finishComposing?(): void;
}

export interface SuggestionSource {
  query(text: string): Promise<readonly string[]>;
  clear(): void;
}

/** Where the engine sends the outcome of a filtering pass. */
export interface SuggestionSink {
  submit(query: string): void;
  dismiss(): void;
}

export type FilterDecision =
  | { kind: "query"; query: string; range: Range }
  | { kind: "dismiss" };

export type ReplacementMarker = {
  start: number;
  end: number; // end of the inserted text in the new buffer
  original: string;
  inserted: string;
};

export type ValidationEdit = {
  kind: "deleted" | "fixed" | "normalized";
  range: Range; // segment range in the buffer as it was when edited
  before: string;
  after: string;
};

export type ValidationReport = {
  edits: ValidationEdit[];
};
