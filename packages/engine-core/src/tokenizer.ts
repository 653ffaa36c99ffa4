import type { Tokenizer } from "./types";
import { SpannedText } from "./spanned";
import { EngineError } from "./errors";

export const DEFAULT_SEPARATOR = ";";

export function assertSeparator(separator: string): void {
  if (separator.length !== 1 || separator.trim().length === 0) {
    throw EngineError.invalidConfig([`separator must be one non-whitespace character, got ${JSON.stringify(separator)}`]);
  }
}

/**
 * Tokenizer for lists whose items are separated by a single character,
 * optionally followed by spaces (`a; b;c`).
 */
export class SingleCharTokenizer implements Tokenizer {
  readonly separator: string;

  constructor(separator: string = DEFAULT_SEPARATOR) {
    assertSeparator(separator);
    this.separator = separator;
  }

  findTokenStart(text: string, cursor: number): number {
    const end = Math.max(0, Math.min(cursor, text.length));
    let i = end;
    while (i > 0 && text[i - 1] !== this.separator) i--;
    while (i < end && text[i] === " ") i++;
    return i;
  }

  findTokenEnd(text: string, cursor: number): number {
    let i = Math.max(0, Math.min(cursor, text.length));
    while (i < text.length) {
      if (text[i] === this.separator) return i;
      i++;
    }
    return text.length;
  }

  terminateToken(text: SpannedText): SpannedText {
    let i = text.length;
    while (i > 0 && text.text[i - 1] === " ") i--;
    if (i > 0 && text.text[i - 1] === this.separator) return text;
    return text.append(this.separator);
  }
}
