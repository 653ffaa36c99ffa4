import type { TextBuffer, Tokenizer, ValidationEdit, ValidationReport, Validator } from "./types";
import { SpannedText } from "./spanned";
import { logger } from "./logger";

function isBlank(s: string): boolean {
  return s.trim().length === 0;
}

function validateWhole(buffer: TextBuffer, validator: Validator): ValidationReport {
  const range = { start: 0, end: buffer.length() };
  const text = buffer.read(range).text;
  if (validator.isValid(text)) return { edits: [] };
  const fixed = validator.fixText(text);
  buffer.replace(range, SpannedText.of(fixed));
  return { edits: [{ kind: "fixed", range, before: text, after: fixed }] };
}

/**
 * Validates every separator-delimited segment of the buffer, last to first.
 *
 * A segment is a token together with the spaces before it and the separator
 * after it. Blank tokens are removed with their separator, invalid ones are
 * replaced by the validator's fix and valid ones are re-terminated. Walking
 * right-to-left means an edit never moves a segment that is still to be visited.
 */
export function performValidation(
  buffer: TextBuffer,
  tokenizer: Tokenizer | null,
  validator: Validator | null
): ValidationReport {
  if (!validator) return { edits: [] };
  if (!tokenizer) return validateWhole(buffer, validator);

  const edits: ValidationEdit[] = [];
  let full = buffer.read({ start: 0, end: buffer.length() });
  let i = full.length;
  for (;;) {
    const text = full.text;
    const start = tokenizer.findTokenStart(text, i);
    // The right edge is `i`, not findTokenEnd: it is where the previous
    // iteration stopped, so text already rewritten there is not read again.
    const token = text.slice(start, i);

    let segmentStart = start;
    while (segmentStart > 0 && text[segmentStart - 1] === " ") segmentStart--;
    const segmentEnd = i < text.length ? i + 1 : i;
    const segment = text.slice(segmentStart, segmentEnd);

    let kind: ValidationEdit["kind"];
    let replacement: SpannedText;
    if (isBlank(token)) {
      kind = "deleted";
      replacement = SpannedText.of("");
    } else if (!validator.isValid(token)) {
      const fixed = validator.fixText(token);
      kind = isBlank(fixed) ? "deleted" : "fixed";
      replacement = isBlank(fixed) ? SpannedText.of("") : tokenizer.terminateToken(SpannedText.of(fixed));
    } else {
      kind = "normalized";
      replacement = tokenizer.terminateToken(full.slice(start, i));
    }

    if (replacement.text !== segment) {
      const range = { start: segmentStart, end: segmentEnd };
      buffer.replace(range, replacement);
      full = buffer.read({ start: 0, end: buffer.length() });
      edits.push({ kind, range, before: segment, after: replacement.text });
      logger.debug("validation edit", { kind, start: segmentStart, end: segmentEnd, before: segment, after: replacement.text });
    }

    if (segmentStart === 0) break;
    i = segmentStart - 1;
  }
  return { edits };
}
