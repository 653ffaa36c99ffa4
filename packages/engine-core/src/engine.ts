import type {
  FilterDecision,
  ReplacementMarker,
  SuggestionSink,
  TextBuffer,
  Tokenizer,
  ValidationReport,
  Validator
} from "./types";
import type { EngineConfig } from "./config";
import { SpannedText } from "./spanned";
import { SingleCharTokenizer } from "./tokenizer";
import { decideFilter, enoughToFilter } from "./policy";
import { performValidation } from "./validation";
import { logger } from "./logger";

export type EngineOptions = {
  buffer: TextBuffer;
  sink?: SuggestionSink | null;
  tokenizer?: Tokenizer | null;
  validator?: Validator | null;
  threshold?: number;
};

/**
 * Multi-token editing over a host buffer. With a tokenizer the engine works on
 * the token under the cursor; without one it falls back to whole-text behaviour
 * of a single-value field.
 */
export class ListEngine {
  private buffer: TextBuffer;
  private sink: SuggestionSink | null;
  private tokenizer: Tokenizer | null;
  private validator: Validator | null;
  private threshold = 1;

  constructor(options: EngineOptions) {
    this.buffer = options.buffer;
    this.sink = options.sink ?? null;
    this.tokenizer = options.tokenizer ?? null;
    this.validator = options.validator ?? null;
    this.setThreshold(options.threshold ?? 2);
  }

  static fromConfig(config: EngineConfig, options: Omit<EngineOptions, "tokenizer" | "threshold">): ListEngine {
    return new ListEngine({
      ...options,
      tokenizer: new SingleCharTokenizer(config.separator),
      threshold: config.threshold
    });
  }

  setTokenizer(tokenizer: Tokenizer | null): void {
    this.tokenizer = tokenizer;
  }

  getTokenizer(): Tokenizer | null {
    return this.tokenizer;
  }

  setValidator(validator: Validator | null): void {
    this.validator = validator;
  }

  setSink(sink: SuggestionSink | null): void {
    this.sink = sink;
  }

  setThreshold(threshold: number): void {
    this.threshold = Number.isFinite(threshold) && threshold > 0 ? Math.floor(threshold) : 1;
  }

  getThreshold(): number {
    return this.threshold;
  }

  enoughToFilter(): boolean {
    return enoughToFilter(this.tokenizer, this.currentText(), this.buffer.selectionEnd(), this.threshold);
  }

  /** Re-run on every text or selection change; the active token moves as the user types. */
  performFiltering(keyCode?: number): FilterDecision {
    const decision = decideFilter(this.tokenizer, this.currentText(), this.buffer.selectionEnd(), this.threshold);
    if (decision.kind === "query") {
      logger.debug("filter submitted", { query: decision.query, ...decision.range, keyCode });
      this.sink?.submit(decision.query);
    } else {
      logger.debug("filter dismissed", { keyCode });
      this.sink?.dismiss();
    }
    return decision;
  }

  performValidation(): ValidationReport {
    return performValidation(this.buffer, this.tokenizer, this.validator);
  }

  /**
   * Replaces the token being typed with the terminated suggestion. The returned
   * marker lets the host undo the substitution; the engine itself keeps no
   * history.
   */
  setOrReplaceText(suggestion: SpannedText | string): ReplacementMarker {
    const text = SpannedText.from(suggestion);
    this.buffer.finishComposing?.();
    const length = this.buffer.length();

    if (!this.tokenizer) {
      const original = this.buffer.read({ start: 0, end: length }).text;
      this.buffer.replace({ start: 0, end: length }, text, text.length);
      return { start: 0, end: text.length, original, inserted: text.text };
    }

    const cursor = this.buffer.selectionEnd();
    const end = cursor < 0 ? length : Math.min(cursor, length);
    const start = this.tokenizer.findTokenStart(this.currentText(), end);
    const original = this.buffer.read({ start, end }).text;
    const inserted = this.tokenizer.terminateToken(text);
    // The cursor goes after the inserted text even when the token was empty.
    this.buffer.replace({ start, end }, inserted, start + inserted.length);
    logger.debug("token replaced", { start, end, original, inserted: inserted.text });
    return { start, end: start + inserted.length, original, inserted: inserted.text };
  }

  private currentText(): string {
    return this.buffer.read({ start: 0, end: this.buffer.length() }).text;
  }
}
