import type { SuggestionSink, SuggestionSource } from "@listedit/engine-core/src/types";
import { logger } from "@listedit/engine-core/src/logger";

export type SuggestionResults = {
  seq: number;
  query: string;
  items: string[];
};

export type SuggestionClientOptions = {
  maxResults?: number;
  onResults?: (results: SuggestionResults) => void;
  onDismiss?: () => void;
};

/**
 * Sequenced front for a SuggestionSource. Every query gets a new sequence
 * number and only the newest one is ever delivered; answers to superseded
 * queries are dropped whatever order they arrive in. A failing source counts
 * as "no results".
 */
export class SuggestionClient implements SuggestionSink {
  private source: SuggestionSource;
  private options: SuggestionClientOptions;
  private nextId = 1;
  private latest = 0;
  private pending = new Map<number, Promise<void>>();

  constructor(source: SuggestionSource, options: SuggestionClientOptions = {}) {
    this.source = source;
    this.options = options;
  }

  get latestSeq(): number {
    return this.latest;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  submit(query: string): void {
    this.request(query);
  }

  request(query: string): number {
    const id = this.nextId++;
    this.latest = id;

    let request: Promise<readonly string[]>;
    try {
      request = this.source.query(query);
    } catch (err) {
      request = Promise.reject(err);
    }

    const run = request
      .then(
        (items) => items,
        (err: unknown) => {
          logger.warn("suggestion source failed", {
            seq: id,
            query,
            error: err instanceof Error ? err.message : String(err)
          });
          return [];
        }
      )
      .then((items) => this.deliver(id, query, items))
      .finally(() => {
        this.pending.delete(id);
      });
    this.pending.set(id, run);
    return id;
  }

  /** Supersedes every outstanding query and tells the source to drop cached results. */
  dismiss(): void {
    this.latest = this.nextId++;
    try {
      this.source.clear();
    } catch (err) {
      logger.warn("suggestion source clear failed", {
        seq: this.latest,
        error: err instanceof Error ? err.message : String(err)
      });
    }
    this.options.onDismiss?.();
  }

  async settled(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending.values()]);
    }
  }

  private deliver(id: number, query: string, items: readonly string[]): void {
    if (id !== this.latest) {
      logger.debug("discarding stale suggestions", { seq: id, latest: this.latest, query });
      return;
    }
    const max = this.options.maxResults;
    const capped = max !== undefined ? items.slice(0, max) : [...items];
    try {
      this.options.onResults?.({ seq: id, query, items: capped });
    } catch (err) {
      logger.error("suggestion listener failed", {
        seq: id,
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }
}
