import { createStore, type StoreApi } from "zustand/vanilla";
import { ListEngine } from "@listedit/engine-core/src/engine";
import { SpannedText } from "@listedit/engine-core/src/spanned";
import { loadConfig, type EngineConfigInput } from "@listedit/engine-core/src/config";
import { logger, setLogLevel } from "@listedit/engine-core/src/logger";
import { revertReplacement } from "@listedit/engine-core/src/undo";
import type {
  Range,
  ReplacementMarker,
  SuggestionSource,
  ValidationReport,
  Validator
} from "@listedit/engine-core/src/types";
import { SuggestionClient } from "@listedit/suggest-client/src/api";
import { createStoreBuffer } from "./adapters/storeBuffer";

type FieldState = {
  text: SpannedText;
  cursor: number;
  composing: Range | null;
  focused: boolean;
  suggestions: string[];
  dropdownOpen: boolean;
  query: string | null;
  lastReplacement: ReplacementMarker | null;
};

type FieldActions = {
  setText: (text: SpannedText | string, cursor?: number) => void;
  setSelection: (cursor: number) => void;
  setComposing: (range: Range | null) => void;
  chooseSuggestion: (index: number) => ReplacementMarker | null;
  deleteBackward: () => void;
  focus: () => void;
  blur: () => ValidationReport;
  commit: () => ValidationReport;
  showSuggestions: () => void;
};

export type FieldStore = FieldState & FieldActions;

export type ListFieldOptions = {
  source: SuggestionSource;
  validator?: Validator | null;
  config?: EngineConfigInput;
  /** false turns the field into a single-value autocomplete. */
  list?: boolean;
  initialText?: SpannedText | string;
};

export type ListField = {
  store: StoreApi<FieldStore>;
  engine: ListEngine;
  client: SuggestionClient;
  settled: () => Promise<void>;
};

function clampComposing(range: Range | null, length: number): Range | null {
  if (!range) return null;
  if (range.start < 0 || range.end < range.start || range.end > length) return null;
  return range;
}

export function createListField(options: ListFieldOptions): ListField {
  const config = loadConfig(options.config);
  setLogLevel(config.logLevel);
  const initialText = SpannedText.from(options.initialText ?? "");

  const store = createStore<FieldStore>()((set, get) => ({
    text: initialText,
    cursor: initialText.length,
    composing: null,
    focused: false,
    suggestions: [],
    dropdownOpen: false,
    query: null,
    lastReplacement: null,
    setText: (t, cursor) => {
      const text = SpannedText.from(t);
      const nextCursor = Math.max(0, Math.min(cursor ?? text.length, text.length));
      set({
        text,
        cursor: nextCursor,
        composing: clampComposing(get().composing, text.length),
        lastReplacement: null
      });
      engine.performFiltering();
    },
    setSelection: (cursor) => {
      const { text } = get();
      set({ cursor: Math.max(0, Math.min(cursor, text.length)), lastReplacement: null });
      engine.performFiltering();
    },
    setComposing: (range) => set({ composing: clampComposing(range, get().text.length), lastReplacement: null }),
    chooseSuggestion: (index) => {
      const item = get().suggestions[index];
      if (item === undefined) return null;
      const marker = engine.setOrReplaceText(item);
      client.dismiss();
      set({ lastReplacement: marker });
      return marker;
    },
    deleteBackward: () => {
      const s = get();
      if (config.undoOnDelete && s.lastReplacement && revertReplacement(buffer, s.lastReplacement)) {
        logger.debug("completion reverted", { ...s.lastReplacement });
      } else if (s.cursor > 0) {
        buffer.replace({ start: s.cursor - 1, end: s.cursor }, SpannedText.of(""));
      }
      set({ lastReplacement: null });
      engine.performFiltering();
    },
    focus: () => set({ focused: true, lastReplacement: null }),
    blur: () => {
      set({ focused: false });
      return get().commit();
    },
    commit: () => {
      const report = engine.performValidation();
      client.dismiss();
      set({ lastReplacement: null });
      return report;
    },
    showSuggestions: () => {
      const s = get();
      if (s.focused && s.suggestions.length > 0) set({ dropdownOpen: true, lastReplacement: null });
    }
  }));

  const buffer = createStoreBuffer({
    get: () => store.getState(),
    set: (next) => store.setState(next)
  });

  const client = new SuggestionClient(options.source, {
    maxResults: config.maxResults,
    onResults: ({ query, items }) => {
      store.setState({ query, suggestions: items, dropdownOpen: items.length > 0 && store.getState().focused });
    },
    onDismiss: () => {
      store.setState({ query: null, suggestions: [], dropdownOpen: false });
    }
  });

  const engine = ListEngine.fromConfig(config, { buffer, sink: client, validator: options.validator });
  if (options.list === false) engine.setTokenizer(null);

  return { store, engine, client, settled: () => client.settled() };
}
