import { describe, it, expect, vi } from "vitest";
import { createListField } from "../src/state";
import { SpannedText } from "@listedit/engine-core/src/spanned";
import type { SuggestionSource, Validator } from "@listedit/engine-core/src/types";

const ROADS = ["residential", "rest_area", "road", "track", "trunk", "unclassified"];

// Prefix lookup standing in for the host's suggestion backend.
function prefixSource(values: string[] = ROADS) {
  const clear = vi.fn();
  const query = vi.fn(async (text: string) => values.filter((v) => v.startsWith(text)));
  const source: SuggestionSource = { query, clear };
  return { source, query, clear };
}

const trimmed: Validator = {
  isValid: (token) => token === token.trim(),
  fixText: (token) => token.trim()
};

describe("list field", () => {
  it("queries the token under the cursor and opens the drop-down", async () => {
    const { source, query } = prefixSource();
    const field = createListField({ source, config: { threshold: 2 } });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("highway;re");
    await field.settled();
    expect(query).toHaveBeenLastCalledWith("re");
    expect(store.getState().suggestions).toEqual(["residential", "rest_area"]);
    expect(store.getState().dropdownOpen).toBe(true);
    expect(store.getState().query).toBe("re");
  });

  it("closes the drop-down and clears the source when the token is too short", async () => {
    const { source, clear } = prefixSource();
    const field = createListField({ source, config: { threshold: 2 } });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("highway;re");
    await field.settled();
    store.getState().setText("highway;r");
    expect(store.getState().dropdownOpen).toBe(false);
    expect(store.getState().suggestions).toEqual([]);
    expect(clear).toHaveBeenCalledTimes(1);
  });

  it("keeps results hidden while the field is not focused", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    field.store.getState().setText("tr");
    await field.settled();
    expect(field.store.getState().suggestions).toEqual(["track", "trunk"]);
    expect(field.store.getState().dropdownOpen).toBe(false);
    field.store.getState().focus();
    field.store.getState().showSuggestions();
    expect(field.store.getState().dropdownOpen).toBe(true);
  });

  it("inserts a chosen suggestion in place of the token", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("highway;resi;track", 12);
    await field.settled();
    const marker = store.getState().chooseSuggestion(0);
    const s = store.getState();
    expect(s.text.text).toBe("highway;residential;;track");
    expect(s.cursor).toBe(20);
    expect(s.dropdownOpen).toBe(false);
    expect(s.lastReplacement).toEqual(marker);
    expect(marker).toEqual({ start: 8, end: 20, original: "resi", inserted: "residential;" });
  });

  it("ignores a choice outside the current suggestions", () => {
    const { source } = prefixSource();
    const field = createListField({ source, initialText: "road" });
    expect(field.store.getState().chooseSuggestion(3)).toBeNull();
    expect(field.store.getState().text.text).toBe("road");
  });

  it("undoes a completion on the very next backward delete", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("highway;resi");
    await field.settled();
    store.getState().chooseSuggestion(0);
    store.getState().deleteBackward();
    expect(store.getState().text.text).toBe("highway;resi");
    expect(store.getState().cursor).toBe(12);
    expect(store.getState().lastReplacement).toBeNull();
  });

  it("deletes a single character when undo is turned off", async () => {
    const { source } = prefixSource();
    const field = createListField({ source, config: { undoOnDelete: false } });
    const { store } = field;
    store.getState().setText("highway;resi");
    await field.settled();
    store.getState().chooseSuggestion(0);
    store.getState().deleteBackward();
    expect(store.getState().text.text).toBe("highway;residential");
  });

  it("deletes a single character once another action came in between", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().setText("highway;resi");
    await field.settled();
    store.getState().chooseSuggestion(0);
    store.getState().setSelection(20);
    store.getState().deleteBackward();
    expect(store.getState().text.text).toBe("highway;residential");
  });

  it("forgets the completion once the field is focused again", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().setText("highway;resi");
    await field.settled();
    store.getState().chooseSuggestion(0);
    store.getState().focus();
    expect(store.getState().lastReplacement).toBeNull();
    store.getState().deleteBackward();
    expect(store.getState().text.text).toBe("highway;residential");
  });

  it("forgets the completion once composing starts", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().setText("highway;resi");
    await field.settled();
    store.getState().chooseSuggestion(0);
    store.getState().setComposing(null);
    store.getState().deleteBackward();
    expect(store.getState().text.text).toBe("highway;residential");
  });

  it("commits the composing text before inserting", async () => {
    const { source } = prefixSource();
    const field = createListField({ source });
    const { store } = field;
    store.getState().setText("highway;tr");
    store.getState().setComposing({ start: 8, end: 10 });
    await field.settled();
    store.getState().chooseSuggestion(0);
    expect(store.getState().composing).toBeNull();
    expect(store.getState().text.text).toBe("highway;track;");
  });

  it("validates every token on blur", () => {
    const { source } = prefixSource();
    const field = createListField({ source, validator: trimmed, config: { threshold: 50 } });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("a;;b ; c");
    const report = store.getState().blur();
    expect(store.getState().text.text).toBe("a;b;c;");
    expect(store.getState().focused).toBe(false);
    expect(report.edits).toHaveLength(3);
  });

  it("keeps formatting on tokens that survive validation", () => {
    const { source } = prefixSource();
    const field = createListField({ source, validator: trimmed, config: { threshold: 50 } });
    const em = { italic: true };
    field.store.getState().setText(SpannedText.of("road; x", [{ start: 0, end: 4, attributes: em }]));
    field.store.getState().commit();
    expect(field.store.getState().text.text).toBe("road;x;");
    expect(field.store.getState().text.spans).toEqual([{ start: 0, end: 4, attributes: em }]);
  });

  it("works as a single-value field without a tokenizer", async () => {
    const { source, query } = prefixSource();
    const field = createListField({ source, list: false });
    const { store } = field;
    store.getState().focus();
    store.getState().setText("res");
    await field.settled();
    expect(query).toHaveBeenLastCalledWith("res");
    store.getState().chooseSuggestion(1);
    expect(store.getState().text.text).toBe("rest_area");
  });

  it("uses the configured separator", async () => {
    const { source, query } = prefixSource();
    const field = createListField({ source, config: { separator: "," } });
    field.store.getState().setText("road, tr");
    await field.settled();
    expect(query).toHaveBeenLastCalledWith("tr");
    field.store.getState().chooseSuggestion(0);
    expect(field.store.getState().text.text).toBe("road, track,");
  });
});
