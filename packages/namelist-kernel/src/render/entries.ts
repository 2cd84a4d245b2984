// Name-list Kernel - Indexing and rendering (v0)
//
// Rendered form: `a=a,b=b,c=c`
// - Each entry is a self-assignment `<name>=<name>`.
// - Every entry except the last carries a trailing `,`.
// - No spaces, no line breaks, nothing after the last entry.

import type { IndexedEntryV0 } from "../rule/types";

export const ENTRY_ASSIGN_V0 = "=";
export const ENTRY_SEPARATOR_V0 = ",";

/**
 * Assigns each name its 0-based position.
 */
export function indexEntriesV0(names: ReadonlyArray<string>): IndexedEntryV0[] {
  return names.map((name, index) => ({ name, index }));
}

/**
 * Renders one entry; `isLast` suppresses the trailing separator.
 */
export function renderEntryV0(entry: IndexedEntryV0, isLast: boolean): string {
  const text = `${entry.name}${ENTRY_ASSIGN_V0}${entry.name}`;
  return isLast ? text : `${text}${ENTRY_SEPARATOR_V0}`;
}

/**
 * Concatenates rendered entries in ascending index order.
 * An empty entry list renders as the empty string.
 */
export function renderEntriesV0(entries: ReadonlyArray<IndexedEntryV0>): string {
  const ordered = [...entries].sort((a, b) => a.index - b.index);
  const lastIndex = ordered.length > 0 ? ordered[ordered.length - 1].index : -1;

  let out = "";
  for (const e of ordered) {
    out += renderEntryV0(e, e.index === lastIndex);
  }
  return out;
}
