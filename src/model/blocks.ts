/**
 * Builders for Block Model values.
 */

import type { HeadingLevel, ListBlock, ListItem, Run, RunSequence, RunStyle } from "./types.js";

/** Create a run with the given style flags (unstyled by default). */
export function makeRun(text: string, style: Partial<RunStyle> = {}): Run {
  return {
    text,
    bold: style.bold ?? false,
    italic: style.italic ?? false,
    code: style.code ?? false,
  };
}

/** A run sequence holding one unstyled run. */
export function plainRuns(text: string): RunSequence {
  return [makeRun(text)];
}

function sameStyle(a: RunStyle, b: RunStyle): boolean {
  return a.bold === b.bold && a.italic === b.italic && a.code === b.code;
}

/**
 * Merge adjacent runs with identical style flags.
 * Empty runs are absorbed into their neighbours; a sequence of only empty runs
 * collapses to a single empty unstyled run.
 */
export function mergeRuns(runs: RunSequence): RunSequence {
  const merged: Run[] = [];
  for (const run of runs) {
    if (run.text === "") continue;
    const prev = merged.at(-1);
    if (prev && sameStyle(prev, run)) {
      prev.text += run.text;
    } else {
      merged.push({ ...run });
    }
  }
  return merged.length > 0 ? merged : plainRuns("");
}

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/** Clamp an arbitrary number into the heading level range. */
export function toHeadingLevel(n: number): HeadingLevel {
  if (!(n > 1)) return 1;
  return HEADING_LEVELS[Math.floor(n) - 1] ?? 6;
}

/** A list item in flat form, as produced by line- or paragraph-oriented sources. */
export interface ListEntry {
  /** 0-based nesting depth */
  level: number;
  ordered: boolean;
  content: RunSequence;
}

/**
 * Collect the list opened by `first`. Entries deeper than `parentLevel` but not
 * deeper than `first` are its siblings; deeper ones nest under the previous
 * item. A nested list keeps the kind of its first item, since an item holds a
 * single child list.
 */
function collectList(
  entries: ListEntry[],
  start: number,
  first: ListEntry,
  parentLevel: number,
  splitOnKind: boolean,
): { list: ListBlock; next: number } {
  let last: ListItem = { content: first.content };
  const items: ListItem[] = [last];
  let i = start + 1;
  while (i < entries.length) {
    const entry = entries[i];
    if (!entry || entry.level <= parentLevel) break;

    if (entry.level <= first.level) {
      if (splitOnKind && entry.ordered !== first.ordered) break;
      last = { content: entry.content };
      items.push(last);
      i++;
      continue;
    }

    const nested = collectList(entries, i, entry, first.level, false);
    last.children = nested.list;
    i = nested.next;
  }
  return { list: { type: "list", ordered: first.ordered, items }, next: i };
}

/**
 * Build nested List blocks from flat entries.
 * A change of kind among top-level entries starts a new list.
 */
export function buildLists(entries: ListEntry[]): ListBlock[] {
  const lists: ListBlock[] = [];
  let i = 0;
  while (i < entries.length) {
    const first = entries[i];
    if (!first) break;
    const { list, next } = collectList(entries, i, first, -1, true);
    lists.push(list);
    i = next;
  }
  return lists;
}
