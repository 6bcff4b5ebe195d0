/**
 * Heuristic compare weights for control names.
 *
 * Names such as "Master Playback Volume" are ranked by three priority
 * tables: the leading control class, then the second-to-last word, then
 * the last word. Lower weights sort earlier.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import { INTERFACE_ORDER, type ElementId } from "../transport/types.js";

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/** Weight of a name whose leading class is in no table. */
export const NOT_FOUND = 1_000_000_000;

const PRIMARY_COEF = 1_000_000;
const SUFFIX_COEF = 1_000;
const MODIFIER_COEF = 1;

const priorityTablesSchema = z.object({
  primary: z.array(z.string().min(1)),
  suffix: z.array(z.string().min(1)),
  modifier: z.array(z.string().min(1)),
});

export type PriorityTables = z.infer<typeof priorityTablesSchema>;

function loadDefaultTables(): PriorityTables {
  const url = new URL("../../data/priority-tables.json", import.meta.url);
  return priorityTablesSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
}

export const DEFAULT_PRIORITY_TABLES: PriorityTables = loadDefaultTables();

// ---------------------------------------------------------------------------
// Weight computation
// ---------------------------------------------------------------------------

interface TableMatch {
  weight: number;
  /** Position just past the matched entry and one following space. */
  next: number;
}

function lookup(name: string, pos: number, table: string[], coef: number): TableMatch | null {
  for (let i = 0; i < table.length; i++) {
    const entry = table[i];
    if (name.startsWith(entry, pos)) {
      let next = pos + entry.length;
      if (name[next] === " ") next++;
      return { weight: i * coef + 1, next };
    }
  }
  return null;
}

/**
 * Build a weight function over the given tables.
 *
 * The suffix scan walks backward over raw characters: runs of spaces are
 * not collapsed, so "Front  Left" scans differently from "Front Left".
 */
export function createCompareWeight(tables: PriorityTables): (name: string) => number {
  return (name: string): number => {
    const primary = lookup(name, 0, tables.primary, PRIMARY_COEF);
    if (!primary) return NOT_FOUND;

    let res = primary.weight;
    const start = primary.next;
    if (start >= name.length) return res;

    let p = name.length - 1;
    while (p !== start && name[p] !== " ") p--;
    while (p !== start && name[p] === " ") p--;

    let pos: number;
    if (p !== start) {
      while (p !== start && name[p] !== " ") p--;
      const suffix = lookup(name, p, tables.suffix, SUFFIX_COEF);
      if (!suffix) return res;
      res += suffix.weight;
      pos = suffix.next;
    } else {
      pos = p;
    }

    const modifier = lookup(name, pos, tables.modifier, MODIFIER_COEF);
    if (!modifier) return res;
    return res + modifier.weight;
  };
}

export const getCompareWeight = createCompareWeight(DEFAULT_PRIORITY_TABLES);

// ---------------------------------------------------------------------------
// Raw element comparators
// ---------------------------------------------------------------------------

/** What a raw-element comparator may look at. */
export interface ControlKey {
  readonly id: ElementId;
  readonly compareWeight: number;
}

export type ControlComparator = (a: ControlKey, b: ControlKey) => number;

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Interface class, then (for mixer controls) weight, then name, then index. */
export const compareControlsDefault: ControlComparator = (a, b) => {
  const d = INTERFACE_ORDER[a.id.iface] - INTERFACE_ORDER[b.id.iface];
  if (d !== 0) return d;
  if (a.id.iface === "mixer") {
    const w = a.compareWeight - b.compareWeight;
    if (w !== 0) return w;
  }
  const n = compareNames(a.id.name, b.id.name);
  if (n !== 0) return n;
  return a.id.index - b.id.index;
};

/** Driver enumeration order. */
export const compareControlsByNumid: ControlComparator = (a, b) => a.id.numid - b.id.numid;
