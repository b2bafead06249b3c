// Staleness policy: pure, clock passed in.

import type { CacheEntry } from "./domain.ts";

export type EntryState =
  | { readonly _tag: "Absent" }
  | { readonly _tag: "Fresh"; readonly entry: CacheEntry }
  | { readonly _tag: "Stale"; readonly entry: CacheEntry };

const MINUTE_MS = 60_000;

/** An entry whose age equals the interval is already stale. */
export function isFresh(
  entry: CacheEntry | undefined,
  intervalMinutes: number,
  now: number,
): boolean {
  if (entry === undefined) return false;
  return now - entry.fetchedAt < intervalMinutes * MINUTE_MS;
}

export function classifyEntry(
  entry: CacheEntry | undefined,
  intervalMinutes: number,
  now: number,
): EntryState {
  if (entry === undefined) return { _tag: "Absent" };
  return isFresh(entry, intervalMinutes, now)
    ? { _tag: "Fresh", entry }
    : { _tag: "Stale", entry };
}
