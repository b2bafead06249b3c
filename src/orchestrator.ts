// Refresh orchestrator: one pass over the configured tickers.
//
// For each ticker, in config order: reuse a fresh cache entry, or fetch and
// fall back to whatever entry exists when the fetch fails. A failing ticker
// never stops the pass; it becomes a stale row or an error row.

import { type Duration, Effect, Either } from "effect";
import {
  type CacheEntry,
  type CacheSnapshot,
  displayNameFor,
  type ErrorRow,
  type MetricRow,
  type Settings,
  type TickerRecord,
  type TickerSpec,
} from "./domain.ts";
import { FieldFetcher } from "./field-fetcher.ts";
import { failureReason } from "./format.ts";
import { classifyEntry, type EntryState } from "./staleness.ts";

export interface ResolveInput {
  readonly tickers: ReadonlyArray<TickerSpec>;
  readonly cache: CacheSnapshot;
  readonly settings: Settings;
  readonly forceRefresh: boolean;
  readonly now: number;
  /** Pause before every network fetch except the first of the pass. */
  readonly stagger?: Duration.DurationInput;
}

export interface Resolution {
  readonly records: ReadonlyArray<TickerRecord>;
  /** The input cache with this pass's updates applied. */
  readonly cache: CacheSnapshot;
  /** Only the entries written during this pass. */
  readonly updates: CacheSnapshot;
  readonly warnings: ReadonlyArray<string>;
}

// --- Decision table ---

export type Decision =
  | { readonly _tag: "Reuse"; readonly entry: CacheEntry }
  | { readonly _tag: "Fetch"; readonly fallback: EntryState };

/** With caching off the state is always Absent, so there is nothing to
 *  reuse and nothing to fall back to. */
export function decide(state: EntryState, forceRefresh: boolean): Decision {
  if (state._tag === "Fresh" && !forceRefresh) {
    return { _tag: "Reuse", entry: state.entry };
  }
  return { _tag: "Fetch", fallback: state };
}

// --- Records ---

function metricRow(spec: TickerSpec, entry: CacheEntry, stale: boolean): MetricRow {
  return {
    _tag: "MetricRow",
    symbol: spec.symbol,
    name: displayNameFor(spec, entry.fields),
    fields: entry.fields,
    fetchedAt: entry.fetchedAt,
    stale,
  };
}

function errorRow(spec: TickerSpec, reason: string): ErrorRow {
  return {
    _tag: "ErrorRow",
    symbol: spec.symbol,
    name: displayNameFor(spec, undefined),
    reason,
  };
}

// --- Pass ---

export const resolve = (
  input: ResolveInput,
): Effect.Effect<Resolution, never, FieldFetcher> =>
  Effect.gen(function* () {
    const fetcher = yield* FieldFetcher;
    const { settings, forceRefresh, now, stagger } = input;
    const cacheEnabled = settings.cache.enabled;

    const cache = new Map(input.cache);
    const updates = new Map<string, CacheEntry>();
    const records: TickerRecord[] = [];
    const warnings: string[] = [];
    let fetches = 0;

    // A symbol listed once with a configured name and once without still
    // needs the API's name for the unnamed row.
    const unnamed = new Set(
      input.tickers.filter((t) => t.displayName === undefined).map((t) => t.symbol),
    );

    const fetchFields = (spec: TickerSpec) =>
      Effect.gen(function* () {
        if (stagger !== undefined && fetches > 0) yield* Effect.sleep(stagger);
        fetches++;
        const request = unnamed.has(spec.symbol) ? { symbol: spec.symbol } : spec;
        return yield* fetcher.fetch(request, settings.columns).pipe(Effect.either);
      });

    for (const spec of input.tickers) {
      const { symbol } = spec;
      const existing = cacheEnabled ? cache.get(symbol) : undefined;
      const decision = decide(
        classifyEntry(existing, settings.cache.intervalMinutes, now),
        forceRefresh,
      );

      if (decision._tag === "Reuse") {
        yield* Effect.logDebug(`[refresh] ${symbol}: fresh in cache`);
        records.push(metricRow(spec, decision.entry, false));
        continue;
      }

      const result = yield* fetchFields(spec);

      if (Either.isRight(result)) {
        const fields = result.right;
        const entry: CacheEntry = {
          symbol,
          fetchedAt: Math.max(now, existing?.fetchedAt ?? now),
          // A skipped or failed profile lookup keeps the name resolved earlier.
          fields:
            fields.resolvedName === null && existing !== undefined
              ? { ...fields, resolvedName: existing.fields.resolvedName }
              : fields,
        };
        if (cacheEnabled) {
          cache.set(symbol, entry);
          updates.set(symbol, entry);
        }
        yield* Effect.logDebug(`[refresh] ${symbol}: fetched`);
        records.push(metricRow(spec, entry, false));
        continue;
      }

      const reason = failureReason(result.left);
      yield* Effect.logWarning(`[refresh] ${symbol}: fetch failed (${reason})`);

      const { fallback } = decision;
      switch (fallback._tag) {
        case "Absent":
          records.push(errorRow(spec, reason));
          break;
        case "Fresh":
          warnings.push(`using cached data for ${symbol}`);
          records.push(metricRow(spec, fallback.entry, false));
          break;
        case "Stale":
          warnings.push(`using stale data for ${symbol}`);
          records.push(metricRow(spec, fallback.entry, true));
          break;
      }
    }

    return { records, cache, updates, warnings };
  });
