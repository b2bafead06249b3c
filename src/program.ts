// Foreground pass: one resolve, persisted when caching is on.

import { Clock, Effect } from "effect";
import type { RunConfig } from "./config.ts";
import { emptySnapshot, type TickerRecord } from "./domain.ts";
import { CacheStore, commitUpdates } from "./cache-store.ts";
import type { FieldFetcher } from "./field-fetcher.ts";
import { resolve } from "./orchestrator.ts";

export interface RunResult {
  readonly records: ReadonlyArray<TickerRecord>;
  readonly warnings: ReadonlyArray<string>;
}

/** With caching disabled the store is never touched. A pass in which every
 *  entry was fresh has nothing to write and skips the commit. */
export const runOnce = (
  config: RunConfig,
  options: { readonly forceRefresh: boolean },
): Effect.Effect<RunResult, never, CacheStore | FieldFetcher> =>
  Effect.gen(function* () {
    const cacheEnabled = config.settings.cache.enabled;
    const cache = cacheEnabled
      ? yield* Effect.flatMap(CacheStore, (store) => store.load)
      : emptySnapshot;
    const now = yield* Clock.currentTimeMillis;

    const resolution = yield* resolve({
      tickers: config.tickers,
      cache,
      settings: config.settings,
      forceRefresh: options.forceRefresh,
      now,
    });

    if (!cacheEnabled || resolution.updates.size === 0) {
      return { records: resolution.records, warnings: resolution.warnings };
    }

    const writeWarnings = yield* commitUpdates(resolution.updates).pipe(
      Effect.as([]),
      Effect.catchTag("CacheWriteError", (e) =>
        Effect.logError(`[cache] ${e.path}: ${e.message}`).pipe(
          Effect.as([`could not write cache file ${e.path}: ${e.message}`]),
        ),
      ),
    );

    return {
      records: resolution.records,
      warnings: [...resolution.warnings, ...writeWarnings],
    };
  });
