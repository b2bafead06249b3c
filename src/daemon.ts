// Daemon: refreshes the cache file on a fixed period, never renders.
//
//   Idle ──(start / interval elapsed)──▶ Running ──(pass persisted)──▶ Idle
//
// The config is re-read at the start of every cycle, so edits to the ticker
// list or the interval apply from the next cycle on. Interrupting the fiber
// (SIGINT / SIGTERM under NodeRuntime.runMain) ends the loop; a commit that
// has already started runs to completion first.

import { Clock, Duration, Effect, Ref } from "effect";
import type { RunConfig } from "./config.ts";
import type { Settings } from "./domain.ts";
import { CacheStore, commitUpdates } from "./cache-store.ts";
import type { FieldFetcher } from "./field-fetcher.ts";
import { resolve } from "./orchestrator.ts";

// --- State ---

export type DaemonPhase =
  | { readonly _tag: "Idle"; readonly completedCycles: number }
  | { readonly _tag: "Running"; readonly cycle: number };

export const Idle = (completedCycles: number): DaemonPhase => ({
  _tag: "Idle",
  completedCycles,
});

export const Running = (cycle: number): DaemonPhase => ({
  _tag: "Running",
  cycle,
});

// --- Daemon ---

export interface DaemonOptions {
  readonly loadConfig: Effect.Effect<RunConfig>;
  /** Pause between consecutive fetches within one pass. */
  readonly stagger: Duration.DurationInput;
}

export interface Daemon {
  readonly run: Effect.Effect<never, never, CacheStore | FieldFetcher>;
  readonly phase: Effect.Effect<DaemonPhase>;
}

export function makeDaemon(options: DaemonOptions): Effect.Effect<Daemon> {
  return Effect.gen(function* () {
    const phase = yield* Ref.make<DaemonPhase>(Idle(0));
    const cycles = yield* Ref.make(0);

    // The daemon exists to keep the cache warm, so it caches even when the
    // foreground settings have caching switched off.
    const passSettings = (settings: Settings): Settings => ({
      ...settings,
      cache: { ...settings.cache, enabled: true },
    });

    const cycle: Effect.Effect<Settings, never, CacheStore | FieldFetcher> =
      Effect.gen(function* () {
        const n = yield* Ref.updateAndGet(cycles, (c) => c + 1);
        yield* Ref.set(phase, Running(n));

        const { tickers, settings } = yield* options.loadConfig;
        if (tickers.length === 0) {
          yield* Effect.logError("[daemon] No tickers to process.");
          return settings;
        }

        const store = yield* CacheStore;
        const cache = yield* store.load;
        const now = yield* Clock.currentTimeMillis;
        const resolution = yield* resolve({
          tickers,
          cache,
          settings: passSettings(settings),
          forceRefresh: false,
          now,
          stagger: options.stagger,
        });

        yield* Effect.forEach(
          resolution.warnings,
          (w) => Effect.logWarning(`[daemon] ${w}`),
          { discard: true },
        );

        if (resolution.updates.size > 0) {
          yield* commitUpdates(resolution.updates).pipe(
            Effect.uninterruptible,
            Effect.catchTag("CacheWriteError", (e) =>
              Effect.logError(`[daemon] cannot write ${e.path}: ${e.message}`),
            ),
          );
        }

        yield* Effect.logInfo(
          `[daemon] cycle ${n}: refreshed ${resolution.updates.size} of ${tickers.length} tickers`,
        );
        return settings;
      });

    const run = cycle.pipe(
      Effect.flatMap((settings) =>
        Ref.get(cycles).pipe(
          Effect.flatMap((n) => Ref.set(phase, Idle(n))),
          Effect.zipRight(
            Effect.sleep(Duration.minutes(settings.cache.intervalMinutes)),
          ),
        ),
      ),
      Effect.forever,
    );

    return { run, phase: Ref.get(phase) } satisfies Daemon;
  });
}
