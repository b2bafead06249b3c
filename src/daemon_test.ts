// Daemon loop under the test clock: cycles, intervals and failure handling.

import { Effect, Fiber, Ref, TestClock, TestContext } from "effect";
import { describe, expect, it } from "vitest";
import { makeMemoryCacheStore } from "./cache-store-memory.ts";
import { CacheStore } from "./cache-store.ts";
import type { RunConfig } from "./config.ts";
import { type CacheSnapshot, defaultSettings, emptySnapshot } from "./domain.ts";
import { Idle, makeDaemon } from "./daemon.ts";
import { FieldFetcher } from "./field-fetcher.ts";
import { fields, makeFakeFieldFetcher } from "./field-fetcher-fake.ts";

// --- Helpers ---

const MINUTE = 60_000;

const config = (
  symbols: string[],
  cache = { enabled: true, intervalMinutes: 60 },
): RunConfig => ({
  tickers: symbols.map((symbol) => ({ symbol })),
  settings: { ...defaultSettings, cache },
});

interface Setup {
  readonly config: RunConfig;
  readonly initial?: CacheSnapshot;
  readonly failWrites?: boolean;
}

/**
 * Starts the daemon in a fiber, hands `steps` a way to change the config,
 * then interrupts the loop and reports what happened.
 */
function withDaemon(
  setup: Setup,
  steps: (setConfig: (next: RunConfig) => Effect.Effect<void>) => Effect.Effect<void>,
) {
  return Effect.runPromise(
    Effect.gen(function* () {
      const current = yield* Ref.make(setup.config);
      const memory = yield* makeMemoryCacheStore(setup.initial ?? emptySnapshot, {
        failWrites: setup.failWrites,
      });
      const fake = yield* makeFakeFieldFetcher({
        AAPL: fields({ price: 190 }),
        MSFT: fields({ price: 415 }),
      });
      const daemon = yield* makeDaemon({
        loadConfig: Ref.get(current),
        stagger: "1 second",
      });

      const fiber = yield* daemon.run.pipe(
        Effect.provideService(CacheStore, memory.store),
        Effect.provideService(FieldFetcher, fake.fetcher),
        Effect.fork,
      );
      // Let the first cycle run.
      yield* TestClock.adjust("1 second");
      yield* steps((next) => Ref.set(current, next));
      yield* Fiber.interrupt(fiber);

      return {
        calls: yield* fake.calls,
        writes: yield* memory.writes,
        contents: yield* memory.contents,
        phase: yield* daemon.phase,
      };
    }).pipe(Effect.provide(TestContext.TestContext)),
  );
}

const nothing = () => Effect.void;

// --- Tests ---

describe("daemon", () => {
  it("runs the first cycle immediately and writes the cache", async () => {
    const out = await withDaemon({ config: config(["AAPL"]) }, nothing);

    expect(out.calls).toEqual(["AAPL"]);
    expect(out.writes).toBe(1);
    expect(out.contents.get("AAPL")?.fields.price).toBe(190);
    expect(out.phase).toEqual(Idle(1));
  });

  it("refreshes again once the interval has elapsed", async () => {
    const out = await withDaemon({ config: config(["AAPL"]) }, () =>
      TestClock.adjust("60 minutes"),
    );

    expect(out.calls).toEqual(["AAPL", "AAPL"]);
    expect(out.writes).toBe(2);
    expect(out.phase).toEqual(Idle(2));
  });

  it("does not wake up before the interval has elapsed", async () => {
    const out = await withDaemon({ config: config(["AAPL"]) }, () =>
      TestClock.adjust("30 minutes"),
    );

    expect(out.calls).toEqual(["AAPL"]);
    expect(out.phase).toEqual(Idle(1));
  });

  it("skips tickers whose entries are still fresh", async () => {
    const initial = new Map([
      ["AAPL", { symbol: "AAPL", fetchedAt: 0, fields: fields({ price: 150 }) }],
    ]);
    const out = await withDaemon({ config: config(["AAPL"]), initial }, nothing);

    expect(out.calls).toEqual([]);
    expect(out.writes).toBe(0);
    expect(out.contents.get("AAPL")?.fields.price).toBe(150);
  });

  it("staggers fetches within a cycle", async () => {
    const out = await withDaemon({ config: config(["AAPL", "MSFT"]) }, () =>
      TestClock.adjust("1 second"),
    );

    expect(out.calls).toEqual(["AAPL", "MSFT"]);
    expect([...out.contents.keys()].sort()).toEqual(["AAPL", "MSFT"]);
  });

  it("caches even when the settings switch caching off", async () => {
    const out = await withDaemon(
      { config: config(["AAPL"], { enabled: false, intervalMinutes: 60 }) },
      nothing,
    );

    expect(out.writes).toBe(1);
    expect(out.contents.has("AAPL")).toBe(true);
  });

  it("keeps cycling when the cache cannot be written", async () => {
    const out = await withDaemon({ config: config(["AAPL"]), failWrites: true }, () =>
      TestClock.adjust("60 minutes"),
    );

    expect(out.calls).toEqual(["AAPL", "AAPL"]);
    expect(out.writes).toBe(2);
    expect(out.phase).toEqual(Idle(2));
  });

  it("survives an empty ticker list and picks up tickers added later", async () => {
    const out = await withDaemon({ config: config([]) }, (setConfig) =>
      Effect.gen(function* () {
        yield* setConfig(config(["AAPL"]));
        yield* TestClock.adjust("60 minutes");
      }),
    );

    expect(out.calls).toEqual(["AAPL"]);
    expect(out.phase).toEqual(Idle(2));
  });

  it("applies a changed interval from the next cycle on", async () => {
    const out = await withDaemon({ config: config(["AAPL"]) }, (setConfig) =>
      Effect.gen(function* () {
        yield* setConfig(config(["AAPL"], { enabled: true, intervalMinutes: 5 }));
        yield* TestClock.adjust("60 minutes");
        yield* TestClock.adjust("5 minutes");
      }),
    );

    expect(out.calls).toEqual(["AAPL", "AAPL", "AAPL"]);
    expect(out.phase).toEqual(Idle(3));
  });

  it("stamps entries with the clock time of the cycle", async () => {
    const out = await withDaemon({ config: config(["AAPL"]) }, () =>
      TestClock.adjust("60 minutes"),
    );

    const fetchedAt = out.contents.get("AAPL")?.fetchedAt ?? -1;
    expect(fetchedAt).toBeGreaterThanOrEqual(60 * MINUTE);
    expect(fetchedAt).toBeLessThanOrEqual(60 * MINUTE + 1000);
  });
});
