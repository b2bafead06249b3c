// Cache store: the persisted symbol → entry snapshot.
//
// The file is shared by foreground runs and the daemon, which are separate
// processes. Writers never patch it: they reload, merge their updates over
// it and rewrite the whole file. There is no cross-process lock, so two
// overlapping commits resolve as last-writer-wins.

import { FileSystem, Path } from "@effect/platform";
import {
  Config,
  Context,
  Data,
  Effect,
  Layer,
  Option,
  Random,
  Schema,
} from "effect";
import {
  type CacheEntry,
  type CacheSnapshot,
  emptySnapshot,
  type MetricFields,
} from "./domain.ts";

// --- Error ---

export class CacheWriteError extends Data.TaggedError("CacheWriteError")<{
  readonly path: string;
  readonly message: string;
}> {}

// --- Service ---

export class CacheStore extends Context.Tag("CacheStore")<
  CacheStore,
  {
    /** Never fails: anything unreadable counts as an empty cache. */
    readonly load: Effect.Effect<CacheSnapshot>;
    readonly save: (snapshot: CacheSnapshot) => Effect.Effect<void, CacheWriteError>;
  }
>() {}

// --- Merge ---

/** Entries in `updates` replace those in `existing`; everything else is kept. */
export function mergeSnapshots(
  existing: CacheSnapshot,
  updates: CacheSnapshot,
): CacheSnapshot {
  const merged = new Map(existing);
  for (const [symbol, entry] of updates) merged.set(symbol, entry);
  return merged;
}

/** Read-merge-write against whatever is on disk right now. */
export const commitUpdates = (
  updates: CacheSnapshot,
): Effect.Effect<CacheSnapshot, CacheWriteError, CacheStore> =>
  Effect.gen(function* () {
    const store = yield* CacheStore;
    const merged = mergeSnapshots(yield* store.load, updates);
    yield* store.save(merged);
    return merged;
  });

// --- File format ---

const OptionalNumber = Schema.optional(Schema.NullOr(Schema.Number));

// Unknown keys are dropped by Schema.Struct; missing ones decode as absent.
const PersistedEntry = Schema.Struct({
  fetchedAt: Schema.Number,
  fields: Schema.Struct({
    price: OptionalNumber,
    dailyChange: OptionalNumber,
    eps: OptionalNumber,
    peRatio: OptionalNumber,
    dividend: OptionalNumber,
    ytdChange: OptionalNumber,
    tenYearChange: OptionalNumber,
    resolvedName: Schema.optional(Schema.NullOr(Schema.String)),
  }),
});

const PersistedFile = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Unknown }),
);

const decodeEntry = Schema.decodeUnknownOption(PersistedEntry);

export interface DecodedCache {
  readonly snapshot: CacheSnapshot;
  /** Symbols whose entries could not be read and were dropped. */
  readonly skipped: ReadonlyArray<string>;
}

/** Decode cache file text. None when it is not a JSON object at all. */
export function decodeCacheFile(text: string): Option.Option<DecodedCache> {
  return Schema.decodeUnknownOption(PersistedFile)(text).pipe(
    Option.map((raw) => {
      const snapshot = new Map<string, CacheEntry>();
      const skipped: string[] = [];
      for (const [symbol, value] of Object.entries(raw)) {
        Option.match(decodeEntry(value), {
          onNone: () => skipped.push(symbol),
          onSome: ({ fetchedAt, fields }) => {
            const normalized: MetricFields = {
              price: fields.price ?? null,
              dailyChange: fields.dailyChange ?? null,
              eps: fields.eps ?? null,
              peRatio: fields.peRatio ?? null,
              dividend: fields.dividend ?? null,
              ytdChange: fields.ytdChange ?? null,
              tenYearChange: fields.tenYearChange ?? null,
              resolvedName: fields.resolvedName ?? null,
            };
            snapshot.set(symbol, { symbol, fetchedAt, fields: normalized });
          },
        });
      }
      return { snapshot, skipped };
    }),
  );
}

export function encodeCacheFile(snapshot: CacheSnapshot): string {
  const out: Record<string, { fetchedAt: number; fields: MetricFields }> = {};
  for (const [symbol, entry] of snapshot) {
    out[symbol] = { fetchedAt: entry.fetchedAt, fields: entry.fields };
  }
  return JSON.stringify(out, null, 2) + "\n";
}

// --- File-backed implementation ---

export function makeFileCacheStore(
  file: string,
): Effect.Effect<Context.Tag.Service<CacheStore>, never, FileSystem.FileSystem | Path.Path> {
  return Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    const load: Effect.Effect<CacheSnapshot> = Effect.gen(function* () {
      const text = yield* fs.readFileString(file);
      if (text.trim() === "") {
        yield* Effect.logWarning(`[cache] ${file} is empty, starting fresh`);
        return emptySnapshot;
      }
      const decoded = decodeCacheFile(text);
      if (Option.isNone(decoded)) {
        yield* Effect.logWarning(`[cache] ${file} is malformed, starting fresh`);
        return emptySnapshot;
      }
      const { snapshot, skipped } = decoded.value;
      if (skipped.length > 0) {
        yield* Effect.logWarning(
          `[cache] dropped unreadable entries: ${skipped.join(", ")}`,
        );
      }
      yield* Effect.logDebug(`[cache] loaded ${snapshot.size} entries from ${file}`);
      return snapshot;
    }).pipe(
      Effect.catchTags({
        SystemError: (e) =>
          e.reason === "NotFound"
            ? Effect.logDebug(`[cache] no cache file at ${file}`).pipe(
                Effect.as(emptySnapshot),
              )
            : Effect.logWarning(`[cache] cannot read ${file}: ${e.message}`).pipe(
                Effect.as(emptySnapshot),
              ),
        BadArgument: (e) =>
          Effect.logWarning(`[cache] cannot read ${file}: ${e.message}`).pipe(
            Effect.as(emptySnapshot),
          ),
      }),
    );

    const save = (snapshot: CacheSnapshot) =>
      Effect.gen(function* () {
        const suffix = yield* Random.nextIntBetween(0, 1_000_000_000);
        const temp = path.join(
          path.dirname(file),
          `.${path.basename(file)}.${suffix}.tmp`,
        );
        yield* fs.writeFileString(temp, encodeCacheFile(snapshot)).pipe(
          Effect.zipRight(fs.rename(temp, file)),
          Effect.tapError(() => fs.remove(temp).pipe(Effect.ignore)),
        );
        yield* Effect.logDebug(`[cache] wrote ${snapshot.size} entries to ${file}`);
      }).pipe(
        Effect.mapError(
          (e) => new CacheWriteError({ path: file, message: e.message }),
        ),
      );

    return { load, save };
  });
}

export const CacheStoreLive = Layer.effect(
  CacheStore,
  Effect.gen(function* () {
    const file = yield* Config.string("TICKER_CACHE_FILE").pipe(
      Config.withDefault("cache.json"),
    );
    return yield* makeFileCacheStore(file);
  }),
);
