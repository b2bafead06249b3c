// In-memory CacheStore: counts reads and writes so tests can assert on them.

import { Context, Effect, Ref } from "effect";
import type { CacheSnapshot } from "./domain.ts";
import { CacheStore, CacheWriteError } from "./cache-store.ts";

export interface MemoryCacheStore {
  readonly store: Context.Tag.Service<CacheStore>;
  readonly contents: Effect.Effect<CacheSnapshot>;
  readonly reads: Effect.Effect<number>;
  readonly writes: Effect.Effect<number>;
  /** Replace the stored snapshot behind the store's back (another process). */
  readonly overwrite: (snapshot: CacheSnapshot) => Effect.Effect<void>;
}

export function makeMemoryCacheStore(
  initial: CacheSnapshot,
  options: { readonly failWrites?: boolean } = {},
): Effect.Effect<MemoryCacheStore> {
  return Effect.gen(function* () {
    const contents = yield* Ref.make(initial);
    const reads = yield* Ref.make(0);
    const writes = yield* Ref.make(0);

    const store = CacheStore.of({
      load: Ref.update(reads, (n) => n + 1).pipe(
        Effect.zipRight(Ref.get(contents)),
      ),
      save: (snapshot) =>
        Effect.gen(function* () {
          yield* Ref.update(writes, (n) => n + 1);
          if (options.failWrites === true) {
            return yield* Effect.fail(
              new CacheWriteError({ path: "memory", message: "permission denied" }),
            );
          }
          yield* Ref.set(contents, snapshot);
        }),
    });

    return {
      store,
      contents: Ref.get(contents),
      reads: Ref.get(reads),
      writes: Ref.get(writes),
      overwrite: (snapshot) => Ref.set(contents, snapshot),
    };
  });
}
