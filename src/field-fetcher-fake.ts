// Scripted FieldFetcher: answers from a table and records every call.

import { Context, Effect, Ref } from "effect";
import type { MetricFields } from "./domain.ts";
import { FieldFetcher } from "./field-fetcher.ts";
import { type FinancialApiError, SymbolNotFound } from "./financial-api.ts";

export type Script = Readonly<Record<string, MetricFields | FinancialApiError>>;

export interface FakeFieldFetcher {
  readonly fetcher: Context.Tag.Service<FieldFetcher>;
  /** Symbols fetched so far, in call order. */
  readonly calls: Effect.Effect<ReadonlyArray<string>>;
  readonly setScript: (script: Script) => Effect.Effect<void>;
}

const isFailure = (
  answer: MetricFields | FinancialApiError,
): answer is FinancialApiError => "_tag" in answer;

export function makeFakeFieldFetcher(initial: Script): Effect.Effect<FakeFieldFetcher> {
  return Effect.gen(function* () {
    const script = yield* Ref.make(initial);
    const calls = yield* Ref.make<ReadonlyArray<string>>([]);

    const fetcher = FieldFetcher.of({
      fetch: (spec) =>
        Effect.gen(function* () {
          yield* Ref.update(calls, (c) => [...c, spec.symbol]);
          const answer = (yield* Ref.get(script))[spec.symbol];
          if (answer === undefined) {
            return yield* Effect.fail(new SymbolNotFound({ symbol: spec.symbol }));
          }
          if (isFailure(answer)) return yield* Effect.fail(answer);
          // Like the live fetcher, a configured name skips the profile lookup.
          return spec.displayName === undefined
            ? answer
            : { ...answer, resolvedName: null };
        }),
    });

    return {
      fetcher,
      calls: Ref.get(calls),
      setScript: (next) => Ref.set(script, next),
    };
  });
}

export function fields(overrides: Partial<MetricFields> = {}): MetricFields {
  return {
    price: null,
    dailyChange: null,
    eps: null,
    peRatio: null,
    dividend: null,
    ytdChange: null,
    tenYearChange: null,
    resolvedName: null,
    ...overrides,
  };
}
