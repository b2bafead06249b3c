// Field fetcher: assembles one ticker's MetricFields from up to five
// FinancialApi calls. No caching here; see orchestrator.ts.

import { Clock, Context, Effect, Layer, Schedule } from "effect";
import type { ColumnSettings, MetricFields, TickerSpec } from "./domain.ts";
import {
  type CandleWindow,
  FinancialApi,
  type FinancialApiError,
  NetworkError,
} from "./financial-api.ts";

// --- Service ---

export class FieldFetcher extends Context.Tag("FieldFetcher")<
  FieldFetcher,
  {
    /** Fails only when the quote cannot be fetched. Every other field is
     *  best-effort and comes back null on failure. */
    readonly fetch: (
      spec: TickerSpec,
      columns: ColumnSettings,
    ) => Effect.Effect<MetricFields, FinancialApiError>;
  }
>() {}

// --- Pure helpers ---

const DAY_SECONDS = 86_400;

export function percentChange(current: number, base: number | null): number | null {
  if (base === null || base === 0) return null;
  return ((current - base) / base) * 100;
}

/** Jan 1 (UTC) of the current year, padded to catch the first trading day. */
export function ytdWindow(nowMs: number): CandleWindow {
  const year = new Date(nowMs).getUTCFullYear();
  const from = Date.UTC(year, 0, 1) / 1000;
  return { from, to: from + 10 * DAY_SECONDS };
}

/** Ten 365-day years before today's UTC midnight, padded by five days. */
export function tenYearWindow(nowMs: number): CandleWindow {
  const today = new Date(nowMs);
  const midnight =
    Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate()) /
    1000;
  const from = midnight - 3650 * DAY_SECONDS;
  return { from, to: from + 5 * DAY_SECONDS };
}

const firstClose = (closes: ReadonlyArray<number>): number | null =>
  closes.length > 0 ? closes[0] : null;

// --- Call policy ---

const CALL_TIMEOUT = "10 seconds";

function withCallPolicy<A>(
  label: string,
  call: Effect.Effect<A, FinancialApiError>,
): Effect.Effect<A, FinancialApiError> {
  return call.pipe(
    Effect.timeoutFail({
      duration: CALL_TIMEOUT,
      onTimeout: () =>
        new NetworkError({ message: `${label}: request timed out` }),
    }),
    Effect.retry({
      while: (e) => e._tag === "NetworkError",
      schedule: Schedule.exponential("1 second").pipe(
        Schedule.compose(Schedule.recurs(2)),
      ),
    }),
  );
}

function bestEffort<A>(
  label: string,
  call: Effect.Effect<A, FinancialApiError>,
): Effect.Effect<A | null> {
  return withCallPolicy(label, call).pipe(
    Effect.catchAll((e) =>
      Effect.logDebug(`[fetch] ${label} unavailable: ${e._tag}`).pipe(
        Effect.as(null),
      ),
    ),
  );
}

// --- Implementation ---

export function makeFieldFetcher(
  api: Context.Tag.Service<FinancialApi>,
): Context.Tag.Service<FieldFetcher> {
  return {
    fetch: (spec, columns) =>
      Effect.gen(function* () {
        const { symbol } = spec;
        const quote = yield* withCallPolicy(
          `${symbol} quote`,
          api.getQuote(symbol),
        );
        const now = yield* Clock.currentTimeMillis;

        const resolvedName =
          spec.displayName === undefined
            ? yield* bestEffort(`${symbol} profile`, api.getProfileName(symbol))
            : null;
        const financials = yield* bestEffort(
          `${symbol} financials`,
          api.getBasicFinancials(symbol),
        );
        const ytdCloses = columns.ytdChange
          ? yield* bestEffort(
              `${symbol} ytd candles`,
              api.getDailyCloses(symbol, ytdWindow(now)),
            )
          : null;
        const tenYearCloses = columns.tenYearChange
          ? yield* bestEffort(
              `${symbol} 10y candles`,
              api.getDailyCloses(symbol, tenYearWindow(now)),
            )
          : null;

        return {
          price: quote.current,
          dailyChange: percentChange(quote.current, quote.previousClose),
          eps: financials?.eps ?? null,
          peRatio: financials?.peRatio ?? null,
          dividend: financials?.dividendYield ?? null,
          ytdChange: percentChange(
            quote.current,
            ytdCloses === null ? null : firstClose(ytdCloses),
          ),
          tenYearChange: percentChange(
            quote.current,
            tenYearCloses === null ? null : firstClose(tenYearCloses),
          ),
          resolvedName,
        } satisfies MetricFields;
      }),
  };
}

export const FieldFetcherLive = Layer.effect(
  FieldFetcher,
  Effect.map(FinancialApi, makeFieldFetcher),
);
