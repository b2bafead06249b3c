// Finnhub: implementation of FinancialApi.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Redacted, Schema } from "effect";
import {
  type BasicFinancials,
  FinancialApi,
  HttpError,
  NetworkError,
  ParseError,
  type Quote,
  RateLimited,
  SymbolNotFound,
} from "../financial-api.ts";

// --- Finnhub response schemas ---

const NullableNumber = Schema.optional(Schema.NullOr(Schema.Number));

const FinnhubQuote = Schema.Struct({
  c: Schema.Number,
  pc: NullableNumber,
});

const FinnhubProfile = Schema.Struct({
  name: Schema.optional(Schema.String),
});

const FinnhubMetrics = Schema.Struct({
  metric: Schema.optional(
    Schema.Struct({
      epsTTM: NullableNumber,
      peTTM: NullableNumber,
      currentDividendYieldTTM: NullableNumber,
    }),
  ),
});

const FinnhubCandles = Schema.Struct({
  s: Schema.String,
  c: Schema.optional(Schema.Array(Schema.Number)),
});

function decodeWith<A, I>(schema: Schema.Schema<A, I>, json: unknown) {
  return Schema.decodeUnknown(schema)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({ message: `Invalid response: ${schemaError.message}` }),
    ),
  );
}

// --- Decoders ---

/** Finnhub answers an unknown symbol with an all-zero quote, not a 404. */
export function decodeQuote(
  json: unknown,
  symbol: string,
): Effect.Effect<Quote, ParseError | SymbolNotFound> {
  return decodeWith(FinnhubQuote, json).pipe(
    Effect.flatMap(({ c, pc }) =>
      c === 0 && (pc ?? 0) === 0
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed({ current: c, previousClose: pc ?? null }),
    ),
  );
}

export function decodeProfileName(
  json: unknown,
): Effect.Effect<string | null, ParseError> {
  return decodeWith(FinnhubProfile, json).pipe(
    Effect.map(({ name }) =>
      name === undefined || name.trim() === "" ? null : name,
    ),
  );
}

export function decodeBasicFinancials(
  json: unknown,
): Effect.Effect<BasicFinancials, ParseError> {
  return decodeWith(FinnhubMetrics, json).pipe(
    Effect.map(({ metric }) => ({
      eps: metric?.epsTTM ?? null,
      peRatio: metric?.peTTM ?? null,
      dividendYield: metric?.currentDividendYieldTTM ?? null,
    })),
  );
}

export function decodeDailyCloses(
  json: unknown,
): Effect.Effect<ReadonlyArray<number>, ParseError> {
  return decodeWith(FinnhubCandles, json).pipe(
    Effect.flatMap(({ s, c }): Effect.Effect<ReadonlyArray<number>, ParseError> => {
      switch (s) {
        case "ok":
          return Effect.succeed(c ?? []);
        case "no_data":
          return Effect.succeed([]);
        default:
          return Effect.fail(
            new ParseError({ message: `Unexpected candle status '${s}'` }),
          );
      }
    }),
  );
}

// --- Finnhub layer ---

export const FinnhubLive = Layer.effect(
  FinancialApi,
  Effect.gen(function* () {
    const apiKey = yield* Config.redacted("FINNHUB_API_KEY");
    const baseUrl = yield* Config.string("FINNHUB_BASE_URL").pipe(
      Config.withDefault("https://finnhub.io/api/v1"),
    );
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(
        HttpClientRequest.setHeader("X-Finnhub-Token", Redacted.value(apiKey)),
      ),
    );

    const getJson = (path: string, params: Record<string, string>) =>
      Effect.gen(function* () {
        const query = new URLSearchParams(params).toString();
        const response = yield* client.get(`${baseUrl}${path}?${query}`);
        return yield* response.json;
      }).pipe(
        Effect.scoped,
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) => {
            if (e.reason !== "StatusCode") {
              return Effect.fail(
                new ParseError({ message: `JSON parse failed: ${e.message}` }),
              );
            }
            return e.response.status === 429
              ? Effect.fail(
                  new RateLimited({ message: `Rate limited on ${path}` }),
                )
              : Effect.fail(new HttpError({ status: e.response.status }));
          },
        }),
      );

    return FinancialApi.of({
      getQuote: (symbol) =>
        getJson("/quote", { symbol }).pipe(
          Effect.flatMap((json) => decodeQuote(json, symbol)),
        ),
      getProfileName: (symbol) =>
        getJson("/stock/profile2", { symbol }).pipe(
          Effect.flatMap(decodeProfileName),
        ),
      getBasicFinancials: (symbol) =>
        getJson("/stock/metric", { symbol, metric: "all" }).pipe(
          Effect.flatMap(decodeBasicFinancials),
        ),
      getDailyCloses: (symbol, window) =>
        getJson("/stock/candle", {
          symbol,
          resolution: "D",
          from: String(window.from),
          to: String(window.to),
        }).pipe(Effect.flatMap(decodeDailyCloses)),
    });
  }),
);
