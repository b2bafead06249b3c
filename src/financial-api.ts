// Financial API: service definition and domain errors.

import { Context, Data, Effect } from "effect";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class RateLimited extends Data.TaggedError("RateLimited")<{
  readonly message: string;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type FinancialApiError =
  | NetworkError
  | HttpError
  | RateLimited
  | ParseError
  | SymbolNotFound;

// --- Responses ---

export interface Quote {
  readonly current: number;
  readonly previousClose: number | null;
}

export interface BasicFinancials {
  readonly eps: number | null;
  readonly peRatio: number | null;
  readonly dividendYield: number | null;
}

/** Inclusive range of unix seconds, as the candle endpoint takes it. */
export interface CandleWindow {
  readonly from: number;
  readonly to: number;
}

// --- Service ---

export class FinancialApi extends Context.Tag("FinancialApi")<
  FinancialApi,
  {
    readonly getQuote: (
      symbol: string,
    ) => Effect.Effect<Quote, FinancialApiError>;
    /** Company name, or null when the profile has none. */
    readonly getProfileName: (
      symbol: string,
    ) => Effect.Effect<string | null, FinancialApiError>;
    readonly getBasicFinancials: (
      symbol: string,
    ) => Effect.Effect<BasicFinancials, FinancialApiError>;
    /** Daily closes in the window, oldest first. Empty when there is no data. */
    readonly getDailyCloses: (
      symbol: string,
      window: CandleWindow,
    ) => Effect.Effect<ReadonlyArray<number>, FinancialApiError>;
  }
>() {}
