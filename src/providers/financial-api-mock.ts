// FinancialApiTest: offline implementation of FinancialApi for development.

import { Effect, Layer } from "effect";
import {
  type BasicFinancials,
  FinancialApi,
  type Quote,
  SymbolNotFound,
} from "../financial-api.ts";

// --- Sample data ---

interface SampleTicker {
  readonly quote: Quote;
  readonly name: string | null;
  readonly financials: BasicFinancials;
  readonly closes: ReadonlyArray<number>;
}

const samples: Record<string, SampleTicker> = {
  AAPL: {
    quote: { current: 225.3, previousClose: 221.85 },
    name: "Apple Inc",
    financials: { eps: 6.08, peRatio: 37.05, dividendYield: 0.44 },
    closes: [185.64, 184.25],
  },
  MSFT: {
    quote: { current: 415.1, previousClose: 418.9 },
    name: "Microsoft Corp",
    financials: { eps: 11.8, peRatio: 35.18, dividendYield: 0.79 },
    closes: [370.87, 370.6],
  },
  VOO: {
    quote: { current: 512.4, previousClose: 510.02 },
    name: "Vanguard S&P 500 ETF",
    financials: { eps: null, peRatio: null, dividendYield: 1.28 },
    closes: [434.88, 436.1],
  },
};

const lookup = (
  symbol: string,
): Effect.Effect<SampleTicker, SymbolNotFound> => {
  const sample = samples[symbol.toUpperCase()];
  return sample !== undefined
    ? Effect.succeed(sample)
    : Effect.fail(new SymbolNotFound({ symbol }));
};

// --- Mock layer ---

export const FinancialApiTestLive = Layer.succeed(
  FinancialApi,
  FinancialApi.of({
    getQuote: (symbol) => lookup(symbol).pipe(Effect.map((s) => s.quote)),
    getProfileName: (symbol) => lookup(symbol).pipe(Effect.map((s) => s.name)),
    getBasicFinancials: (symbol) =>
      lookup(symbol).pipe(Effect.map((s) => s.financials)),
    getDailyCloses: (symbol) => lookup(symbol).pipe(Effect.map((s) => s.closes)),
  }),
);
