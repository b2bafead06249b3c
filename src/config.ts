// Run configuration: tickers.json and settings.json.
//
// Nothing here fails the run. Bad entries are skipped, bad values fall back
// to the defaults in domain.ts, and every such decision is reported as a
// warning.

import { FileSystem } from "@effect/platform";
import { Effect, Predicate, Schema } from "effect";
import {
  defaultSettings,
  type Settings,
  type TickerSpec,
} from "./domain.ts";

export interface Parsed<A> {
  readonly value: A;
  readonly warnings: ReadonlyArray<string>;
}

export interface RunConfig {
  readonly tickers: ReadonlyArray<TickerSpec>;
  readonly settings: Settings;
}

export interface ConfigPaths {
  readonly tickers: string;
  readonly settings: string;
}

// --- Tickers ---

const TickerObject = Schema.Struct({
  ticker: Schema.String,
  name: Schema.optional(Schema.Unknown),
});

const isTickerObject = Schema.is(TickerObject);

export function normalizeSymbol(raw: string): string {
  return raw.trim().toUpperCase();
}

export function parseTickers(json: unknown): Parsed<ReadonlyArray<TickerSpec>> {
  if (!Array.isArray(json)) {
    return { value: [], warnings: ["Tickers must be a list"] };
  }

  const items: ReadonlyArray<unknown> = json;
  const tickers: TickerSpec[] = [];
  const warnings: string[] = [];

  for (const item of items) {
    const raw =
      typeof item === "string" ? item : isTickerObject(item) ? item.ticker : null;
    const symbol = raw === null ? "" : normalizeSymbol(raw);
    if (symbol === "") {
      warnings.push(`Invalid ticker entry ${JSON.stringify(item)}, skipping`);
      continue;
    }
    if (!isTickerObject(item) || item.name === undefined || item.name === null) {
      tickers.push({ symbol });
    } else if (typeof item.name === "string") {
      tickers.push({ symbol, displayName: item.name });
    } else {
      warnings.push(`Invalid name for ticker ${symbol}, ignoring it`);
      tickers.push({ symbol });
    }
  }

  return { value: tickers, warnings };
}

// --- Settings ---

const isBoolean = Schema.is(Schema.Boolean);
const isPositiveInt = Schema.is(Schema.Int.pipe(Schema.positive()));

type Section = { readonly [key: string]: unknown };

function section(
  root: Section,
  name: string,
  warnings: string[],
): Section {
  const value = root[name];
  if (value === undefined) return {};
  if (Predicate.isRecord(value)) return value;
  warnings.push(`Invalid '${name}' section in settings, using defaults`);
  return {};
}

function pick<A>(
  from: Section,
  key: string,
  label: string,
  guard: (u: unknown) => u is A,
  fallback: A,
  warnings: string[],
): A {
  const value = from[key];
  if (value === undefined) return fallback;
  if (guard(value)) return value;
  warnings.push(
    `Invalid value for ${label}: ${JSON.stringify(value)}, using ${JSON.stringify(fallback)}`,
  );
  return fallback;
}

export function parseSettings(json: unknown): Parsed<Settings> {
  if (!Predicate.isRecord(json)) {
    return {
      value: defaultSettings,
      warnings: ["Settings must be an object, using defaults"],
    };
  }

  const warnings: string[] = [];
  const columns = section(json, "columns", warnings);
  const cache = section(json, "cache", warnings);
  const defaults = defaultSettings;

  const column = (key: string, fallback: boolean) =>
    pick(columns, key, `columns.${key}`, isBoolean, fallback, warnings);

  const value: Settings = {
    columns: {
      eps: column("eps", defaults.columns.eps),
      peRatio: column("pe_ratio", defaults.columns.peRatio),
      dividend: column("dividend", defaults.columns.dividend),
      ytdChange: column("ytd_change", defaults.columns.ytdChange),
      tenYearChange: column("ten_year_change", defaults.columns.tenYearChange),
    },
    cache: {
      enabled: pick(
        cache,
        "enabled",
        "cache.enabled",
        isBoolean,
        defaults.cache.enabled,
        warnings,
      ),
      intervalMinutes: pick(
        cache,
        "interval",
        "cache.interval",
        isPositiveInt,
        defaults.cache.intervalMinutes,
        warnings,
      ),
    },
  };

  return { value, warnings };
}

// --- Loading ---

const decodeJsonText = Schema.decodeUnknown(Schema.parseJson());

const readJsonFile = (file: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs.readFileString(file);
    return yield* decodeJsonText(text);
  });

const reportWarnings = (file: string, warnings: ReadonlyArray<string>) =>
  Effect.forEach(warnings, (w) => Effect.logWarning(`[config] ${file}: ${w}`), {
    discard: true,
  });

export const loadTickers = (
  file: string,
): Effect.Effect<ReadonlyArray<TickerSpec>, never, FileSystem.FileSystem> =>
  readJsonFile(file).pipe(
    Effect.map(parseTickers),
    Effect.tap(({ warnings }) => reportWarnings(file, warnings)),
    Effect.map(({ value }) => value),
    Effect.catchAll((e) =>
      Effect.logError(`[config] Error loading tickers from ${file}: ${e.message}`).pipe(
        Effect.as([]),
      ),
    ),
  );

export const loadSettings = (
  file: string,
): Effect.Effect<Settings, never, FileSystem.FileSystem> =>
  readJsonFile(file).pipe(
    Effect.map(parseSettings),
    Effect.tap(({ warnings }) => reportWarnings(file, warnings)),
    Effect.map(({ value }) => value),
    Effect.catchAll((e) =>
      Effect.logWarning(
        `[config] Could not load settings from ${file}: ${e.message}. Using default settings.`,
      ).pipe(Effect.as(defaultSettings)),
    ),
  );

export const loadRunConfig = (
  paths: ConfigPaths,
): Effect.Effect<RunConfig, never, FileSystem.FileSystem> =>
  Effect.all({
    settings: loadSettings(paths.settings),
    tickers: loadTickers(paths.tickers),
  });
