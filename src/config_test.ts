import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { loadRunConfig, normalizeSymbol, parseSettings, parseTickers } from "./config.ts";
import { defaultSettings } from "./domain.ts";

// --- parseTickers ---

describe("parseTickers", () => {
  it("accepts plain symbols and objects with names", () => {
    const parsed = parseTickers([" aapl ", { ticker: "voo", name: "S&P 500" }]);

    expect(parsed.value).toEqual([
      { symbol: "AAPL" },
      { symbol: "VOO", displayName: "S&P 500" },
    ]);
    expect(parsed.warnings).toEqual([]);
  });

  it("treats a null name as no name", () => {
    expect(parseTickers([{ ticker: "MSFT", name: null }]).value).toEqual([
      { symbol: "MSFT" },
    ]);
  });

  it("skips invalid entries with a warning", () => {
    const parsed = parseTickers(["AAPL", 42, { name: "No ticker" }, "  "]);

    expect(parsed.value).toEqual([{ symbol: "AAPL" }]);
    expect(parsed.warnings).toEqual([
      "Invalid ticker entry 42, skipping",
      'Invalid ticker entry {"name":"No ticker"}, skipping',
      'Invalid ticker entry "  ", skipping',
    ]);
  });

  it("keeps the ticker but drops a non-string name", () => {
    const parsed = parseTickers([{ ticker: "tsla", name: 7 }]);

    expect(parsed.value).toEqual([{ symbol: "TSLA" }]);
    expect(parsed.warnings).toEqual(["Invalid name for ticker TSLA, ignoring it"]);
  });

  it("keeps duplicate symbols in order", () => {
    expect(parseTickers(["AAPL", "MSFT", "aapl"]).value).toEqual([
      { symbol: "AAPL" },
      { symbol: "MSFT" },
      { symbol: "AAPL" },
    ]);
  });

  it("rejects a document that is not a list", () => {
    expect(parseTickers({ tickers: ["AAPL"] })).toEqual({
      value: [],
      warnings: ["Tickers must be a list"],
    });
  });
});

describe("normalizeSymbol", () => {
  it("trims and upper-cases", () => {
    expect(normalizeSymbol("  brk.b\n")).toBe("BRK.B");
  });
});

// --- parseSettings ---

describe("parseSettings", () => {
  it("reads columns and cache settings", () => {
    const parsed = parseSettings({
      columns: { eps: true, pe_ratio: true, ten_year_change: true },
      cache: { enabled: true, interval: 15 },
    });

    expect(parsed.value).toEqual({
      columns: {
        eps: true,
        peRatio: true,
        dividend: false,
        ytdChange: false,
        tenYearChange: true,
      },
      cache: { enabled: true, intervalMinutes: 15 },
    });
    expect(parsed.warnings).toEqual([]);
  });

  it("defaults everything for an empty object", () => {
    expect(parseSettings({})).toEqual({ value: defaultSettings, warnings: [] });
  });

  it("falls back per value and says so", () => {
    const parsed = parseSettings({
      columns: { dividend: "yes" },
      cache: { enabled: true, interval: 0 },
    });

    expect(parsed.value.columns.dividend).toBe(false);
    expect(parsed.value.cache).toEqual({ enabled: true, intervalMinutes: 60 });
    expect(parsed.warnings).toEqual([
      'Invalid value for columns.dividend: "yes", using false',
      "Invalid value for cache.interval: 0, using 60",
    ]);
  });

  it("rejects fractional intervals", () => {
    const parsed = parseSettings({ cache: { interval: 2.5 } });

    expect(parsed.value.cache.intervalMinutes).toBe(60);
    expect(parsed.warnings).toEqual(["Invalid value for cache.interval: 2.5, using 60"]);
  });

  it("ignores a section of the wrong shape", () => {
    const parsed = parseSettings({ columns: [true], cache: { enabled: true } });

    expect(parsed.value.columns).toEqual(defaultSettings.columns);
    expect(parsed.value.cache.enabled).toBe(true);
    expect(parsed.warnings).toEqual(["Invalid 'columns' section in settings, using defaults"]);
  });

  it("uses the defaults for a document that is not an object", () => {
    expect(parseSettings("cache")).toEqual({
      value: defaultSettings,
      warnings: ["Settings must be an object, using defaults"],
    });
  });
});

// --- loadRunConfig ---

function loadFrom(files: Record<string, string>) {
  return Effect.runPromise(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const dir = yield* fs.makeTempDirectoryScoped();
      for (const [name, text] of Object.entries(files)) {
        yield* fs.writeFileString(`${dir}/${name}`, text);
      }
      return yield* loadRunConfig({
        tickers: `${dir}/tickers.json`,
        settings: `${dir}/settings.json`,
      });
    }).pipe(Effect.scoped, Effect.provide(NodeContext.layer)),
  );
}

describe("loadRunConfig", () => {
  it("reads both files", async () => {
    const config = await loadFrom({
      "tickers.json": '["AAPL", {"ticker": "VOO", "name": "S&P 500"}]',
      "settings.json": '{"columns": {"eps": true}, "cache": {"enabled": true, "interval": 30}}',
    });

    expect(config.tickers).toEqual([
      { symbol: "AAPL" },
      { symbol: "VOO", displayName: "S&P 500" },
    ]);
    expect(config.settings.columns.eps).toBe(true);
    expect(config.settings.cache).toEqual({ enabled: true, intervalMinutes: 30 });
  });

  it("uses the default settings when the settings file is missing", async () => {
    const config = await loadFrom({ "tickers.json": '["AAPL"]' });

    expect(config.settings).toEqual(defaultSettings);
    expect(config.tickers).toEqual([{ symbol: "AAPL" }]);
  });

  it("yields no tickers when the tickers file is missing or malformed", async () => {
    expect((await loadFrom({})).tickers).toEqual([]);
    expect((await loadFrom({ "tickers.json": "[AAPL" })).tickers).toEqual([]);
  });
});
