import { Command, Options } from "@effect/cli";
import { FetchHttpClient, FileSystem } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  ConfigError,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
} from "effect";
import { CacheStoreLive } from "./src/cache-store.ts";
import { loadRunConfig } from "./src/config.ts";
import { makeDaemon } from "./src/daemon.ts";
import { FieldFetcherLive } from "./src/field-fetcher.ts";
import { formatRunError, formatTable, formatWarnings } from "./src/format.ts";
import { runOnce } from "./src/program.ts";
import { FinnhubLive } from "./src/providers/finnhub.ts";
import { FinancialApiTestLive } from "./src/providers/financial-api-mock.ts";

// --- CLI ---

const refresh = Options.boolean("refresh").pipe(
  Options.withDescription("Fetch fresh data for every ticker, ignoring cache freshness"),
);

const daemon = Options.boolean("daemon").pipe(
  Options.withDescription("Refresh the cache in the background every cache interval"),
);

const tickersFile = Options.text("tickers").pipe(
  Options.withDescription("Path to the tickers JSON file"),
  Options.withDefault("tickers.json"),
);

const settingsFile = Options.text("settings").pipe(
  Options.withDescription("Path to the settings JSON file"),
  Options.withDefault("settings.json"),
);

/** Pause between fetches inside one daemon pass, to stay under the rate limit. */
const DAEMON_STAGGER = "1 second";

const command = Command.make(
  "ticker-metrics",
  { refresh, daemon, tickersFile, settingsFile },
).pipe(
  Command.withHandler(({ refresh, daemon, tickersFile, settingsFile }) =>
    Effect.gen(function* () {
      const paths = { tickers: tickersFile, settings: settingsFile };

      if (daemon) {
        const fs = yield* FileSystem.FileSystem;
        const d = yield* makeDaemon({
          loadConfig: loadRunConfig(paths).pipe(
            Effect.provideService(FileSystem.FileSystem, fs),
          ),
          stagger: DAEMON_STAGGER,
        });
        return yield* d.run;
      }

      const config = yield* loadRunConfig(paths);
      if (config.tickers.length === 0) {
        return yield* Console.error(formatRunError("No tickers to process."));
      }

      const { records, warnings } = yield* runOnce(config, {
        forceRefresh: refresh,
      });
      yield* Console.log(formatTable(records, config.settings.columns));
      if (warnings.length > 0) {
        yield* Console.error(formatWarnings(warnings));
      }
    })
  ),
);

// --- Layers ---
// Set METRICS_PROVIDER to "finnhub" (default) or "test".

const FinancialApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("METRICS_PROVIDER").pipe(
      Config.withDefault("finnhub"),
    );
    return provider === "test" ? FinancialApiTestLive : FinnhubLive;
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

const LoggerLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
    Effect.map(Logger.minimumLogLevel),
  ),
);

const AppLive = Layer.mergeAll(
  FieldFetcherLive.pipe(Layer.provide(FinancialApiLive)),
  CacheStoreLive,
  LoggerLive,
);

// --- Run ---

const cli = Command.run(command, {
  name: "ticker-metrics",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(AppLive),
  Effect.catchIf(ConfigError.isConfigError, (e) =>
    Console.error(formatRunError(`Configuration error: ${e.toString()}`)),
  ),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
