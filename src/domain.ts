// Pure domain types: no framework dependency, no I/O.

export interface TickerSpec {
  readonly symbol: string; // trimmed, uppercase
  readonly displayName?: string;
}

export interface MetricFields {
  readonly price: number | null;
  readonly dailyChange: number | null;
  readonly eps: number | null;
  readonly peRatio: number | null;
  readonly dividend: number | null;
  readonly ytdChange: number | null;
  readonly tenYearChange: number | null;
  readonly resolvedName: string | null;
}

export interface CacheEntry {
  readonly symbol: string;
  readonly fetchedAt: number; // epoch ms
  readonly fields: MetricFields;
}

export type CacheSnapshot = ReadonlyMap<string, CacheEntry>;

export const emptySnapshot: CacheSnapshot = new Map();

// --- Settings ---

export interface ColumnSettings {
  readonly eps: boolean;
  readonly peRatio: boolean;
  readonly dividend: boolean;
  readonly ytdChange: boolean;
  readonly tenYearChange: boolean;
}

export interface CacheSettings {
  readonly enabled: boolean;
  readonly intervalMinutes: number;
}

export interface Settings {
  readonly columns: ColumnSettings;
  readonly cache: CacheSettings;
}

export const defaultSettings: Settings = {
  columns: {
    eps: false,
    peRatio: false,
    dividend: false,
    ytdChange: false,
    tenYearChange: false,
  },
  cache: { enabled: false, intervalMinutes: 60 },
};

// --- Render boundary ---

export interface MetricRow {
  readonly _tag: "MetricRow";
  readonly symbol: string;
  readonly name: string;
  readonly fields: MetricFields;
  readonly fetchedAt: number;
  readonly stale: boolean;
}

export interface ErrorRow {
  readonly _tag: "ErrorRow";
  readonly symbol: string;
  readonly name: string;
  readonly reason: string;
}

export type TickerRecord = MetricRow | ErrorRow;

/** Configured name first, then the one the API resolved, then the symbol. */
export function displayNameFor(
  spec: TickerSpec,
  fields: MetricFields | undefined,
): string {
  return spec.displayName ?? fields?.resolvedName ?? spec.symbol;
}
