// Pure formatting functions: no I/O.

import type { ColumnSettings, MetricFields, TickerRecord } from "./domain.ts";
import type { FinancialApiError } from "./financial-api.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

const visibleWidth = (text: string): number => stripAnsi(text).length;

// --- Cells ---

export function formatNumber(value: number | null): string {
  return value === null ? "N/A" : value.toFixed(2);
}

export function formatPercent(value: number | null): string {
  if (value === null) return "N/A";
  const text = `${value.toFixed(2)}%`;
  if (value > 0) return `${GREEN}${text}${RESET}`;
  if (value < 0) return `${RED}${text}${RESET}`;
  return text;
}

// --- Failure reasons ---

export function failureReason(error: FinancialApiError): string {
  switch (error._tag) {
    case "NetworkError":
      return "Network error";
    case "RateLimited":
      return "Rate limited";
    case "SymbolNotFound":
      return "Symbol not found";
    case "ParseError":
      return "Unexpected response";
    case "HttpError":
      if (error.status === 404) return "Symbol not found";
      if (error.status === 429) return "Rate limited";
      if (error.status >= 500 && error.status < 600) return "Server error";
      return `HTTP ${error.status}`;
  }
}

// --- Table ---

type Align = "left" | "right";

interface Column {
  readonly header: string;
  readonly align: Align;
  readonly cell: (fields: MetricFields) => string;
}

const optionalColumns: ReadonlyArray<readonly [keyof ColumnSettings, Column]> = [
  ["eps", { header: "EPS", align: "right", cell: (f) => formatNumber(f.eps) }],
  ["peRatio", { header: "PE Ratio", align: "right", cell: (f) => formatNumber(f.peRatio) }],
  ["dividend", { header: "Dividend", align: "right", cell: (f) => formatNumber(f.dividend) }],
  ["ytdChange", { header: "YTD % Change", align: "right", cell: (f) => formatPercent(f.ytdChange) }],
  ["tenYearChange", { header: "10-Year % Change", align: "right", cell: (f) => formatPercent(f.tenYearChange) }],
];

function pad(text: string, width: number, align: Align): string {
  const fill = " ".repeat(Math.max(0, width - visibleWidth(text)));
  return align === "left" ? text + fill : fill + text;
}

interface Row {
  readonly lead: readonly [string, string];
  readonly cells: ReadonlyArray<string>;
  readonly error: string | null;
}

export function formatTable(
  records: ReadonlyArray<TickerRecord>,
  columns: ColumnSettings,
): string {
  const metricColumns: ReadonlyArray<Column> = [
    { header: "Current Price", align: "right", cell: (f) => formatNumber(f.price) },
    { header: "Daily % Change", align: "right", cell: (f) => formatPercent(f.dailyChange) },
    ...optionalColumns.filter(([key]) => columns[key]).map(([, c]) => c),
  ];

  const rows = records.map((record): Row => {
    if (record._tag === "ErrorRow") {
      return {
        lead: [record.symbol, record.name],
        cells: [],
        error: `${RED}✗ ${record.reason}${RESET}`,
      };
    }
    const name = record.stale
      ? `${record.name} ${DIM}(stale)${RESET}`
      : record.name;
    return {
      lead: [record.symbol, name],
      cells: metricColumns.map((c) => c.cell(record.fields)),
      error: null,
    };
  });

  const headerRow: Row = {
    lead: ["Ticker", "Company Name"],
    cells: metricColumns.map((c) => c.header),
    error: null,
  };
  const all = [headerRow, ...rows];
  const leadWidths = [0, 1].map((i) =>
    Math.max(...all.map((r) => visibleWidth(r.lead[i]))),
  );
  const cellWidths = metricColumns.map((_, i) =>
    Math.max(...all.map((r) => (i < r.cells.length ? visibleWidth(r.cells[i]) : 0))),
  );

  const line = (row: Row) => {
    const text = [
      pad(row.lead[0], leadWidths[0], "left"),
      pad(row.lead[1], leadWidths[1], "left"),
      ...row.cells.map((cell, i) => pad(cell, cellWidths[i], metricColumns[i].align)),
    ].join("  ");
    return row.error === null ? `  ${text}` : `  ${text}  ${row.error}`;
  };

  const ruleWidth =
    leadWidths[0] +
    leadWidths[1] +
    cellWidths.reduce((sum, w) => sum + w, 0) +
    2 * (cellWidths.length + 1);

  return [
    "",
    `${BOLD}${line(headerRow)}${RESET}`,
    `${DIM}  ${"─".repeat(ruleWidth)}${RESET}`,
    ...rows.map(line),
    "",
  ].join("\n");
}

// --- Run-level messages ---

export function formatWarnings(warnings: ReadonlyArray<string>): string {
  return warnings.map((w) => `${YELLOW}  ! ${w}${RESET}`).join("\n");
}

export function formatRunError(message: string): string {
  return ["", `${RED}${BOLD}  ✗ ${message}${RESET}`, ""].join("\n");
}
