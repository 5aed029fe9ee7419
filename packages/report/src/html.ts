/**
 * @lpvault/report — Report Renderer.
 *
 * Turns AnalyticsRecords into one self-contained HTML page: inline CSS
 * and SVG, no scripts, no external assets. Every interpolated string is
 * escaped.
 */

import { daysBetween, summarize } from "@lpvault/analytics";
import type {
  AnalyticsRecord,
  AnalyticsSummary,
  CalendarDate,
  ReportArtifact,
  ValueBasis,
} from "@lpvault/types";
import { formatAmount, formatDecimal, formatPercent, MISSING } from "./format.js";
import { RED, escapeHtml, svgAreaChart, svgBarChart, svgHistogram, svgLineChart } from "./svg.js";

export const REPORT_FILE_NAME = "report.html";

/** Fewer records than this render the insufficient-data page */
export const MIN_RECORDS_FOR_CHARTS = 2;

/**
 * A partition the history loader could not read.
 */
export interface SkippedDay {
  readonly date: CalendarDate;
  readonly code: string;
  readonly message: string;
}

export interface ReportMetadata {
  /** Date of the run; the artifact is filed under it */
  readonly date: CalendarDate;
  readonly vaultName: string;
  readonly sourceUrl: string;
  /** Unit label for amounts ("OX") */
  readonly unit: string;
  readonly basis: ValueBasis;
  readonly generatedAt: Date;
  readonly skipped?: readonly SkippedDay[];
}

const CHART_WIDTH = 720;
const CHART_HEIGHT = 220;

// ═══════════════════════════════════════
// Render
// ═══════════════════════════════════════

export function render(records: readonly AnalyticsRecord[], metadata: ReportMetadata): ReportArtifact {
  const summary = summarize(records);
  const insufficientData = records.length < MIN_RECORDS_FOR_CHARTS;

  const sections = insufficientData
    ? [insufficientSection(records.length)]
    : [summarySection(summary, metadata), chartsSection(records, metadata)];

  const html = page(metadata, [
    header(summary, metadata),
    skippedNotice(metadata.skipped ?? []),
    ...sections,
    detailSection(records, metadata),
  ]);

  return {
    date: metadata.date,
    fileName: REPORT_FILE_NAME,
    html,
    insufficientData,
  };
}

// ═══════════════════════════════════════
// Sections
// ═══════════════════════════════════════

function header(summary: AnalyticsSummary, metadata: ReportMetadata): string {
  const inception = summary.firstDate !== null
    ? ` · ${daysBetween(summary.firstDate, metadata.date)} days since inception`
    : "";

  return `<header>
  <h1>${escapeHtml(metadata.vaultName)}</h1>
  <p class="subtitle"><a href="${escapeHtml(metadata.sourceUrl)}">${escapeHtml(metadata.sourceUrl)}</a> · Generated ${escapeHtml(metadata.generatedAt.toISOString())}${inception}</p>
</header>`;
}

function skippedNotice(skipped: readonly SkippedDay[]): string {
  if (skipped.length === 0) return "";

  const items = skipped
    .map((s) => `<li>${escapeHtml(s.date)}: ${escapeHtml(s.code)} (${escapeHtml(s.message)})</li>`)
    .join("\n    ");

  return `<div class="section notice">
  <h2>${skipped.length} ${skipped.length === 1 ? "day" : "days"} skipped</h2>
  <ul>
    ${items}
  </ul>
</div>`;
}

function insufficientSection(count: number): string {
  return `<div class="section">
  <h2>Insufficient data</h2>
  <p>${count} ${count === 1 ? "snapshot is" : "snapshots are"} available; charts need at least ${MIN_RECORDS_FOR_CHARTS}.</p>
</div>`;
}

function summarySection(summary: AnalyticsSummary, metadata: ReportMetadata): string {
  const { latest, previous } = summary;
  const unit = metadata.unit;
  const share = (days: number, ratio: number | null) => `${days} (${ratio === null ? MISSING : `${(ratio * 100).toFixed(1)}%`})`;

  const valueChange = latest !== null && previous !== null ? latest.periodReturn : null;
  const latestPnl = latest?.cumulativePnl ?? null;
  const previousPnl = previous?.cumulativePnl ?? null;
  const pnlChange = latestPnl !== null && previousPnl !== null ? latestPnl - previousPnl : null;

  const rows: [string, string, string][] = [
    [basisLabel(metadata.basis), formatValue(latest?.value ?? null, metadata), formatPercent(valueChange)],
    ["Cumulative PnL", formatAmount(latest?.cumulativePnl ?? null, unit), formatAmount(pnlChange, unit)],
    ["Period PnL", formatAmount(latest?.periodPnl ?? null, unit), ""],
    ["Cumulative return", formatPercent(latest?.cumulativeReturn ?? null), ""],
    ["Drawdown", formatPercent(latest?.drawdown ?? null), ""],
    ["Rolling volatility", formatPercent(latest?.rollingVolatility ?? null), ""],
    ["Max cumulative PnL", formatAmount(summary.maxCumulativePnl, unit), ""],
    ["Min cumulative PnL", formatAmount(summary.minCumulativePnl, unit), ""],
    ["Median cumulative PnL", formatAmount(summary.medianCumulativePnl, unit), ""],
    ["Positive days", share(summary.positiveDays, summary.positiveShare), ""],
    ["Negative days", share(summary.negativeDays, summary.negativeShare), ""],
    ["Max drawdown", formatPercent(summary.maxDrawdown), ""],
  ];

  const body = rows
    .map(([label, value, change]) =>
      `<tr><th scope="row">${escapeHtml(label)}</th><td class="num">${escapeHtml(value)}</td><td class="num dim">${escapeHtml(change)}</td></tr>`,
    )
    .join("\n    ");

  return `<div class="section">
  <h2>Summary</h2>
  <table id="summary">
    <thead><tr><th>Metric</th><th class="num">Latest</th><th class="num">Change</th></tr></thead>
    <tbody>
    ${body}
    </tbody>
  </table>
</div>`;
}

function chartsSection(records: readonly AnalyticsRecord[], metadata: ReportMetadata): string {
  const unit = metadata.unit;
  const amount = (v: number) => formatAmount(v, unit);
  const points = (pick: (r: AnalyticsRecord) => number | null) =>
    records.map((r) => ({ label: r.date, value: pick(r) }));
  const dailyPnl = records.flatMap((r) => (r.periodPnl === null ? [] : [r.periodPnl]));

  const charts: [string, string][] = [
    ["Cumulative PnL", svgAreaChart({
      id: "cumulative-pnl",
      title: "Cumulative PnL",
      points: points((r) => r.cumulativePnl),
      width: CHART_WIDTH,
      height: CHART_HEIGHT,
      formatY: amount,
    })],
    ["Cumulative return", svgLineChart({
      title: "Cumulative return",
      points: points((r) => r.cumulativeReturn),
      width: CHART_WIDTH,
      height: CHART_HEIGHT,
      formatY: formatPercent,
    })],
    ["Drawdown", svgLineChart({
      title: "Drawdown",
      points: points((r) => (r.drawdown === null ? null : -r.drawdown)),
      width: CHART_WIDTH,
      height: CHART_HEIGHT,
      color: RED,
      formatY: formatPercent,
    })],
    ["Daily PnL", svgBarChart({
      title: "Daily PnL",
      points: points((r) => r.periodPnl),
      width: CHART_WIDTH,
      height: CHART_HEIGHT,
      formatY: amount,
    })],
    ["Daily PnL distribution", svgHistogram({
      title: "Daily PnL distribution",
      values: dailyPnl,
      width: CHART_WIDTH,
      height: CHART_HEIGHT,
      formatY: (v) => v.toFixed(0),
      formatX: amount,
    })],
  ];

  return charts
    .map(([title, svg]) => `<div class="section">
  <h2>${escapeHtml(title)}</h2>
  <div class="chart-container">${svg}</div>
</div>`)
    .join("\n");
}

function detailSection(records: readonly AnalyticsRecord[], metadata: ReportMetadata): string {
  if (records.length === 0) return "";

  const unit = metadata.unit;
  const rows = [...records]
    .reverse()
    .map((r) => `<tr><td>${escapeHtml(r.date)}</td>` +
      `<td class="num">${escapeHtml(formatValue(r.value, metadata))}</td>` +
      `<td class="num">${escapeHtml(formatPercent(r.periodReturn))}</td>` +
      `<td class="num">${escapeHtml(formatPercent(r.cumulativeReturn))}</td>` +
      `<td class="num">${escapeHtml(formatAmount(r.periodPnl, unit))}</td>` +
      `<td class="num">${escapeHtml(formatAmount(r.cumulativePnl, unit))}</td>` +
      `<td class="num">${escapeHtml(formatPercent(r.drawdown))}</td></tr>`)
    .join("\n    ");

  return `<div class="section">
  <h2>History</h2>
  <table id="detail">
    <thead><tr><th>Date</th><th class="num">${escapeHtml(basisLabel(metadata.basis))}</th><th class="num">Return</th><th class="num">Cumulative</th><th class="num">PnL</th><th class="num">Cumulative PnL</th><th class="num">Drawdown</th></tr></thead>
    <tbody>
    ${rows}
    </tbody>
  </table>
</div>`;
}

// ═══════════════════════════════════════
// Helpers
// ═══════════════════════════════════════

function page(metadata: ReportMetadata, sections: readonly string[]): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(metadata.vaultName)} · ${escapeHtml(metadata.date)}</title>
<style>
${CSS}
</style>
</head>
<body>
${sections.filter((s) => s !== "").join("\n\n")}
</body>
</html>
`;
}

function basisLabel(basis: ValueBasis): string {
  switch (basis) {
    case "sharePrice": return "Share price";
    case "balance": return "Balance";
  }
}

function formatValue(value: number | null, metadata: ReportMetadata): string {
  return metadata.basis === "balance" ? formatAmount(value, metadata.unit) : formatDecimal(value);
}

// ═══════════════════════════════════════
// Inline CSS
// ═══════════════════════════════════════

const CSS = `
:root {
  --bg: #fafafa; --bg2: #fff; --fg: #1a1a2e; --fg2: #555;
  --border: #e0e0e0; --accent: #6366f1; --red: #ef4444; --green: #22c55e;
  --radius: 8px;
}
@media (prefers-color-scheme: dark) {
  :root { --bg: #0f0f1a; --bg2: #1a1a2e; --fg: #e4e4e7; --fg2: #a1a1aa; --border: #2a2a3e; --accent: #818cf8; }
}
* { box-sizing: border-box; margin: 0; padding: 0; }
body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif;
  background: var(--bg); color: var(--fg); line-height: 1.6; padding: 2rem; max-width: 1100px; margin: 0 auto; }
header { margin-bottom: 2rem; }
h1 { font-size: 1.5rem; font-weight: 600; }
h2 { font-size: 1.1rem; font-weight: 600; margin-bottom: 1rem; }
.subtitle { color: var(--fg2); font-size: 0.875rem; }
.subtitle a { color: var(--accent); }
.section { background: var(--bg2); border: 1px solid var(--border); border-radius: var(--radius);
  padding: 1.5rem; margin-bottom: 1.5rem; }
.notice { border-color: var(--red); }
.notice ul { padding-left: 1.25rem; font-size: 0.85rem; }
.chart-container { overflow-x: auto; }
table { width: 100%; border-collapse: collapse; font-size: 0.85rem; }
th { text-align: left; padding: 0.5rem 0.75rem; border-bottom: 2px solid var(--border);
  color: var(--fg2); font-weight: 500; font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.03em; }
tbody th { text-transform: none; font-size: 0.85rem; border-bottom: 1px solid var(--border); }
td { padding: 0.5rem 0.75rem; border-bottom: 1px solid var(--border); }
tr:last-child td, tr:last-child th { border-bottom: none; }
.num { text-align: right; font-variant-numeric: tabular-nums; }
.dim { color: var(--fg2); }
svg text { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', system-ui, sans-serif; }
@media print { body { padding: 1rem; } .section { break-inside: avoid; } }
`;
