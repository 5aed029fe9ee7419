/**
 * @lpvault/report
 *
 * Self-contained HTML report for a vault's analytics.
 */

export { render, REPORT_FILE_NAME, MIN_RECORDS_FOR_CHARTS } from "./html.js";
export type { ReportMetadata, SkippedDay } from "./html.js";
export { formatAmount, formatPercent, formatDecimal, MISSING } from "./format.js";
export {
  svgLineChart,
  svgAreaChart,
  svgBarChart,
  svgHistogram,
  binCounts,
  escapeHtml,
} from "./svg.js";
export type { ChartPoint } from "./svg.js";
