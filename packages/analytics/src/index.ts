/**
 * @lpvault/analytics
 *
 * Returns, PnL, drawdown and rolling statistics derived from a History.
 */

export { compute, DEFAULT_VALUE_BASIS, DEFAULT_ROLLING_WINDOW } from "./compute.js";
export type { AnalyticsOptions } from "./compute.js";
export { summarize, daysBetween } from "./summary.js";
export { mean, median, sampleStdDev, defined } from "./stats.js";
