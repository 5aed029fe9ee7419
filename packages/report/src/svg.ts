/**
 * @lpvault/report — Inline SVG charts.
 *
 * Every chart is a standalone <svg> string with no scripts or external
 * references, so the report stays a single self-contained file.
 * Points with a null value leave a gap; nothing is interpolated.
 */

export const GREEN = "#22c55e";
export const RED = "#ef4444";
export const ACCENT = "#6366f1";

export interface ChartPoint {
  readonly label: string;
  readonly value: number | null;
}

interface ChartBase {
  readonly title: string;
  readonly width: number;
  readonly height: number;
  readonly formatY: (value: number) => string;
}

export interface LineChartOptions extends ChartBase {
  readonly points: readonly ChartPoint[];
  readonly color?: string;
}

export interface AreaChartOptions extends ChartBase {
  /** Prefix for clip-path ids; must be unique within the document */
  readonly id: string;
  readonly points: readonly ChartPoint[];
}

export interface BarChartOptions extends ChartBase {
  readonly points: readonly ChartPoint[];
}

export interface HistogramOptions extends ChartBase {
  readonly values: readonly number[];
  /** Default: 20 */
  readonly bins?: number;
  readonly formatX: (value: number) => string;
}

const PAD = { top: 16, right: 16, bottom: 28, left: 72 } as const;

// ═══════════════════════════════════════
// Charts
// ═══════════════════════════════════════

export function svgLineChart(options: LineChartOptions): string {
  const { points, width, height } = options;
  const values = definedValues(points);
  if (values.length === 0) return emptyChart(options);

  const domain = extent(values, false);
  const path = segments(points)
    .map((segment) =>
      segment
        .map(({ index, value }, i) =>
          `${i === 0 ? "M" : "L"}${coord(x(index, points.length, width))} ${coord(y(value, domain, height))}`,
        )
        .join(" "),
    )
    .join(" ");

  const body = `<path d="${path}" fill="none" stroke="${options.color ?? ACCENT}" stroke-width="2"/>`;
  return frame(options, domain, xLabels(points), body);
}

/**
 * Area between the series and zero, green above and red below.
 */
export function svgAreaChart(options: AreaChartOptions): string {
  const { points, width, height, id } = options;
  const values = definedValues(points);
  if (values.length === 0) return emptyChart(options);

  const domain = extent(values, true);
  const zero = y(0, domain, height);

  const areas: string[] = [];
  const lines: string[] = [];
  for (const segment of segments(points)) {
    const coords = segment.map(({ index, value }) => ({
      x: coord(x(index, points.length, width)),
      y: coord(y(value, domain, height)),
    }));
    const first = coords[0];
    const last = coords[coords.length - 1];
    if (first === undefined || last === undefined) continue;

    const line = coords.map((c, i) => `${i === 0 ? "M" : "L"}${c.x} ${c.y}`).join(" ");
    lines.push(line);
    areas.push(`M${first.x} ${coord(zero)} ${line.replace(/^M/, "L")} L${last.x} ${coord(zero)} Z`);
  }

  const area = areas.join(" ");
  const body = [
    "<defs>",
    `<clipPath id="${id}-above"><rect x="0" y="0" width="${width}" height="${coord(zero)}"/></clipPath>`,
    `<clipPath id="${id}-below"><rect x="0" y="${coord(zero)}" width="${width}" height="${coord(height - zero)}"/></clipPath>`,
    "</defs>",
    `<path d="${area}" fill="${GREEN}" fill-opacity="0.35" clip-path="url(#${id}-above)"/>`,
    `<path d="${area}" fill="${RED}" fill-opacity="0.35" clip-path="url(#${id}-below)"/>`,
    `<path d="${lines.join(" ")}" fill="none" stroke="${ACCENT}" stroke-width="1.5"/>`,
  ].join("");

  return frame(options, domain, xLabels(points), body);
}

/**
 * One bar per point, green for gains and red for losses.
 */
export function svgBarChart(options: BarChartOptions): string {
  const { points, width, height } = options;
  const values = definedValues(points);
  if (values.length === 0) return emptyChart(options);

  const domain = extent(values, true);
  const zero = y(0, domain, height);
  const slot = plotWidth(width) / points.length;

  const bars = points.map((point, i) => {
    if (point.value === null) return "";
    const top = y(point.value, domain, height);
    return rect(
      PAD.left + i * slot + slot * 0.1,
      Math.min(top, zero),
      slot * 0.8,
      Math.abs(top - zero),
      point.value < 0 ? RED : GREEN,
    );
  });

  return frame(options, domain, xLabels(points), bars.join(""));
}

/**
 * Distribution of `values` in equal-width bins, coloured by the sign of
 * each bin's midpoint.
 */
export function svgHistogram(options: HistogramOptions): string {
  const { values, width, height } = options;
  if (values.length === 0) return emptyChart(options);

  const counts = binCounts(values, options.bins ?? 20);
  const min = Math.min(...values);
  const max = Math.max(...values);
  const binWidth = (max - min) / counts.length;

  const domain: [number, number] = [0, Math.max(...counts)];
  const slot = plotWidth(width) / counts.length;

  const bars = counts.map((count, i) => {
    const top = y(count, domain, height);
    const midpoint = min + (i + 0.5) * binWidth;
    return rect(
      PAD.left + i * slot + 1,
      top,
      Math.max(slot - 2, 1),
      y(0, domain, height) - top,
      midpoint < 0 ? RED : GREEN,
    );
  });

  return frame(options, domain, [options.formatX(min), options.formatX(max)], bars.join(""));
}

/**
 * Count of values per bin. The maximum falls into the last bin.
 */
export function binCounts(values: readonly number[], bins: number): number[] {
  const counts = new Array<number>(bins).fill(0);
  if (values.length === 0) return counts;

  const min = Math.min(...values);
  const width = (Math.max(...values) - min) / bins;
  for (const value of values) {
    const index = width === 0 ? 0 : Math.min(bins - 1, Math.floor((value - min) / width));
    counts[index] = (counts[index] ?? 0) + 1;
  }
  return counts;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// ═══════════════════════════════════════
// Helpers
// ═══════════════════════════════════════

interface IndexedValue {
  readonly index: number;
  readonly value: number;
}

/** Runs of consecutive defined points */
function segments(points: readonly ChartPoint[]): IndexedValue[][] {
  const runs: IndexedValue[][] = [];
  let current: IndexedValue[] = [];
  points.forEach((point, index) => {
    if (point.value === null) {
      if (current.length > 0) runs.push(current);
      current = [];
    } else {
      current.push({ index, value: point.value });
    }
  });
  if (current.length > 0) runs.push(current);
  return runs;
}

function definedValues(points: readonly ChartPoint[]): number[] {
  return points.flatMap((p) => (p.value === null ? [] : [p.value]));
}

function extent(values: readonly number[], includeZero: boolean): [number, number] {
  let min = Math.min(...values);
  let max = Math.max(...values);
  if (includeZero) {
    min = Math.min(min, 0);
    max = Math.max(max, 0);
  }
  if (min === max) {
    const pad = Math.abs(min) * 0.1 || 1;
    return [min - pad, max + pad];
  }
  return [min, max];
}

function plotWidth(width: number): number {
  return width - PAD.left - PAD.right;
}

function x(index: number, count: number, width: number): number {
  if (count <= 1) return PAD.left + plotWidth(width) / 2;
  return PAD.left + (index * plotWidth(width)) / (count - 1);
}

function y(value: number, [min, max]: [number, number], height: number): number {
  const plotHeight = height - PAD.top - PAD.bottom;
  return PAD.top + ((max - value) / (max - min)) * plotHeight;
}

function coord(n: number): string {
  return n.toFixed(1);
}

function rect(rx: number, ry: number, width: number, height: number, fill: string): string {
  return `<rect x="${coord(rx)}" y="${coord(ry)}" width="${coord(width)}" height="${coord(height)}" fill="${fill}"/>`;
}

function xLabels(points: readonly ChartPoint[]): [string, string] {
  return [points[0]?.label ?? "", points[points.length - 1]?.label ?? ""];
}

function open(options: ChartBase): string {
  const { width, height } = options;
  return `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" role="img"><title>${escapeHtml(options.title)}</title>`;
}

function frame(options: ChartBase, domain: [number, number], labels: [string, string], body: string): string {
  const { width, height, formatY } = options;
  const [min, max] = domain;
  const bottom = height - PAD.bottom;
  const text = (tx: number, ty: number, anchor: string, content: string) =>
    `<text x="${coord(tx)}" y="${coord(ty)}" text-anchor="${anchor}" font-size="11" fill="currentColor">${escapeHtml(content)}</text>`;

  const axis = [
    `<line x1="${PAD.left}" y1="${PAD.top}" x2="${PAD.left}" y2="${bottom}" stroke="#888" stroke-width="0.5"/>`,
    min < 0 && max > 0
      ? `<line x1="${PAD.left}" y1="${coord(y(0, domain, height))}" x2="${width - PAD.right}" y2="${coord(y(0, domain, height))}" stroke="#888" stroke-width="0.5" stroke-dasharray="4 3"/>`
      : "",
    text(PAD.left - 6, PAD.top + 4, "end", formatY(max)),
    text(PAD.left - 6, bottom, "end", formatY(min)),
    text(PAD.left, height - 8, "start", labels[0]),
    text(width - PAD.right, height - 8, "end", labels[1]),
  ].join("");

  return `${open(options)}${axis}${body}</svg>`;
}

function emptyChart(options: ChartBase): string {
  const { width, height } = options;
  return `${open(options)}<text x="${width / 2}" y="${height / 2}" text-anchor="middle" font-size="12" fill="currentColor">No data</text></svg>`;
}
