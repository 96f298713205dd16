/**
 * SVG charts for the dashboard: a dual line chart of daily income and
 * expense, and a pie of expense totals by description.
 *
 * Geometry is computed by the build* functions and rendered separately.
 */

import { html } from 'hono/html';
import type { CategoryBreakdown, TimeSeries } from '@tally/core';
import { formatCoordinate } from './format.js';

type Markup = ReturnType<typeof html>;

export const INCOME_COLOR = 'green';
export const EXPENSE_COLOR = 'red';

// Fallback palette for pie slices
const SLICE_COLORS = [
  '#1f77b4', '#ff7f0e', '#2ca02c', '#d62728', '#9467bd',
  '#8c564b', '#e377c2', '#7f7f7f', '#bcbd22', '#17becf',
];

const LINE_CHART = { width: 800, height: 400, left: 70, right: 20, top: 40, bottom: 60 } as const;
const MAX_X_LABELS = 8;

const PIE_CHART = { width: 400, height: 400, cx: 200, cy: 210, radius: 140 } as const;

export interface LineChartModel {
  width: number;
  height: number;
  plot: { left: number; right: number; top: number; bottom: number };
  xTicks: Array<{ x: number; label: string }>;
  yTicks: Array<{ y: number; value: number }>;
  lines: Array<{ name: string; color: string; points: string }>;
}

export interface PieSlice {
  label: string;
  value: number;
  color: string;
  /** e.g. "25.0%" */
  percent: string;
  /** SVG path, or null when the slice is the whole circle */
  path: string | null;
  percentPosition: { x: number; y: number };
  labelPosition: { x: number; y: number; anchor: 'start' | 'middle' | 'end' };
}

export interface PieChartModel {
  width: number;
  height: number;
  cx: number;
  cy: number;
  radius: number;
  slices: PieSlice[];
}

/**
 * Round a raw tick step up to 1, 2 or 5 times a power of ten
 */
export function niceStep(raw: number): number {
  if (raw <= 0) return 1;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  const residual = raw / magnitude;
  const nice = residual <= 1 ? 1 : residual <= 2 ? 2 : residual <= 5 ? 5 : 10;
  return nice * magnitude;
}

export function buildLineChart(series: TimeSeries): LineChartModel {
  const { width, height, left, right, top, bottom } = LINE_CHART;
  const plotRight = width - right;
  const plotBottom = height - bottom;
  const plotWidth = plotRight - left;
  const plotHeight = plotBottom - top;

  const max = Math.max(0, ...series.income, ...series.expense);
  const step = niceStep(max / 5);
  const yMax = max > 0 ? Math.ceil(max / step) * step : step;

  const count = series.dates.length;
  const xAt = (index: number) =>
    count === 1 ? left + plotWidth / 2 : left + (index * plotWidth) / (count - 1);
  const yAt = (value: number) => plotBottom - (value / yMax) * plotHeight;

  const toPoints = (values: number[]) =>
    values.map((value, index) => `${formatCoordinate(xAt(index))},${formatCoordinate(yAt(value))}`).join(' ');

  const labelEvery = Math.max(1, Math.ceil(count / MAX_X_LABELS));
  const xTicks = series.dates
    .map((label, index) => ({ x: xAt(index), label, index }))
    .filter(({ index }) => index % labelEvery === 0)
    .map(({ x, label }) => ({ x, label }));

  const yTicks: LineChartModel['yTicks'] = [];
  for (let i = 0; i * step <= yMax + step / 1e6; i++) {
    const value = Number((i * step).toPrecision(12));
    yTicks.push({ y: yAt(value), value });
  }

  return {
    width,
    height,
    plot: { left, right: plotRight, top, bottom: plotBottom },
    xTicks,
    yTicks,
    lines: [
      { name: 'Income', color: INCOME_COLOR, points: toPoints(series.income) },
      { name: 'Expense', color: EXPENSE_COLOR, points: toPoints(series.expense) },
    ],
  };
}

/**
 * Slices in ascending description order, counterclockwise from 12 o'clock
 */
export function buildPieChart(breakdown: CategoryBreakdown): PieChartModel {
  const { width, height, cx, cy, radius } = PIE_CHART;
  const entries = [...breakdown.entries()]
    .filter(([, value]) => value > 0)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const total = entries.reduce((sum, [, value]) => sum + value, 0);

  // Angles in degrees, counterclockwise from the positive x axis (SVG y grows downward)
  const pointAt = (degrees: number, distance: number) => {
    const radians = (degrees * Math.PI) / 180;
    return { x: cx + distance * Math.cos(radians), y: cy - distance * Math.sin(radians) };
  };

  let angle = 90;
  const slices = entries.map(([label, value], index): PieSlice => {
    const fraction = value / total;
    const sweep = fraction * 360;
    const start = pointAt(angle, radius);
    const end = pointAt(angle + sweep, radius);
    const middle = angle + sweep / 2;
    angle += sweep;

    const path =
      entries.length === 1
        ? null
        : [
            `M ${formatCoordinate(cx)} ${formatCoordinate(cy)}`,
            `L ${formatCoordinate(start.x)} ${formatCoordinate(start.y)}`,
            `A ${radius} ${radius} 0 ${sweep > 180 ? 1 : 0} 0 ${formatCoordinate(end.x)} ${formatCoordinate(end.y)}`,
            'Z',
          ].join(' ');

    const labelPoint = pointAt(middle, radius * 1.12);
    const horizontal = Math.cos((middle * Math.PI) / 180);

    return {
      label,
      value,
      color: SLICE_COLORS[index % SLICE_COLORS.length] ?? '#7f7f7f',
      percent: `${(fraction * 100).toFixed(1)}%`,
      path,
      percentPosition: pointAt(middle, radius * 0.6),
      labelPosition: {
        ...labelPoint,
        anchor: horizontal > 0.1 ? 'start' : horizontal < -0.1 ? 'end' : 'middle',
      },
    };
  });

  return { width, height, cx, cy, radius, slices };
}

function formatTick(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

export function renderLineChart(series: TimeSeries): Markup {
  const chart = buildLineChart(series);
  const { plot } = chart;
  const c = formatCoordinate;

  return html`<svg class="chart line-chart" viewBox="0 0 ${chart.width} ${chart.height}" role="img" aria-label="Income and Expenses Over Time">
  <text class="chart-title" x="${chart.width / 2}" y="24" text-anchor="middle">Income and Expenses Over Time</text>
  ${chart.yTicks.map(
    (tick) => html`<line class="grid" x1="${plot.left}" x2="${plot.right}" y1="${c(tick.y)}" y2="${c(tick.y)}" stroke="#ddd" />
  <text class="tick" x="${plot.left - 8}" y="${c(tick.y + 4)}" text-anchor="end">${formatTick(tick.value)}</text>
  `
  )}
  ${chart.xTicks.map(
    (tick) => html`<line class="grid" x1="${c(tick.x)}" x2="${c(tick.x)}" y1="${plot.top}" y2="${plot.bottom}" stroke="#eee" />
  <text class="tick" x="${c(tick.x)}" y="${plot.bottom + 18}" text-anchor="middle">${tick.label}</text>
  `
  )}
  <line class="axis" x1="${plot.left}" x2="${plot.right}" y1="${plot.bottom}" y2="${plot.bottom}" stroke="#333" />
  <line class="axis" x1="${plot.left}" x2="${plot.left}" y1="${plot.top}" y2="${plot.bottom}" stroke="#333" />
  ${chart.lines.map(
    (line) => html`<polyline class="series" data-series="${line.name}" fill="none" stroke="${line.color}" stroke-width="2" points="${line.points}" />
  `
  )}
  <text class="axis-label" x="${(plot.left + plot.right) / 2}" y="${chart.height - 12}" text-anchor="middle">Date</text>
  <text class="axis-label" x="18" y="${(plot.top + plot.bottom) / 2}" text-anchor="middle" transform="rotate(-90 18 ${(plot.top + plot.bottom) / 2})">Amount</text>
  ${chart.lines.map(
    (line, index) => html`<g class="legend">
    <line x1="${plot.right - 110}" x2="${plot.right - 90}" y1="${plot.top + 12 + index * 18}" y2="${plot.top + 12 + index * 18}" stroke="${line.color}" stroke-width="2" />
    <text x="${plot.right - 84}" y="${plot.top + 16 + index * 18}">${line.name}</text>
  </g>
  `
  )}
</svg>`;
}

export function renderPieChart(breakdown: CategoryBreakdown): Markup {
  const chart = buildPieChart(breakdown);
  const c = formatCoordinate;

  return html`<svg class="chart pie-chart" viewBox="0 0 ${chart.width} ${chart.height + 20}" role="img" aria-label="Expense Analysis by Category">
  <text class="chart-title" x="${chart.width / 2}" y="24" text-anchor="middle">Expense Analysis by Category</text>
  ${chart.slices.map(
    (slice) => html`<g class="slice" data-label="${slice.label}">
    ${slice.path === null
      ? html`<circle cx="${chart.cx}" cy="${chart.cy}" r="${chart.radius}" fill="${slice.color}" />`
      : html`<path d="${slice.path}" fill="${slice.color}" />`}
    <text class="percent" x="${c(slice.percentPosition.x)}" y="${c(slice.percentPosition.y)}" text-anchor="middle">${slice.percent}</text>
    <text class="slice-label" x="${c(slice.labelPosition.x)}" y="${c(slice.labelPosition.y)}" text-anchor="${slice.labelPosition.anchor}">${slice.label}</text>
  </g>
  `
  )}
</svg>`;
}
