import { describe, it, expect } from 'vitest';
import { buildLineChart, buildPieChart, niceStep, renderPieChart } from '../charts.js';

describe('niceStep', () => {
  it('should round up to 1, 2 or 5 times a power of ten', () => {
    expect(niceStep(100)).toBe(100);
    expect(niceStep(11.5)).toBe(20);
    expect(niceStep(3)).toBe(5);
    expect(niceStep(0.07)).toBeCloseTo(0.1);
  });

  it('should fall back to 1 for non-positive input', () => {
    expect(niceStep(0)).toBe(1);
  });
});

describe('buildLineChart', () => {
  it('should place both series on the shared date axis', () => {
    const chart = buildLineChart({
      dates: ['2024-03-01', '2024-03-05'],
      income: [500, 0],
      expense: [0, 50],
    });

    expect(chart.lines).toEqual([
      { name: 'Income', color: 'green', points: '70,40 780,340' },
      { name: 'Expense', color: 'red', points: '70,340 780,310' },
    ]);
    expect(chart.yTicks.map((tick) => tick.value)).toEqual([0, 100, 200, 300, 400, 500]);
    expect(chart.xTicks).toEqual([
      { x: 70, label: '2024-03-01' },
      { x: 780, label: '2024-03-05' },
    ]);
  });

  it('should center a single day', () => {
    const chart = buildLineChart({ dates: ['2024-03-01'], income: [10], expense: [0] });

    expect(chart.lines[0]?.points).toBe('425,40');
  });

  it('should thin out date labels on long ranges', () => {
    const dates = Array.from({ length: 20 }, (_, i) => `2024-03-${String(i + 1).padStart(2, '0')}`);
    const chart = buildLineChart({ dates, income: dates.map(() => 1), expense: dates.map(() => 0) });

    expect(chart.xTicks.map((tick) => tick.label)).toEqual([
      '2024-03-01',
      '2024-03-04',
      '2024-03-07',
      '2024-03-10',
      '2024-03-13',
      '2024-03-16',
      '2024-03-19',
    ]);
  });
});

describe('buildPieChart', () => {
  it('should draw slices counterclockwise from 12 o\'clock in description order', () => {
    const chart = buildPieChart(
      new Map([
        ['Rent', 75],
        ['Groceries', 25],
      ])
    );

    expect(chart.slices.map((slice) => [slice.label, slice.percent])).toEqual([
      ['Groceries', '25.0%'],
      ['Rent', '75.0%'],
    ]);
    expect(chart.slices[0]?.path).toBe('M 200 210 L 200 70 A 140 140 0 0 0 60 210 Z');
    expect(chart.slices[1]?.path).toBe('M 200 210 L 60 210 A 140 140 0 1 0 200 70 Z');
  });

  it('should use a full circle for a single description', () => {
    const chart = buildPieChart(new Map([['Groceries', 50]]));

    expect(chart.slices).toHaveLength(1);
    expect(chart.slices[0]?.path).toBeNull();
    expect(chart.slices[0]?.percent).toBe('100.0%');
  });

  it('should render the title without a y-axis label', async () => {
    const svg = String(await renderPieChart(new Map([['Groceries', 50]])));

    expect(svg).toContain('>Expense Analysis by Category</text>');
    expect(svg).toContain('<circle cx="200" cy="210" r="140" fill="#1f77b4" />');
    expect(svg).not.toContain('Amount');
  });
});
