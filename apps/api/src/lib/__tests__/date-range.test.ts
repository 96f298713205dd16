import { describe, it, expect } from 'vitest';
import { resolveDateRange, serializeRange } from '../date-range.js';
import { toBreakdownResponse } from '../transactions.js';

describe('resolveDateRange', () => {
  const now = new Date(2024, 2, 17, 14, 30);

  it('should default to the first of the month through today', () => {
    expect(resolveDateRange({}, now)).toEqual({
      startDate: new Date(2024, 2, 1),
      endDate: new Date(2024, 2, 17),
    });
  });

  it('should keep given bounds', () => {
    const start = new Date(2023, 11, 1);
    const end = new Date(2023, 11, 31);

    expect(resolveDateRange({ start, end }, now)).toEqual({ startDate: start, endDate: end });
  });

  it('should serialize as YYYY-MM-DD', () => {
    expect(serializeRange(resolveDateRange({}, now))).toEqual({ start: '2024-03-01', end: '2024-03-17' });
  });
});

describe('toBreakdownResponse', () => {
  it('should return a plain object with keys in ascending order', () => {
    const result = toBreakdownResponse(
      new Map([
        ['Transport', 20],
        ['Groceries', 50],
      ])
    );

    expect(Object.keys(result)).toEqual(['Groceries', 'Transport']);
    expect(result).toEqual({ Groceries: 50, Transport: 20 });
  });
});
