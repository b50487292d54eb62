import { describe, expect, it } from 'vitest';
import { InsufficientDataError, UndefinedMetricError } from '@/core/errors';
import { computeAtr, trueRange } from '@/spot/atr';
import { computeLevels, percentFromLevel } from '@/spot/levels';
import { computeRangeConsumed } from '@/spot/range';
import { computeSessionRelativeVolume } from '@/spot/volume';
import { bar } from '../helpers/bars';

const DAY = Date.UTC(2024, 0, 2);
const ATR_BARS = [
  bar(DAY, 10, 10, 10, 10),
  bar(DAY + 1, 10, 12, 9, 11),
  bar(DAY + 2, 11, 11, 10, 10.5),
  bar(DAY + 3, 12.5, 14, 12, 13),
];

describe('trueRange', () => {
  it('covers gaps from the previous close', () => {
    expect(trueRange(12, 9, 10)).toBe(3);
    expect(trueRange(14, 12, 10.5)).toBe(3.5);
  });
});

describe('computeAtr', () => {
  it('averages the last lookback true ranges', () => {
    expect(computeAtr(ATR_BARS, 3)).toBe(2.5);
    expect(computeAtr(ATR_BARS, 2)).toBe(2.25);
  });

  it('needs lookback + 1 bars', () => {
    expect(() => computeAtr(ATR_BARS, 4)).toThrow(InsufficientDataError);
  });
});

describe('computeRangeConsumed', () => {
  it('measures up bars from the low and down bars from the high', () => {
    expect(computeRangeConsumed(bar(DAY, 100, 104, 99, 103), 5)).toBeCloseTo(80, 10);
    expect(computeRangeConsumed(bar(DAY, 103, 104, 99, 100), 5)).toBeCloseTo(-80, 10);
  });

  it('is undefined for a zero ATR', () => {
    expect(() => computeRangeConsumed(bar(DAY, 100, 100, 100, 100), 0)).toThrow(UndefinedMetricError);
  });
});

describe('computeLevels', () => {
  const daily = [bar(DAY, 100, 105, 95, 100), bar(DAY + 1, 100, 110, 98, 104), bar(DAY + 2, 104, 104, 99, 100)];

  it('measures price against the session and lookback extremes', () => {
    const levels = computeLevels(daily, 20);
    expect(levels.price).toBe(100);
    expect(levels.high20d).toBe(110);
    expect(levels.low20d).toBe(95);
    expect(levels.pctFromDailyHigh).toBeCloseTo(-4, 10);
    expect(levels.pctFromDailyLow).toBeCloseTo(1, 10);
    expect(levels.pctFrom20dHigh).toBeCloseTo(-10, 10);
    expect(levels.pctFrom20dLow).toBeCloseTo(5, 10);
  });

  it('reads only the lookback window for the extremes', () => {
    const levels = computeLevels(daily, 2);
    expect(levels.low20d).toBe(98);
    expect(levels.pctFrom20dLow).toBeCloseTo(2, 10);
  });

  it('returns nulls without bars', () => {
    expect(computeLevels([]).price).toBeNull();
    expect(percentFromLevel(0, 10)).toBeNull();
  });
});

describe('computeSessionRelativeVolume', () => {
  // 14:30 and 14:35 UTC are 09:30 and 09:35 in New York during January.
  const at = (day: number, hour: number, minute: number) => Date.UTC(2024, 0, day, hour, minute);
  const intraday = [
    bar(at(2, 14, 30), 1, 1, 1, 1, 100),
    bar(at(2, 14, 35), 1, 1, 1, 1, 100),
    bar(at(2, 14, 40), 1, 1, 1, 1, 999),
    bar(at(3, 14, 30), 1, 1, 1, 1, 200),
    bar(at(3, 14, 35), 1, 1, 1, 1, 200),
    bar(at(4, 14, 30), 1, 1, 1, 1, 300),
    bar(at(4, 14, 35), 1, 1, 1, 1, 300),
  ];

  it('compares cumulative volume with prior sessions at the same time of day', () => {
    expect(computeSessionRelativeVolume(intraday)).toBe(2);
  });

  it('limits the number of prior sessions', () => {
    expect(computeSessionRelativeVolume(intraday, { maxSessions: 1 })).toBe(1.5);
  });

  it('needs a prior session', () => {
    expect(() => computeSessionRelativeVolume(intraday.slice(5))).toThrow(InsufficientDataError);
  });

  it('is undefined when prior sessions had no volume by then', () => {
    const quiet = [bar(at(3, 14, 30), 1, 1, 1, 1, 0), bar(at(4, 14, 30), 1, 1, 1, 1, 500)];
    expect(() => computeSessionRelativeVolume(quiet)).toThrow(UndefinedMetricError);
  });
});
