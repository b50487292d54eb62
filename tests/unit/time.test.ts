import { describe, expect, it } from 'vitest';
import { differenceInCalendarDays } from 'date-fns';
import { formatDate, formatScanTimestamp, getScanId, lookbackWindow, sessionClock } from '@/core/time';
import { contentHash, deterministicHash, shortUuid, stableStringify } from '@/core/seed';

describe('time helpers', () => {
  const scannedAt = new Date(Date.UTC(2024, 2, 5, 9, 7, 3));

  it('formats scan ids in UTC', () => {
    expect(formatScanTimestamp(scannedAt)).toBe('20240305_090703');
    expect(getScanId(scannedAt, 'deadbeef')).toBe('20240305_090703_deadbeef');
  });

  it('dates a scan by its exchange session', () => {
    expect(formatDate(scannedAt)).toBe('2024-03-05');
    expect(formatDate(new Date('2024-03-06T01:30:00Z'))).toBe('2024-03-05');
    expect(formatDate(new Date('2024-07-02T03:59:00Z'))).toBe('2024-07-01');
    expect(formatDate(new Date('2024-07-02T04:00:00Z'))).toBe('2024-07-02');
  });

  it('widens trading-day lookbacks into calendar windows', () => {
    const end = new Date(Date.UTC(2024, 2, 30));
    const days = ({ start, end: until }: { start: Date; end: Date }) => differenceInCalendarDays(until, start);
    expect(days(lookbackWindow('1d', 60, end))).toBe(90);
    expect(days(lookbackWindow('1w', 4, end))).toBe(28);
    expect(days(lookbackWindow('5m', 12, end))).toBe(18);
  });

  it('maps timestamps to exchange sessions across daylight saving', () => {
    expect(sessionClock(Date.UTC(2024, 0, 2, 14, 30))).toEqual({ session: '2024-01-02', time: '09:30' });
    expect(sessionClock(Date.UTC(2024, 6, 1, 13, 30))).toEqual({ session: '2024-07-01', time: '09:30' });
    expect(sessionClock(Date.UTC(2024, 0, 3, 2, 0))).toEqual({ session: '2024-01-02', time: '21:00' });
  });
});

describe('seed helpers', () => {
  it('serializes objects with sorted keys and no undefined fields', () => {
    expect(stableStringify({ b: 1, a: { d: undefined, c: [2, 1] } })).toBe('{"a":{"c":[2,1]},"b":1}');
  });

  it('hashes equal content identically regardless of key order', () => {
    expect(contentHash({ a: 1, b: 2 })).toBe(contentHash({ b: 2, a: 1 }));
    expect(contentHash({ a: 1 })).toMatch(/^[0-9a-f]{64}$/);
    expect(deterministicHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('produces short random ids', () => {
    expect(shortUuid()).toMatch(/^[0-9a-f]{8}$/);
  });
});
