import { describe, expect, it } from 'vitest';
import { biasAlignment, compareByComposite, filterBySector, rankScores, sectorRollups, signOf } from '@/scoring/ranking';

const rows = [
  { symbol: 'B', compositeScore: 1 },
  { symbol: 'A', compositeScore: 1 },
  { symbol: 'C', compositeScore: null },
  { symbol: 'D', compositeScore: 2 },
];

describe('compareByComposite', () => {
  it('sorts descending, breaks ties by symbol and puts unscored rows last', () => {
    expect([...rows].sort(compareByComposite).map((r) => r.symbol)).toEqual(['D', 'A', 'B', 'C']);
  });
});

describe('rankScores', () => {
  it('assigns consecutive ranks to scored rows only', () => {
    const ranked = rankScores(rows);
    expect(ranked.map((r) => [r.symbol, r.rank])).toEqual([
      ['D', 1],
      ['A', 2],
      ['B', 3],
      ['C', null],
    ]);
  });

  it('does not reorder its input', () => {
    rankScores(rows);
    expect(rows.map((r) => r.symbol)).toEqual(['B', 'A', 'C', 'D']);
  });
});

describe('biasAlignment', () => {
  it('classifies agreement across the scored timeframes', () => {
    expect(biasAlignment({ '1w': 1, '1d': 2 }, ['1w', '1d'])).toBe('bullish');
    expect(biasAlignment({ '1w': -1, '1d': -2 }, ['1w', '1d'])).toBe('bearish');
    expect(biasAlignment({ '1w': 1, '1d': -2 }, ['1w', '1d'])).toBe('mixed');
  });

  it('treats a missing score or an exact zero as mixed', () => {
    expect(biasAlignment({ '1w': 1 }, ['1w', '1d'])).toBe('mixed');
    expect(biasAlignment({ '1w': 1, '1d': 0 }, ['1w', '1d'])).toBe('mixed');
    expect(biasAlignment({}, [])).toBe('mixed');
  });

  it('maps signs to biases', () => {
    expect([signOf(0.2), signOf(-3), signOf(0)]).toEqual([1, -1, 0]);
  });
});

describe('sectorRollups', () => {
  it('averages scored members and orders by mean, then sector', () => {
    const rollups = sectorRollups(
      [
        { symbol: 'A', compositeScore: 1 },
        { symbol: 'B', compositeScore: 3 },
        { symbol: 'C', compositeScore: 1 },
        { symbol: 'D', compositeScore: null },
        { symbol: 'E', compositeScore: 5 },
        { symbol: 'F', compositeScore: 2 },
      ],
      { A: 'XLK', B: 'XLK', C: 'XLF', D: 'XLF', F: 'XLE' }
    );

    expect(rollups).toEqual([
      { sector: 'XLE', memberCount: 1, averageScore: 2 },
      { sector: 'XLK', memberCount: 2, averageScore: 2 },
      { sector: 'XLF', memberCount: 1, averageScore: 1 },
    ]);
  });
});

describe('filterBySector', () => {
  it('keeps rows of one sector with their original ranks', () => {
    const ranked = [
      { symbol: 'A', sector: 'XLK', rank: 1 },
      { symbol: 'B', sector: 'XLF', rank: 2 },
      { symbol: 'C', sector: 'XLK', rank: 3 },
      { symbol: 'D', sector: null, rank: 4 },
    ];
    expect(filterBySector(ranked, ' xlk ')).toEqual([
      { symbol: 'A', sector: 'XLK', rank: 1 },
      { symbol: 'C', sector: 'XLK', rank: 3 },
    ]);
  });
});
