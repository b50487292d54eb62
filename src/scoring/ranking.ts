/**
 * Ranking, bias classification and sector rollups
 */

import type { ScanTimeframe } from '@/types/bars';
import type { SectorMap } from '@/core/universe';
import type { Bias, BiasAlignment, SectorRollup } from './types';

export interface Rankable {
  symbol: string;
  compositeScore: number | null;
}

/** Composite descending, ties by symbol; null composites after all scored rows. */
export function compareByComposite(a: Rankable, b: Rankable): number {
  if (a.compositeScore === null || b.compositeScore === null) {
    if (a.compositeScore !== b.compositeScore) return a.compositeScore === null ? 1 : -1;
  } else if (b.compositeScore !== a.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  return a.symbol.localeCompare(b.symbol);
}

/** Sorted copy with 1-based ranks; rows without a composite get rank null. */
export function rankScores<T extends Rankable>(rows: readonly T[]): (T & { rank: number | null })[] {
  let next = 1;
  return rows
    .slice()
    .sort(compareByComposite)
    .map((row) => ({ ...row, rank: row.compositeScore === null ? null : next++ }));
}

export function signOf(value: number): Bias {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

/**
 * bullish when every scored timeframe is positive, bearish when every one is
 * negative; a missing score or an exact zero makes the symbol mixed.
 */
export function biasAlignment(
  timeframeScores: Readonly<Partial<Record<ScanTimeframe, number>>>,
  scoredTimeframes: readonly ScanTimeframe[]
): BiasAlignment {
  if (scoredTimeframes.length === 0) return 'mixed';
  const signs = scoredTimeframes.map((tf) => {
    const score = timeframeScores[tf];
    return score === undefined ? 0 : signOf(score);
  });
  if (signs.every((s) => s === 1)) return 'bullish';
  if (signs.every((s) => s === -1)) return 'bearish';
  return 'mixed';
}

/** Mean composite per sector tag, strongest sector first. */
export function sectorRollups(rows: readonly Rankable[], sectorMap: SectorMap): SectorRollup[] {
  const groups = new Map<string, number[]>();
  for (const row of rows) {
    const sector = sectorMap[row.symbol];
    if (!sector || row.compositeScore === null) continue;
    const members = groups.get(sector) ?? [];
    members.push(row.compositeScore);
    groups.set(sector, members);
  }

  return [...groups.entries()]
    .map(([sector, scores]) => ({
      sector,
      memberCount: scores.length,
      averageScore: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    }))
    .sort((a, b) => {
      if (b.averageScore !== a.averageScore) return b.averageScore - a.averageScore;
      return a.sector.localeCompare(b.sector);
    });
}

/** Keep rows in the given sector; rank numbers from the full ranking are preserved. */
export function filterBySector<T extends { sector: string | null }>(rows: readonly T[], sector: string): T[] {
  const tag = sector.trim().toUpperCase();
  return rows.filter((row) => row.sector === tag);
}
