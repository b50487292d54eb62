/**
 * History reports over stored score rows.
 *
 * Every report first reduces the history to the latest scan per symbol per
 * scan day, so intraday re-runs do not double count.
 */

import type { ScoreHistoryRow, WatchlistEntryRow, WatchlistName } from '@/data/repositories/scan_history_repo';

export type ChangeDirection = 'up' | 'down' | 'flat';

export interface TrendReport {
  dates: string[];
  symbols: string[];
  /** date -> symbol -> composite (null when absent that day). */
  scores: Record<string, Record<string, number | null>>;
}

export interface SectorTrendReport extends TrendReport {
  /** date -> symbol -> rank among that day's scored sectors (1 = strongest). */
  ranks: Record<string, Record<string, number | null>>;
}

export interface SectorChangeRow {
  symbol: string;
  latestScore: number | null;
  delta1d: number | null;
  delta5d: number | null;
  direction: ChangeDirection;
}

export interface StockTrackerRow {
  scanDate: string;
  symbol: string;
  sector: string | null;
  score1w: number | null;
  bias1w: number | null;
  score1d: number | null;
  bias1d: number | null;
  score1h: number | null;
  bias1h: number | null;
  compositeScore: number | null;
  alignment: ScoreHistoryRow['alignment'];
  scoreDelta: number | null;
}

export interface WatchlistFrequencyRow {
  symbol: string;
  appearances: number;
  lastSeen: string;
}

export type WatchlistFrequencyReport = Record<WatchlistName, WatchlistFrequencyRow[]>;

/** Days back for the long change window, counted in scan days. */
const LONG_CHANGE_SCAN_DAYS = 5;

export function latestPerDay(rows: readonly ScoreHistoryRow[]): ScoreHistoryRow[] {
  const latest = new Map<string, ScoreHistoryRow>();
  for (const row of rows) {
    const key = `${row.symbol}|${row.scanDate}`;
    const current = latest.get(key);
    if (!current || row.scannedAt > current.scannedAt) {
      latest.set(key, row);
    }
  }
  return [...latest.values()].sort((a, b) => {
    if (a.scanDate !== b.scanDate) return a.scanDate < b.scanDate ? -1 : 1;
    return a.symbol.localeCompare(b.symbol);
  });
}

function scanDates(rows: readonly ScoreHistoryRow[]): string[] {
  return Array.from(new Set(rows.map((row) => row.scanDate))).sort();
}

function scoreLookup(rows: readonly ScoreHistoryRow[]): Map<string, number | null> {
  return new Map(rows.map((row) => [`${row.symbol}|${row.scanDate}`, row.compositeScore]));
}

/** Dates x symbols pivot of composite scores. */
export function rankingHistoryReport(history: readonly ScoreHistoryRow[]): TrendReport {
  const rows = latestPerDay(history);
  const dates = scanDates(rows);
  const symbols = Array.from(new Set(rows.map((row) => row.symbol))).sort();
  const lookup = scoreLookup(rows);

  const scores: TrendReport['scores'] = {};
  for (const date of dates) {
    scores[date] = {};
    for (const symbol of symbols) {
      scores[date][symbol] = lookup.get(`${symbol}|${date}`) ?? null;
    }
  }
  return { dates, symbols, scores };
}

export function sectorTrendReport(history: readonly ScoreHistoryRow[]): SectorTrendReport {
  const trend = rankingHistoryReport(history);
  const ranks: SectorTrendReport['ranks'] = {};

  for (const date of trend.dates) {
    const day = trend.scores[date];
    const ordered = trend.symbols
      .filter((symbol) => day[symbol] !== null)
      .sort((a, b) => {
        const diff = (day[b] ?? 0) - (day[a] ?? 0);
        return diff !== 0 ? diff : a.localeCompare(b);
      });
    ranks[date] = {};
    for (const symbol of trend.symbols) {
      const position = ordered.indexOf(symbol);
      ranks[date][symbol] = position === -1 ? null : position + 1;
    }
  }

  return { ...trend, ranks };
}

function delta(latest: number | null, previous: number | null | undefined): number | null {
  if (latest === null || previous === null || previous === undefined) return null;
  return latest - previous;
}

function direction(change: number | null): ChangeDirection {
  if (change === null || change === 0) return 'flat';
  return change > 0 ? 'up' : 'down';
}

/**
 * Latest score with one-scan-day and five-scan-day changes per symbol that
 * appears on the latest scan day. Empty with fewer than two scan days.
 */
export function sectorChangeReport(history: readonly ScoreHistoryRow[]): SectorChangeRow[] {
  const rows = latestPerDay(history);
  const dates = scanDates(rows);
  if (dates.length < 2) return [];

  const lookup = scoreLookup(rows);
  const latestDate = dates[dates.length - 1];
  const previousDate = dates[dates.length - 2];
  const longDate = dates.length >= LONG_CHANGE_SCAN_DAYS ? dates[dates.length - LONG_CHANGE_SCAN_DAYS] : null;

  return rows
    .filter((row) => row.scanDate === latestDate)
    .map((row) => {
      const change = delta(row.compositeScore, lookup.get(`${row.symbol}|${previousDate}`));
      return {
        symbol: row.symbol,
        latestScore: row.compositeScore,
        delta1d: change,
        delta5d: longDate ? delta(row.compositeScore, lookup.get(`${row.symbol}|${longDate}`)) : null,
        direction: direction(change),
      };
    })
    .sort((a, b) => {
      if (a.latestScore === null || b.latestScore === null) {
        if (a.latestScore !== b.latestScore) return a.latestScore === null ? 1 : -1;
      } else if (a.latestScore !== b.latestScore) {
        return b.latestScore - a.latestScore;
      }
      return a.symbol.localeCompare(b.symbol);
    });
}

/** One row per scan day for a single symbol, oldest first. */
export function stockTrackerReport(history: readonly ScoreHistoryRow[], symbol: string): StockTrackerRow[] {
  const target = symbol.trim().toUpperCase();
  let previous: number | null = null;
  return latestPerDay(history)
    .filter((row) => row.symbol === target)
    .map((row) => {
      const tracked: StockTrackerRow = {
        scanDate: row.scanDate,
        symbol: row.symbol,
        sector: row.sector,
        score1w: row.score1w,
        bias1w: row.bias1w,
        score1d: row.score1d,
        bias1d: row.bias1d,
        score1h: row.score1h,
        bias1h: row.bias1h,
        compositeScore: row.compositeScore,
        alignment: row.alignment,
        scoreDelta: delta(row.compositeScore, previous),
      };
      previous = row.compositeScore;
      return tracked;
    });
}

/**
 * How often each symbol made the strong and weak lists, counting at most
 * one appearance per list per scan day (the day's latest scan).
 */
export function watchlistFrequencyReport(entries: readonly WatchlistEntryRow[]): WatchlistFrequencyReport {
  const latestScanByDay = new Map<string, string>();
  for (const entry of entries) {
    const current = latestScanByDay.get(entry.scanDate);
    if (!current || entry.scannedAt > current) latestScanByDay.set(entry.scanDate, entry.scannedAt);
  }

  const tally = (list: WatchlistName): WatchlistFrequencyRow[] => {
    const counts = new Map<string, WatchlistFrequencyRow>();
    for (const entry of entries) {
      if (entry.list !== list || latestScanByDay.get(entry.scanDate) !== entry.scannedAt) continue;
      const row = counts.get(entry.symbol) ?? { symbol: entry.symbol, appearances: 0, lastSeen: entry.scanDate };
      row.appearances += 1;
      if (entry.scanDate > row.lastSeen) row.lastSeen = entry.scanDate;
      counts.set(entry.symbol, row);
    }
    return [...counts.values()].sort((a, b) =>
      b.appearances !== a.appearances ? b.appearances - a.appearances : a.symbol.localeCompare(b.symbol)
    );
  };

  return { strong: tally('strong'), weak: tally('weak') };
}
