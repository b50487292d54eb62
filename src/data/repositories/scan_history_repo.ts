/**
 * Scan history repository: scan index, per-symbol score history and
 * watchlist entries for the report layer.
 */

import type Database from 'better-sqlite3';
import type { BiasAlignment } from '@/scoring/types';
import type { ScanRecordV1, ScanType } from '@/types/scan_record';

export interface ScanIndexRow {
  scanId: string;
  scanType: ScanType;
  scannedAt: string;
  scanDate: string;
  model: string;
  filePath: string | null;
  contentHash: string;
  symbolCount: number;
  scoredCount: number;
}

export interface ScoreHistoryRow {
  scanId: string;
  scanType: ScanType;
  scannedAt: string;
  scanDate: string;
  symbol: string;
  sector: string | null;
  rank: number | null;
  compositeScore: number | null;
  score1w: number | null;
  score1d: number | null;
  score1h: number | null;
  bias1w: number | null;
  bias1d: number | null;
  bias1h: number | null;
  alignment: BiasAlignment;
  model: string;
}

export type WatchlistName = 'strong' | 'weak';

export interface WatchlistEntryRow {
  scanId: string;
  scanType: ScanType;
  scannedAt: string;
  scanDate: string;
  list: WatchlistName;
  position: number;
  symbol: string;
  compositeScore: number | null;
}

export interface HistoryFilter {
  scanType: ScanType;
  symbol?: string;
  /** Inclusive `yyyy-MM-dd` lower bound. */
  since?: string;
}

export function saveScanHistory(db: Database.Database, record: ScanRecordV1, filePath: string | null): void {
  const insertIndex = db.prepare(`
    INSERT INTO scan_index (scan_id, scan_type, scanned_at, scan_date, model, file_path, content_hash, symbol_count, scored_count)
    VALUES (@scanId, @scanType, @scannedAt, @scanDate, @model, @filePath, @contentHash, @symbolCount, @scoredCount)
    ON CONFLICT(scan_id) DO UPDATE SET
      file_path = excluded.file_path,
      content_hash = excluded.content_hash,
      symbol_count = excluded.symbol_count,
      scored_count = excluded.scored_count
  `);
  const clearScores = db.prepare('DELETE FROM score_history WHERE scan_id = ?');
  const clearWatchlists = db.prepare('DELETE FROM watchlist_entries WHERE scan_id = ?');
  const insertScore = db.prepare(`
    INSERT INTO score_history (
      scan_id, scan_type, scanned_at, scan_date, symbol, sector, rank, composite_score,
      score_1w, score_1d, score_1h, bias_1w, bias_1d, bias_1h, alignment, model
    ) VALUES (
      @scanId, @scanType, @scannedAt, @scanDate, @symbol, @sector, @rank, @compositeScore,
      @score1w, @score1d, @score1h, @bias1w, @bias1d, @bias1h, @alignment, @model
    )
  `);
  const insertWatchlist = db.prepare(`
    INSERT INTO watchlist_entries (scan_id, scan_type, scanned_at, scan_date, list, position, symbol, composite_score)
    VALUES (@scanId, @scanType, @scannedAt, @scanDate, @list, @position, @symbol, @compositeScore)
  `);

  const common = {
    scanId: record.scan_id,
    scanType: record.scan_type,
    scannedAt: record.scanned_at,
    scanDate: record.scan_date,
  };
  const scores = new Map(record.rows.map((row) => [row.symbol, row.composite_score]));

  db.transaction(() => {
    insertIndex.run({
      ...common,
      model: record.model,
      filePath,
      contentHash: record.content_hash,
      symbolCount: record.rows.length,
      scoredCount: record.rows.filter((row) => row.composite_score !== null).length,
    });
    clearScores.run(record.scan_id);
    clearWatchlists.run(record.scan_id);

    for (const row of record.rows) {
      insertScore.run({
        ...common,
        symbol: row.symbol,
        sector: row.sector,
        rank: row.rank,
        compositeScore: row.composite_score,
        score1w: row.timeframes['1w']?.score ?? null,
        score1d: row.timeframes['1d']?.score ?? null,
        score1h: row.timeframes['1h']?.score ?? null,
        bias1w: row.timeframes['1w']?.bias ?? null,
        bias1d: row.timeframes['1d']?.bias ?? null,
        bias1h: row.timeframes['1h']?.bias ?? null,
        alignment: row.alignment,
        model: record.model,
      });
    }

    for (const list of ['strong', 'weak'] as const) {
      record.watchlists[list].forEach((symbol, position) => {
        insertWatchlist.run({ ...common, list, position: position + 1, symbol, compositeScore: scores.get(symbol) ?? null });
      });
    }
  })();
}

const SCORE_COLUMNS = `
  scan_id AS scanId, scan_type AS scanType, scanned_at AS scannedAt, scan_date AS scanDate,
  symbol, sector, rank, composite_score AS compositeScore,
  score_1w AS score1w, score_1d AS score1d, score_1h AS score1h,
  bias_1w AS bias1w, bias_1d AS bias1d, bias_1h AS bias1h, alignment, model
`;

export function loadScoreHistory(db: Database.Database, filter: HistoryFilter): ScoreHistoryRow[] {
  const stmt = db.prepare<{ scanType: string; symbol: string | null; since: string | null }, ScoreHistoryRow>(`
    SELECT ${SCORE_COLUMNS}
    FROM score_history
    WHERE scan_type = @scanType
      AND (@symbol IS NULL OR symbol = @symbol)
      AND (@since IS NULL OR scan_date >= @since)
    ORDER BY scanned_at ASC, symbol ASC
  `);
  return stmt.all({
    scanType: filter.scanType,
    symbol: filter.symbol?.toUpperCase() ?? null,
    since: filter.since ?? null,
  });
}

export function loadWatchlistEntries(db: Database.Database, scanType: ScanType): WatchlistEntryRow[] {
  const stmt = db.prepare<{ scanType: string }, WatchlistEntryRow>(`
    SELECT scan_id AS scanId, scan_type AS scanType, scanned_at AS scannedAt, scan_date AS scanDate,
           list, position, symbol, composite_score AS compositeScore
    FROM watchlist_entries
    WHERE scan_type = @scanType
    ORDER BY scanned_at ASC, list ASC, position ASC
  `);
  return stmt.all({ scanType });
}

export function listScans(db: Database.Database, limit: number = 20): ScanIndexRow[] {
  const stmt = db.prepare<[number], ScanIndexRow>(`
    SELECT scan_id AS scanId, scan_type AS scanType, scanned_at AS scannedAt, scan_date AS scanDate,
           model, file_path AS filePath, content_hash AS contentHash,
           symbol_count AS symbolCount, scored_count AS scoredCount
    FROM scan_index
    ORDER BY scanned_at DESC
    LIMIT ?
  `);
  return stmt.all(limit);
}
