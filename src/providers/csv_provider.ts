/**
 * Bar provider backed by local CSV files: <root>/<timeframe>/<SYMBOL>.csv
 * with a `timestamp,open,high,low,close,volume` header. Timestamps may be
 * ISO-8601 strings or epoch milliseconds.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { isAbsolute, join } from 'path';
import { normalizeBarSeries, tail } from '@/core/bars';
import { DataUnavailableError } from '@/core/errors';
import type { Bar, BarSeries, Timeframe } from '@/types/bars';
import { createChildLogger } from '@/utils/logger';
import type { BarSeriesProvider } from './types';

const logger = createChildLogger('csv_provider');

const REQUIRED_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

/** Regular-session bars per trading day. */
const BARS_PER_DAY: Record<Timeframe, number> = {
  '1w': 1,
  '1d': 1,
  '1h': 7,
  '15m': 26,
  '5m': 78,
};

export function barsForLookback(timeframe: Timeframe, lookback: number): number {
  return Math.max(1, Math.ceil(lookback * BARS_PER_DAY[timeframe]));
}

function parseTimestamp(raw: string): number {
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  return Date.parse(trimmed);
}

export function parseBarsCsv(content: string, source: string = 'csv'): Bar[] {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length === 0) return [];

  const header = lines[0].split(',').map((h) => h.trim().toLowerCase());
  const index: Record<string, number> = {};
  for (const column of REQUIRED_COLUMNS) {
    const position = header.indexOf(column);
    if (position === -1) {
      throw new Error(`csv_invalid_header: ${source} is missing column "${column}"`);
    }
    index[column] = position;
  }

  const bars: Bar[] = [];
  for (const line of lines.slice(1)) {
    const cells = line.split(',');
    bars.push({
      timestamp: parseTimestamp(cells[index.timestamp] ?? ''),
      open: Number(cells[index.open]),
      high: Number(cells[index.high]),
      low: Number(cells[index.low]),
      close: Number(cells[index.close]),
      volume: Number(cells[index.volume]),
    });
  }
  return bars;
}

export class CsvBarProvider implements BarSeriesProvider {
  readonly name = 'csv';
  private readonly rootDir: string;
  private reads = 0;

  constructor(rootDir?: string) {
    const configured = rootDir ?? process.env.BARS_DIR ?? join('data', 'bars');
    this.rootDir = isAbsolute(configured) ? configured : join(process.cwd(), configured);
  }

  filePath(symbol: string, timeframe: Timeframe): string {
    return join(this.rootDir, timeframe, `${symbol.toUpperCase()}.csv`);
  }

  async getBars(symbol: string, timeframe: Timeframe, lookback: number): Promise<BarSeries> {
    const path = this.filePath(symbol, timeframe);
    if (!existsSync(path)) {
      throw new DataUnavailableError(symbol, timeframe, `no file at ${path}`);
    }

    this.reads++;
    const series = normalizeBarSeries(parseBarsCsv(await readFile(path, 'utf-8'), path));
    if (series.length === 0) {
      throw new DataUnavailableError(symbol, timeframe, `${path} has no valid rows`);
    }

    logger.debug({ symbol, timeframe, rows: series.length }, 'Bars loaded from csv');
    return tail(series, barsForLookback(timeframe, lookback));
  }

  getRequestCount(): number {
    return this.reads;
  }

  close(): void {
    // Nothing held open between reads
  }
}
