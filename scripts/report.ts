/**
 * History Report Script
 * Reads stored scan history and prints trend reports.
 *
 * Usage: npx tsx scripts/report.ts sectors|stock <SYMBOL>|rankings|watchlists|scans
 *        [--since yyyy-MM-dd] [--csv] [--scan-type stock|sector]
 */

import dotenv from 'dotenv';
import { mkdirSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { formatDate } from '../src/core/time';
import { closeDatabase, initializeDatabase } from '../src/data/db';
import { listScans, loadScoreHistory, loadWatchlistEntries } from '../src/data/repositories/scan_history_repo';
import { hasFlag, positionals, readOption } from '../src/lib/cliArgs';
import {
  rankingHistoryReport,
  sectorChangeReport,
  sectorTrendReport,
  stockTrackerReport,
  watchlistFrequencyReport,
  type TrendReport,
} from '../src/lib/scanReports';
import { formatNumber, formatSigned, formatTable, toCsv, type Column } from '../src/lib/tableFormat';
import type { ScanType } from '../src/types/scan_record';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('report');

const OPTIONS_WITH_VALUES = ['--since', '--scan-type'];

function emit(name: string, headers: string[], rows: string[][], csv: boolean): void {
  console.log(formatTable(headers.map((header, i): Column => ({ header, align: i === 0 ? 'left' : 'right' })), rows));
  if (!csv) return;

  const dir = join(process.cwd(), 'data', 'reports');
  mkdirSync(dir, { recursive: true });
  const filePath = join(dir, `${name}_${formatDate(new Date())}.csv`);
  writeFileSync(filePath, toCsv(headers, rows), 'utf-8');
  console.log(`\nWrote ${filePath}`);
}

function trendRows(trend: TrendReport): string[][] {
  return trend.dates.map((date) => [date, ...trend.symbols.map((symbol) => formatNumber(trend.scores[date][symbol], 3))]);
}

function parseScanType(raw: string | undefined, fallback: ScanType): ScanType {
  if (raw === undefined) return fallback;
  if (raw === 'stock' || raw === 'sector') return raw;
  throw new Error(`invalid_argument: --scan-type must be stock or sector, got "${raw}"`);
}

async function main() {
  const argv = process.argv.slice(2);
  const [command, target] = positionals(argv, OPTIONS_WITH_VALUES);
  const since = readOption(argv, '--since');
  const csv = hasFlag(argv, '--csv');
  const db = initializeDatabase();

  try {
    switch (command) {
      case 'sectors': {
        const history = loadScoreHistory(db, { scanType: 'sector', since });
        const trend = sectorTrendReport(history);
        emit('sector_trend', ['Date', ...trend.symbols], trendRows(trend), csv);

        const changes = sectorChangeReport(history);
        if (changes.length === 0) {
          console.log('\nNeed at least two scan days for sector changes');
          break;
        }
        console.log('');
        emit(
          'sector_changes',
          ['Sector', 'Latest', 'Δ1d', 'Δ5d', 'Direction'],
          changes.map((row) => [
            row.symbol,
            formatNumber(row.latestScore, 3),
            formatSigned(row.delta1d, 3),
            formatSigned(row.delta5d, 3),
            row.direction,
          ]),
          csv
        );
        break;
      }
      case 'stock': {
        if (!target) {
          throw new Error('invalid_argument: stock report needs a symbol');
        }
        const rows = stockTrackerReport(loadScoreHistory(db, { scanType: 'stock', symbol: target, since }), target);
        if (rows.length === 0) {
          console.log(`No history for ${target.toUpperCase()}`);
          break;
        }
        emit(
          `stock_${target.toUpperCase()}`,
          ['Date', '1w', '1d', '1h', 'Composite', 'Δ', 'Alignment'],
          rows.map((row) => [
            row.scanDate,
            formatNumber(row.score1w, 3),
            formatNumber(row.score1d, 3),
            formatNumber(row.score1h, 3),
            formatNumber(row.compositeScore, 3),
            formatSigned(row.scoreDelta, 3),
            row.alignment,
          ]),
          csv
        );
        break;
      }
      case 'rankings': {
        const scanType = parseScanType(readOption(argv, '--scan-type'), 'stock');
        const trend = rankingHistoryReport(loadScoreHistory(db, { scanType, since }));
        emit(`rankings_${scanType}`, ['Date', ...trend.symbols], trendRows(trend), csv);
        break;
      }
      case 'watchlists': {
        const scanType = parseScanType(readOption(argv, '--scan-type'), 'stock');
        const report = watchlistFrequencyReport(loadWatchlistEntries(db, scanType));
        for (const list of ['strong', 'weak'] as const) {
          console.log(`\n${list === 'strong' ? 'Strong' : 'Weak'} list appearances`);
          emit(
            `watchlist_${list}`,
            ['Symbol', 'Appearances', 'Last seen'],
            report[list].map((row) => [row.symbol, String(row.appearances), row.lastSeen]),
            csv
          );
        }
        break;
      }
      case 'scans': {
        emit(
          'scans',
          ['Scan', 'Type', 'Model', 'Symbols', 'Scored'],
          listScans(db).map((scan) => [
            scan.scanId,
            scan.scanType,
            scan.model,
            String(scan.symbolCount),
            String(scan.scoredCount),
          ]),
          csv
        );
        break;
      }
      default:
        throw new Error(`invalid_argument: unknown report "${command ?? ''}" (sectors, stock, rankings, watchlists, scans)`);
    }
  } finally {
    closeDatabase();
  }
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Report failed');
  process.exit(1);
});
