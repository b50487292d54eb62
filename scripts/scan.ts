/**
 * Momentum Scan Script
 * Scores sector ETFs and the stock universe across 1w/1d/1h, writes
 * scan records and prints the sector table and strong/weak watchlists.
 *
 * Usage: npx tsx scripts/scan.ts [--top-n 10] [--trading-days 60] [--weeks 26]
 *        [--hourly-days 30] [--no-hourly] [--sector XLK] [--universe sample]
 *        [--model v1.3] [--provider alpaca|csv] [--no-write]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getConfig, useUniverse } from '../src/core/config';
import { getBenchmark, getSectorEtfs, getSectorMap, getSectorName, getUniverse, validateUniverse } from '../src/core/universe';
import { closeDatabase } from '../src/data/db';
import { hasFlag, readIntOption, readOption } from '../src/lib/cliArgs';
import { formatNumber, formatTable, type Column } from '../src/lib/tableFormat';
import { createProvider } from '../src/providers/registry';
import { isProviderType, type BarSeriesProvider } from '../src/providers/types';
import { buildScanRecord } from '../src/run/builder';
import { checkScanConsistency } from '../src/run/validator';
import { writeScanRecord } from '../src/run/writer';
import { DEFAULT_TOP_N, runScan } from '../src/scoring/engine';
import { filterBySector } from '../src/scoring/ranking';
import { getScoringConfig } from '../src/scoring/scoring_config';
import type { RankedRow, RankedUniverse } from '../src/scoring/types';
import { SCAN_TIMEFRAMES, type ScanTimeframe } from '../src/types/bars';
import type { ScanType } from '../src/types/scan_record';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('scan');

interface ScanCliArgs {
  topN: number;
  timeframes: ScanTimeframe[];
  fetchLookbacks: Record<ScanTimeframe, number>;
  sector: string | null;
  universe: string | undefined;
  model: string | undefined;
  provider: BarSeriesProvider;
  write: boolean;
}

function parseArgs(argv: readonly string[]): ScanCliArgs {
  const providerName = readOption(argv, '--provider');
  if (providerName !== undefined && !isProviderType(providerName)) {
    throw new Error(`invalid_argument: --provider must be alpaca or csv, got "${providerName}"`);
  }

  return {
    topN: readIntOption(argv, '--top-n', DEFAULT_TOP_N),
    timeframes: hasFlag(argv, '--no-hourly') ? ['1w', '1d'] : [...SCAN_TIMEFRAMES],
    fetchLookbacks: {
      '1w': readIntOption(argv, '--weeks', 26),
      '1d': readIntOption(argv, '--trading-days', 60),
      '1h': readIntOption(argv, '--hourly-days', 30),
    },
    sector: readOption(argv, '--sector')?.trim().toUpperCase() ?? null,
    universe: readOption(argv, '--universe'),
    model: readOption(argv, '--model'),
    provider: createProvider(providerName),
    write: !hasFlag(argv, '--no-write'),
  };
}

const SCORE_COLUMNS: Column[] = [
  { header: 'Rank', align: 'right' },
  { header: 'Symbol' },
  { header: 'Sector' },
  { header: 'Composite', align: 'right' },
  { header: '1w', align: 'right' },
  { header: '1d', align: 'right' },
  { header: '1h', align: 'right' },
  { header: 'Bias' },
];

function scoreRow(row: RankedRow, sectorLabel: (row: RankedRow) => string): string[] {
  return [
    row.rank === null ? '--' : String(row.rank),
    row.symbol,
    sectorLabel(row),
    formatNumber(row.compositeScore, 3),
    formatNumber(row.timeframeScores['1w'], 3),
    formatNumber(row.timeframeScores['1d'], 3),
    formatNumber(row.timeframeScores['1h'], 3),
    row.alignment,
  ];
}

function printSectors(ranked: RankedUniverse): void {
  console.log('\nSector ETFs');
  console.log(formatTable(SCORE_COLUMNS, ranked.rows.map((row) => scoreRow(row, (r) => getSectorName(r.symbol) ?? ''))));
}

function printWatchlists(ranked: RankedUniverse, topN: number, sector: string | null): void {
  const label = (row: RankedRow) => row.sector ?? '';
  if (sector) {
    const members = filterBySector(ranked.rows, sector);
    console.log(`\n${sector} (${getSectorName(sector) ?? 'unknown sector'}): ${members.length} symbols`);
    console.log(formatTable(SCORE_COLUMNS, members.slice(0, topN).map((row) => scoreRow(row, label))));
    return;
  }

  console.log(`\nStrongest ${ranked.strong.length}`);
  console.log(formatTable(SCORE_COLUMNS, ranked.strong.map((row) => scoreRow(row, label))));
  console.log(`\nWeakest ${ranked.weak.length}`);
  console.log(formatTable(SCORE_COLUMNS, ranked.weak.map((row) => scoreRow(row, label))));
}

function persist(ranked: RankedUniverse, scanType: ScanType, args: ScanCliArgs): void {
  const { universe } = getConfig();
  const record = buildScanRecord(ranked, {
    scanType,
    universe,
    parameters: {
      top_n: args.topN,
      timeframes: [...args.timeframes],
      fetch_lookbacks: Object.fromEntries(args.timeframes.map((tf) => [tf, args.fetchLookbacks[tf]])),
      sector_filter: args.sector,
      provider: args.provider.name,
    },
  });

  const consistency = checkScanConsistency(record);
  if (!consistency.passed) {
    logger.warn({ scanType, issues: consistency.issues }, 'Scan record consistency check failed');
  }

  if (args.write) {
    const result = writeScanRecord(record);
    console.log(`Saved ${scanType} scan ${result.scanId} -> ${result.filePath}`);
  }
}

async function main() {
  const argv = process.argv.slice(2);
  const universeArg = readOption(argv, '--universe');
  if (universeArg) {
    useUniverse(universeArg);
    logger.info({ universe: universeArg }, 'Using universe from CLI flag');
  }

  const args = parseArgs(argv);
  const { model, pipeline } = getScoringConfig(args.model);
  const benchmark = getBenchmark();
  const stocks = getUniverse();
  const sectorMap = getSectorMap();

  const unmapped = validateUniverse(stocks, sectorMap);
  if (unmapped.length > 0) {
    logger.warn({ count: unmapped.length, symbols: unmapped.slice(0, 20) }, 'Symbols missing from sector map');
  }

  logger.info(
    { model: model.name, benchmark, stocks: stocks.length, timeframes: args.timeframes, provider: args.provider.name },
    'Starting momentum scan'
  );

  try {
    const common = {
      provider: args.provider,
      benchmark,
      timeframes: args.timeframes,
      fetchLookbacks: args.fetchLookbacks,
      model,
      pipeline,
      topN: args.topN,
    };

    const sectors = await runScan({ ...common, universe: getSectorEtfs(), sectorMap: {} });
    persist(sectors, 'sector', args);
    printSectors(sectors);

    const ranked = await runScan({ ...common, universe: stocks, sectorMap });
    persist(ranked, 'stock', args);
    printWatchlists(ranked, args.topN, args.sector);

    if (ranked.fatalTimeframes.length > 0) {
      console.log(`\nSkipped timeframes (benchmark unavailable): ${ranked.fatalTimeframes.join(', ')}`);
    }
    console.log(`\nIssues recorded: ${ranked.issues.length + sectors.issues.length}`);
  } finally {
    args.provider.close();
    closeDatabase();
  }
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Momentum scan failed');
  process.exit(1);
});
