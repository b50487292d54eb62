/**
 * Spot Scan Script
 * Intraday momentum, ATR, range consumed, relative volume and levels.
 *
 * Usage: npx tsx scripts/spot.ts [SYMBOL] [--sector XLK] [--universe sample]
 *        [--model v1.3] [--provider alpaca|csv] [--no-write]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { useUniverse } from '../src/core/config';
import { getBenchmark, getSectorMap, getUniverse } from '../src/core/universe';
import { hasFlag, positionals, readOption } from '../src/lib/cliArgs';
import { formatNumber, formatSigned, formatTable, type Column } from '../src/lib/tableFormat';
import { createProvider } from '../src/providers/registry';
import { isProviderType } from '../src/providers/types';
import { buildSpotRecord } from '../src/run/builder';
import { writeSpotRecord } from '../src/run/writer';
import { getScoringConfig } from '../src/scoring/scoring_config';
import { selectBottomK, selectTopK } from '../src/scoring/topk';
import { runSpot } from '../src/spot/engine';
import type { SpotMetrics } from '../src/spot/types';
import { SPOT_TIMEFRAMES, TIMEFRAMES } from '../src/types/bars';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('spot');

const LIST_SIZE = 10;
const OPTIONS_WITH_VALUES = ['--sector', '--universe', '--model', '--provider'];

const LIST_COLUMNS: Column[] = [
  { header: 'Symbol' },
  { header: 'Sector' },
  { header: 'Composite', align: 'right' },
  { header: 'RS 1h', align: 'right' },
  { header: 'RS 15m', align: 'right' },
  { header: 'RS 5m', align: 'right' },
  { header: 'Range %', align: 'right' },
  { header: 'RVol', align: 'right' },
  { header: 'Aligned' },
];

function listRow(result: SpotMetrics): string[] {
  const rs = result.momentum.relativeStrength;
  return [
    result.symbol,
    result.sector ?? '',
    formatSigned(result.momentum.composite, 3),
    formatSigned(rs['1h'], 3),
    formatSigned(rs['15m'], 3),
    formatSigned(rs['5m'], 3),
    formatSigned(result.rangeConsumed.daily, 1),
    formatNumber(result.relativeVolume.session),
    result.momentum.aligned ? 'yes' : 'no',
  ];
}

function printBreakdown(result: SpotMetrics): void {
  const { momentum, levels, relativeVolume } = result;
  console.log(`\n${result.symbol}${result.sector ? ` (${result.sector})` : ''}`);
  console.log(
    formatTable(
      [{ header: 'Timeframe' }, { header: 'RS', align: 'right' }, { header: 'RVol', align: 'right' }, { header: 'ATR', align: 'right' }],
      TIMEFRAMES.map((tf) => {
        const spot = SPOT_TIMEFRAMES.find((candidate) => candidate === tf);
        return [
          tf,
          spot ? formatSigned(momentum.relativeStrength[spot], 3) : '',
          spot ? formatNumber(relativeVolume.byTimeframe[spot]) : '',
          formatNumber(result.atr[tf]),
        ];
      })
    )
  );

  console.log(`\nComposite: ${formatSigned(momentum.composite, 3)} (bias ${momentum.bias}, aligned ${momentum.aligned})`);
  console.log(`Range consumed: daily ${formatSigned(result.rangeConsumed.daily, 1)}%, weekly ${formatSigned(result.rangeConsumed.weekly, 1)}%`);
  console.log(`Relative volume: session ${formatNumber(relativeVolume.session)}, daily ${formatNumber(relativeVolume.daily)}`);
  console.log(
    `Levels: price ${formatNumber(levels.price)} | day high ${formatSigned(levels.pctFromDailyHigh)}% | day low ${formatSigned(levels.pctFromDailyLow)}% | 20d high ${formatSigned(levels.pctFrom20dHigh)}% | 20d low ${formatSigned(levels.pctFrom20dLow)}%`
  );
  for (const issue of result.issues) {
    console.log(`  ! ${issue.timeframe ?? '-'} ${issue.kind}: ${issue.message}`);
  }
}

async function main() {
  const argv = process.argv.slice(2);
  const universeArg = readOption(argv, '--universe');
  if (universeArg) {
    useUniverse(universeArg);
  }

  const providerName = readOption(argv, '--provider');
  if (providerName !== undefined && !isProviderType(providerName)) {
    throw new Error(`invalid_argument: --provider must be alpaca or csv, got "${providerName}"`);
  }

  const symbol = positionals(argv, OPTIONS_WITH_VALUES)[0]?.trim().toUpperCase() ?? null;
  const sector = readOption(argv, '--sector')?.trim().toUpperCase() ?? null;
  const { model, pipeline } = getScoringConfig(readOption(argv, '--model'));
  const provider = createProvider(providerName);
  const benchmark = getBenchmark();

  try {
    const spot = await runSpot({
      provider,
      symbols: symbol ? [symbol] : getUniverse(),
      benchmark,
      sectorMap: getSectorMap(),
      model: model.spot,
      pipeline,
      sector: sector ?? undefined,
    });

    if (!hasFlag(argv, '--no-write')) {
      const record = buildSpotRecord(spot, {
        mode: symbol ? 'symbol' : 'universe',
        model: model.name,
        benchmark,
        parameters: { symbol, sector_filter: sector, provider: provider.name },
      });
      const written = writeSpotRecord(record);
      console.log(`Saved spot scan ${written.scanId} -> ${written.filePath}`);
    }

    if (symbol) {
      const [result] = spot.results;
      if (!result) {
        console.log(`\n${symbol}: ${spot.skipped[0]?.message ?? 'no data'}`);
        return;
      }
      printBreakdown(result);
      return;
    }

    const rankable = spot.results.map((result) => ({
      result,
      symbol: result.symbol,
      compositeScore: result.momentum.composite,
    }));
    console.log(`\nStrongest intraday momentum${sector ? ` in ${sector}` : ''}`);
    console.log(formatTable(LIST_COLUMNS, selectTopK(rankable, LIST_SIZE).map((row) => listRow(row.result))));
    console.log('\nWeakest intraday momentum');
    console.log(formatTable(LIST_COLUMNS, selectBottomK(rankable, LIST_SIZE).map((row) => listRow(row.result))));
    if (spot.skipped.length > 0) {
      console.log(`\nSkipped ${spot.skipped.length} symbols without daily bars`);
    }
  } finally {
    provider.close();
  }
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Spot scan failed');
  process.exit(1);
});
