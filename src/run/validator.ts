/**
 * Record validator
 * Schema validation plus cross-field consistency checks on scan records
 */

import { validateScan, validateSpot, type ValidationResult } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import type { ScanRecordV1, SpotRecordV1 } from '@/types/scan_record';

const logger = createChildLogger('record_validator');

const WEIGHT_TOLERANCE = 1e-9;

export function validateScanRecord(data: unknown): ValidationResult<ScanRecordV1> {
  const result = validateScan(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Scan record validation failed');
  } else {
    logger.debug('Scan record validation passed');
  }

  return result;
}

export function validateAndThrow(data: unknown): ScanRecordV1 {
  const result = validateScan(data);
  if (!result.valid) {
    throw new Error(`scan_record_invalid: ${result.errors.join('; ')}`);
  }
  return result.data;
}

export function validateSpotAndThrow(data: unknown): SpotRecordV1 {
  const result = validateSpot(data);
  if (!result.valid) {
    throw new Error(`spot_record_invalid: ${result.errors.join('; ')}`);
  }
  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkScanConsistency(record: ScanRecordV1): ConsistencyCheck {
  const issues: string[] = [];
  const bySymbol = new Map(record.rows.map((row) => [row.symbol, row]));

  if (bySymbol.size !== record.rows.length) {
    issues.push('Duplicate symbols in rows');
  }

  // Ranks: 1..k over scored rows in order, null rows last
  let expectedRank = 1;
  let seenUnranked = false;
  for (const row of record.rows) {
    if (row.rank === null) {
      seenUnranked = true;
      if (row.composite_score !== null) issues.push(`Row ${row.symbol} has a score but no rank`);
      continue;
    }
    if (seenUnranked) issues.push(`Ranked row ${row.symbol} follows an unranked row`);
    if (row.rank !== expectedRank) issues.push(`Row ${row.symbol} has rank ${row.rank}, expected ${expectedRank}`);
    expectedRank++;
  }

  for (const list of ['strong', 'weak'] as const) {
    for (const symbol of record.watchlists[list]) {
      const row = bySymbol.get(symbol);
      if (!row || row.composite_score === null) {
        issues.push(`${list} watchlist symbol ${symbol} is not a scored row`);
      }
    }
  }

  for (const row of record.rows) {
    if (row.composite_score === null) continue;
    const total = Object.values(row.effective_weights).reduce<number>((sum, w) => sum + (w ?? 0), 0);
    if (total > 1 + WEIGHT_TOLERANCE) {
      issues.push(`Effective weights for ${row.symbol} sum to ${total}`);
    }
  }

  if (record.universe.symbol_count !== record.rows.length) {
    issues.push(
      `Row count (${record.rows.length}) doesn't match universe count (${record.universe.symbol_count})`
    );
  }

  if (issues.length > 0) {
    logger.warn({ scanId: record.scan_id, issues }, 'Scan consistency issues');
  }

  return { passed: issues.length === 0, issues };
}
