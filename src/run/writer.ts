/**
 * Record writer
 * Saves scan and spot records to disk and scan history to the database
 */

import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import type Database from 'better-sqlite3';
import { getDatabase } from '@/data/db';
import { saveScanHistory } from '@/data/repositories/scan_history_repo';
import { createChildLogger } from '@/utils/logger';
import type { ScanRecordV1, SpotRecordV1 } from '@/types/scan_record';
import { validateAndThrow, validateSpotAndThrow } from './validator';

const logger = createChildLogger('record_writer');

export interface WriteResult {
  scanId: string;
  filePath: string;
  contentHash: string;
}

export interface WriteOptions {
  /** Defaults to <cwd>/data. */
  dataDir?: string;
  /** Defaults to the shared connection; null skips the history tables. */
  db?: Database.Database | null;
}

function ensureDir(dir: string): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
}

export function scanDirectory(dataDir: string, scanType: ScanRecordV1['scan_type']): string {
  return join(dataDir, 'scans', scanType === 'stock' ? 'stocks' : 'sectors');
}

export function writeScanRecord(record: ScanRecordV1, options: WriteOptions = {}): WriteResult {
  validateAndThrow(record);

  const dataDir = options.dataDir ?? join(process.cwd(), 'data');
  const dir = ensureDir(scanDirectory(dataDir, record.scan_type));
  const filePath = join(dir, `${record.scan_type}_${record.scan_id}.json`);
  writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');
  logger.info({ scanId: record.scan_id, filePath }, 'Scan record written');

  const db = options.db === undefined ? getDatabase() : options.db;
  if (db) {
    saveScanHistory(db, record, filePath);
    logger.debug({ scanId: record.scan_id }, 'Scan indexed in database');
  }

  return { scanId: record.scan_id, filePath, contentHash: record.content_hash };
}

export function writeSpotRecord(record: SpotRecordV1, options: Pick<WriteOptions, 'dataDir'> = {}): WriteResult {
  validateSpotAndThrow(record);

  const dataDir = options.dataDir ?? join(process.cwd(), 'data');
  const dir = ensureDir(join(dataDir, 'spot'));
  const filePath = join(dir, `spot_${record.mode}_${record.scan_id}.json`);
  writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');
  logger.info({ scanId: record.scan_id, filePath }, 'Spot record written');

  return { scanId: record.scan_id, filePath, contentHash: record.content_hash };
}
