/**
 * Creates the scan history database and applies migrations.
 *
 * Usage:
 *   npx tsx scripts/init_db.ts           # create or migrate in place
 *   npx tsx scripts/init_db.ts --reset   # drop the database file first
 */

import dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config();

import { closeDatabase, getDbPath, initializeDatabase, resetDatabase } from '../src/data/db';
import { listScans } from '../src/data/repositories/scan_history_repo';
import { hasFlag } from '../src/lib/cliArgs';

const argv = process.argv.slice(2);

try {
  if (hasFlag(argv, '--reset')) {
    console.log(`Resetting ${getDbPath()}...`);
    resetDatabase();
  }

  const db = initializeDatabase();
  const recent = listScans(db, 1);
  console.log('Database ready:', db.name);
  console.log(recent.length > 0 ? `Latest scan: ${recent[0].scanId} (${recent[0].scanType})` : 'No scans recorded yet');
} catch (error) {
  console.error('Database initialization failed:', error);
  process.exitCode = 1;
} finally {
  closeDatabase();
}
