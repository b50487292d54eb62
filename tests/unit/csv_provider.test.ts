import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DataUnavailableError } from '@/core/errors';
import { getEnvConfig, loadEnvConfig, resetEnvConfig } from '@/core/env';
import { CsvBarProvider, barsForLookback, parseBarsCsv } from '@/providers/csv_provider';
import { createProvider } from '@/providers/registry';

describe('parseBarsCsv', () => {
  it('reads columns by header name and accepts ISO or epoch timestamps', () => {
    const bars = parseBarsCsv(
      ['Close,Timestamp,Open,High,Low,Volume', '10.5,2024-01-02T21:00:00Z,10,11,9,1000', '11,1704316800000,10.5,11.5,10,900', ''].join('\n')
    );
    expect(bars).toEqual([
      { timestamp: Date.UTC(2024, 0, 2, 21), open: 10, high: 11, low: 9, close: 10.5, volume: 1000 },
      { timestamp: 1704316800000, open: 10.5, high: 11.5, low: 10, close: 11, volume: 900 },
    ]);
  });

  it('rejects a file without a required column', () => {
    expect(() => parseBarsCsv('timestamp,open,high,low,close\n1,1,1,1,1', 'AAA.csv')).toThrow(
      'csv_invalid_header: AAA.csv is missing column "volume"'
    );
  });

  it('returns nothing for an empty file', () => {
    expect(parseBarsCsv('')).toEqual([]);
  });
});

describe('barsForLookback', () => {
  it('converts trading days to bars per timeframe', () => {
    expect(barsForLookback('1d', 60)).toBe(60);
    expect(barsForLookback('1w', 26)).toBe(26);
    expect(barsForLookback('1h', 2)).toBe(14);
    expect(barsForLookback('5m', 0)).toBe(1);
  });
});

describe('CsvBarProvider', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'csv-bars-'));
    mkdirSync(join(tempDir, '1d'));
    const rows = [0, 1, 2, 3].map((i) => `${Date.UTC(2024, 0, 2 + i, 21)},10,11,9,${100 + i},1000`);
    writeFileSync(join(tempDir, '1d', 'AAA.csv'), ['timestamp,open,high,low,close,volume', ...rows].join('\n'));
    writeFileSync(join(tempDir, '1d', 'EMPTY.csv'), 'timestamp,open,high,low,close,volume\n');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns the trailing bars for the lookback', async () => {
    const provider = new CsvBarProvider(tempDir);

    const bars = await provider.getBars('aaa', '1d', 2);

    expect(bars.map((b) => b.close)).toEqual([102, 103]);
    expect(provider.getRequestCount()).toBe(1);
  });

  it('rejects symbols without a file or without rows', async () => {
    const provider = new CsvBarProvider(tempDir);
    await expect(provider.getBars('ZZZ', '1d', 10)).rejects.toBeInstanceOf(DataUnavailableError);
    await expect(provider.getBars('EMPTY', '1d', 10)).rejects.toThrow('has no valid rows');
  });
});

describe('environment and provider registry', () => {
  const KEYS = ['BAR_PROVIDER', 'ALPACA_API_KEY', 'ALPACA_SECRET_KEY', 'ALPACA_FEED'] as const;
  const saved: Partial<Record<(typeof KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetEnvConfig();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetEnvConfig();
  });

  it('requires Alpaca credentials only for the alpaca provider', () => {
    expect(() => loadEnvConfig()).toThrow('ALPACA_API_KEY and ALPACA_SECRET_KEY');

    process.env.BAR_PROVIDER = 'csv';
    expect(loadEnvConfig().barProvider).toBe('csv');
  });

  it('reads the feed and falls back for unknown values', () => {
    process.env.ALPACA_API_KEY = 'test-key';
    process.env.ALPACA_SECRET_KEY = 'test-secret';
    process.env.ALPACA_FEED = 'sip';
    expect(getEnvConfig().alpacaFeed).toBe('sip');

    resetEnvConfig();
    process.env.ALPACA_FEED = 'other';
    expect(getEnvConfig().alpacaFeed).toBe('iex');
  });

  it('creates the configured provider', () => {
    process.env.BAR_PROVIDER = 'csv';
    expect(createProvider().name).toBe('csv');

    resetEnvConfig();
    process.env.ALPACA_API_KEY = 'test-key';
    process.env.ALPACA_SECRET_KEY = 'test-secret';
    expect(createProvider('alpaca').name).toBe('alpaca');
  });
});
