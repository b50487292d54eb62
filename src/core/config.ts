/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('config');

export interface UniverseConfig {
  name: string;
  version: string;
  description: string;
  benchmark: string;
  symbols: string[];
  sectorEtfs: string[];
}

export interface SectorMapConfig {
  /** Sector ETF tag -> display name. */
  sectors: Record<string, string>;
  /** Stock symbol -> sector ETF tag. */
  symbols: Record<string, string>;
}

export interface AppConfig {
  universe: UniverseConfig;
  sectorMap: SectorMapConfig;
  universePath: string;
  projectRoot: string;
}

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveUniverseByDisplayName(projectRoot: string, universeName: string): string | null {
  const normalized = universeName.trim().toLowerCase();
  const universeDir = join(projectRoot, 'config', 'universes');
  if (!normalized || !existsSync(universeDir)) return null;

  for (const file of readdirSync(universeDir).filter((f) => f.endsWith('.json'))) {
    const filePath = join(universeDir, file);
    let parsed: unknown;
    try {
      parsed = readJson(filePath);
    } catch (error) {
      logger.warn({ filePath, error: String(error) }, 'Skipping unreadable universe pack');
      continue;
    }
    if (isRecord(parsed) && typeof parsed.name === 'string' && parsed.name.trim().toLowerCase() === normalized) {
      return filePath;
    }
  }
  return null;
}

/**
 * Universe pack selection: explicit name/path, then UNIVERSE env,
 * then config/universe.json.
 */
export function resolveUniversePath(projectRoot: string, requested?: string): string {
  const configDir = join(projectRoot, 'config');
  const selector = requested?.trim() || process.env.UNIVERSE?.trim();

  if (selector) {
    const asPack =
      selector.endsWith('.json') || selector.includes('/') ? selector : join('universes', `${selector}.json`);
    const packPath = isAbsolute(asPack)
      ? asPack
      : join(projectRoot, asPack.startsWith('config/') ? asPack : join('config', asPack));
    if (existsSync(packPath)) {
      return packPath;
    }

    const displayNamePath = resolveUniverseByDisplayName(projectRoot, selector);
    if (displayNamePath) {
      return displayNamePath;
    }

    throw new Error(`universe_not_found: ${selector}`);
  }

  return join(configDir, 'universe.json');
}

function normalizeSymbols(raw: unknown): string[] {
  const symbols = Array.isArray(raw) ? raw : [];
  const normalized: string[] = [];
  const seen = new Set<string>();
  for (const sym of symbols) {
    if (typeof sym !== 'string') continue;
    const upper = sym.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalized.push(upper);
    }
  }
  return normalized;
}

export function normalizeUniverse(raw: unknown): UniverseConfig {
  const parsed = isRecord(raw) ? raw : {};
  const benchmark = typeof parsed.benchmark === 'string' && parsed.benchmark.trim() ? parsed.benchmark : 'SPY';

  return {
    name: typeof parsed.name === 'string' ? parsed.name : 'Universe',
    version: typeof parsed.version === 'string' ? parsed.version : '1',
    description: typeof parsed.description === 'string' ? parsed.description : '',
    benchmark: benchmark.trim().toUpperCase(),
    symbols: normalizeSymbols(parsed.symbols),
    sectorEtfs: normalizeSymbols(parsed.sector_etfs),
  };
}

function normalizeTagRecord(raw: unknown, upperCaseValues: boolean): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(raw)) return result;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string' || !key.trim()) continue;
    result[key.trim().toUpperCase()] = upperCaseValues ? value.trim().toUpperCase() : value.trim();
  }
  return result;
}

export function normalizeSectorMap(raw: unknown): SectorMapConfig {
  const parsed = isRecord(raw) ? raw : {};
  return {
    sectors: normalizeTagRecord(parsed.sectors, false),
    symbols: normalizeTagRecord(parsed.symbols, true),
  };
}

function loadSectorMap(configDir: string): SectorMapConfig {
  const path = join(configDir, 'sector_map.json');
  if (!existsSync(path)) {
    logger.warn({ path }, 'Sector map not found; every symbol will be unmapped');
    return { sectors: {}, symbols: {} };
  }
  return normalizeSectorMap(readJson(path));
}

export function loadConfig(universeSelector?: string): AppConfig {
  const projectRoot = getProjectRoot();
  const universePath = resolveUniversePath(projectRoot, universeSelector);
  const universe = normalizeUniverse(readJson(universePath));
  const sectorMap = loadSectorMap(join(projectRoot, 'config'));

  logger.debug(
    { universe: universe.name, symbols: universe.symbols.length, sectorEtfs: universe.sectorEtfs.length },
    'Configuration loaded'
  );

  return {
    universe,
    sectorMap,
    universePath,
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Load a specific universe pack and make it the cached configuration. */
export function useUniverse(universeSelector: string): AppConfig {
  cachedConfig = loadConfig(universeSelector);
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
