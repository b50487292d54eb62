/**
 * Universe management - symbol lists, benchmark and sector mapping
 */

import { getConfig, type AppConfig } from './config';

export interface UniverseInfo {
  name: string;
  version: string;
  benchmark: string;
  symbolCount: number;
  sectorEtfCount: number;
}

/** Stock symbol -> sector ETF tag. */
export type SectorMap = Readonly<Record<string, string>>;

export function getUniverse(appConfig: AppConfig = getConfig()): string[] {
  return appConfig.universe.symbols;
}

export function getSectorEtfs(appConfig: AppConfig = getConfig()): string[] {
  return appConfig.universe.sectorEtfs;
}

export function getBenchmark(appConfig: AppConfig = getConfig()): string {
  return appConfig.universe.benchmark;
}

export function getSectorMap(appConfig: AppConfig = getConfig()): SectorMap {
  return appConfig.sectorMap.symbols;
}

export function getSectorName(sectorEtf: string, appConfig: AppConfig = getConfig()): string | null {
  return appConfig.sectorMap.sectors[normalizeSymbol(sectorEtf)] ?? null;
}

export function getUniverseInfo(appConfig: AppConfig = getConfig()): UniverseInfo {
  return {
    name: appConfig.universe.name,
    version: appConfig.universe.version,
    benchmark: appConfig.universe.benchmark,
    symbolCount: appConfig.universe.symbols.length,
    sectorEtfCount: appConfig.universe.sectorEtfs.length,
  };
}

export function getSector(symbol: string, sectorMap: SectorMap): string | null {
  return sectorMap[normalizeSymbol(symbol)] ?? null;
}

export function getStocksInSector(sectorEtf: string, sectorMap: SectorMap): string[] {
  const tag = normalizeSymbol(sectorEtf);
  return Object.keys(sectorMap).filter((symbol) => sectorMap[symbol] === tag);
}

/** Universe symbols with no sector tag. */
export function validateUniverse(symbols: readonly string[], sectorMap: SectorMap): string[] {
  return symbols.filter((symbol) => getSector(symbol, sectorMap) === null);
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
