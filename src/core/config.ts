/**
 * Application configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import {
  validateBenchmarksFile,
  validateMacroContextFile,
  validateUniverseFile,
  type ValidationResult,
} from '@/validation/ajv_instance';
import type { Benchmark, BenchmarkKind, Instrument, MacroContext } from '@/types/market';
import { ConfigError } from './env';

export interface UniverseFile {
  name: string;
  description?: string;
  instruments: Array<{ symbol: string; name?: string; sector: string }>;
}

export interface BenchmarksFile {
  benchmarks: Array<{ symbol: string; name: string; kind: BenchmarkKind }>;
}

export interface MacroContextFile {
  as_of?: string;
  rows: Array<{ item: string; value: string; status: string }>;
}

export interface AppConfig {
  universeName: string;
  instruments: Instrument[];
  benchmarks: Benchmark[];
  macro: MacroContext;
  projectRoot: string;
}

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(projectRoot: string, override: string | undefined, fallback: string): string {
  if (!override) {
    return join(projectRoot, 'config', fallback);
  }
  if (isAbsolute(override)) {
    return override;
  }
  return override.startsWith('config/')
    ? join(projectRoot, override)
    : join(projectRoot, 'config', override);
}

function readJsonFile<T>(
  filePath: string,
  validate: (data: unknown) => ValidationResult<T>
): T {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  const result = validate(parsed);
  if (!result.valid) {
    throw new ConfigError(`Config file failed validation: ${filePath}`, result.errors);
  }
  return result.data;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/** Upper-cases symbols and keeps the first entry for each duplicate. */
export function normalizeInstruments(file: UniverseFile): Instrument[] {
  const seen = new Set<string>();
  const instruments: Instrument[] = [];

  for (const entry of file.instruments) {
    const symbol = normalizeSymbol(entry.symbol);
    if (!symbol || seen.has(symbol)) continue;
    seen.add(symbol);
    instruments.push({
      symbol,
      name: entry.name?.trim() || symbol,
      sector: entry.sector,
    });
  }

  if (instruments.length === 0) {
    throw new ConfigError('Universe contains no usable symbols');
  }
  return instruments;
}

export function loadConfig(projectRoot: string = process.cwd()): AppConfig {
  const universe = readJsonFile(
    resolveConfigPath(projectRoot, process.env.UNIVERSE_CONFIG, 'universe.json'),
    validateUniverseFile
  );
  const benchmarks = readJsonFile(
    resolveConfigPath(projectRoot, process.env.BENCHMARKS_CONFIG, 'benchmarks.json'),
    validateBenchmarksFile
  );

  // Macro context is curated by hand; an absent file just means an empty table
  const macroPath = resolveConfigPath(projectRoot, process.env.MACRO_CONTEXT_CONFIG, 'macro_context.json');
  const macro = existsSync(macroPath)
    ? readJsonFile(macroPath, validateMacroContextFile).rows
    : [];

  return {
    universeName: universe.name,
    instruments: normalizeInstruments(universe),
    benchmarks: benchmarks.benchmarks.map((b) => ({
      symbol: normalizeSymbol(b.symbol),
      name: b.name,
      kind: b.kind,
    })),
    macro: Object.freeze(macro.map((row) => ({ ...row }))),
    projectRoot,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
