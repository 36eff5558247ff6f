/**
 * Quote normalization
 *
 * Every snapshot field resolves through an ordered fallback chain ending in a
 * concrete default, so scoring never sees a missing value.
 */

import type { Instrument, MarketSnapshot, RawInstrumentQuote } from '@/types/market';

/** Baseline used when no close was found inside the look-back window */
export const SYNTHETIC_HISTORY_RATIO = 0.85;

type Candidate = number | null | undefined;

export interface ChainOptions {
  /** Treat 0 as missing and move on to the next candidate */
  skipZero?: boolean;
}

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

function isUsable(value: Candidate, skipZero: boolean): value is number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return false;
  return !(skipZero && value === 0);
}

/** First usable candidate, else the fallback */
export function resolveChain(
  candidates: readonly Candidate[],
  fallback: number,
  options: ChainOptions = {}
): number {
  const skipZero = options.skipZero ?? false;
  for (const candidate of candidates) {
    if (isUsable(candidate, skipZero)) return candidate;
  }
  return fallback;
}

/** (current - reference) / reference, 0 when the reference is zero */
export function relativeChange(current: number, reference: number): number {
  if (reference === 0 || !Number.isFinite(reference)) return 0;
  return (current - reference) / reference;
}

function pickName(instrument: Instrument, raw: RawInstrumentQuote | null): string {
  const candidates = [raw?.shortName, raw?.longName, instrument.name];
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim()) return candidate.trim();
  }
  return instrument.symbol;
}

export function normalizeQuote(
  instrument: Instrument,
  raw: RawInstrumentQuote | null
): MarketSnapshot {
  const currentPrice = resolveChain(
    [raw?.currentPrice, raw?.regularMarketPrice, raw?.previousClose],
    0,
    { skipZero: true }
  );
  const previousClose = resolveChain(
    [raw?.previousClose, raw?.regularMarketPreviousClose],
    currentPrice,
    { skipZero: true }
  );

  const historical = resolveChain([raw?.historicalClose], Number.NaN, { skipZero: true });
  const hasHistory = !Number.isNaN(historical);
  const historicalPrice = hasHistory ? historical : currentPrice * SYNTHETIC_HISTORY_RATIO;

  const marketCap = resolveChain([raw?.marketCap], 0);
  const averageVolume = resolveChain([raw?.averageVolume], 0);

  return {
    name: pickName(instrument, raw),
    currentPrice,
    previousClose,
    historicalPrice,
    historicalSource: hasHistory ? 'history' : 'synthetic',
    dailyChangePct: relativeChange(currentPrice, previousClose),
    threeMonthChangePct: relativeChange(currentPrice, historicalPrice),
    dayHigh: resolveChain([raw?.dayHigh], currentPrice),
    dayLow: resolveChain([raw?.dayLow], currentPrice),
    high52Week: resolveChain([raw?.fiftyTwoWeekHigh], currentPrice),
    low52Week: resolveChain([raw?.fiftyTwoWeekLow], currentPrice),
    averageVolumeMillions: averageVolume / 1e6,
    marketCapBillions: marketCap / 1e9,
    beta: resolveChain([raw?.beta], 1, { skipZero: true }),
    degraded: currentPrice === 0,
  };
}

/** Snapshot for an instrument whose fetch failed outright */
export function degradedSnapshot(instrument: Instrument): MarketSnapshot {
  return normalizeQuote(instrument, null);
}
