/**
 * Main Scoring Engine
 * Volatility, momentum and liquidity subscores, each capped independently,
 * summed into a composite on a 0-100 scale.
 */

import { createChildLogger } from '@/utils/logger';
import type { MarketSnapshot, ScoreBreakdown, ScoredInstrument } from '@/types/market';
import type { InstrumentFetchResult } from './fetch';
import { clamp, degradedSnapshot, normalizeQuote, relativeChange } from './normalize';

const logger = createChildLogger('scoring_engine');

export const SCORE_CAPS = {
  volatility: 35,
  momentum: 35,
  liquidity: 30,
  composite: 100,
} as const;

/** Liquidity awarded when no volume is known */
const LIQUIDITY_FLOOR = 5;

export const ZERO_BREAKDOWN: Readonly<ScoreBreakdown> = Object.freeze({
  volatility: 0,
  momentum: 0,
  liquidity: 0,
  composite: 0,
});

function capped(value: number, cap: number): number {
  return clamp(Math.trunc(value), 0, cap);
}

export function volatilityScore(snapshot: MarketSnapshot): number {
  const rangePct = relativeChange(snapshot.high52Week, snapshot.low52Week);
  const intradayPct = relativeChange(snapshot.dayHigh, snapshot.dayLow);
  return capped(snapshot.beta * 8 + rangePct * 10 + intradayPct * 200, SCORE_CAPS.volatility);
}

export function momentumScore(snapshot: MarketSnapshot): number {
  return capped(
    Math.abs(snapshot.threeMonthChangePct) * 40 + Math.abs(snapshot.dailyChangePct) * 150,
    SCORE_CAPS.momentum
  );
}

export function liquidityScore(snapshot: MarketSnapshot): number {
  if (snapshot.averageVolumeMillions <= 0) return LIQUIDITY_FLOOR;
  return capped(snapshot.averageVolumeMillions * 0.3 + LIQUIDITY_FLOOR, SCORE_CAPS.liquidity);
}

export function scoreSnapshot(snapshot: MarketSnapshot): ScoreBreakdown {
  if (snapshot.degraded) {
    return { ...ZERO_BREAKDOWN };
  }

  const volatility = volatilityScore(snapshot);
  const momentum = momentumScore(snapshot);
  const liquidity = liquidityScore(snapshot);

  return {
    volatility,
    momentum,
    liquidity,
    composite: Math.min(SCORE_CAPS.composite, volatility + momentum + liquidity),
  };
}

/**
 * Normalize and score every fetch result. Output order and length match the
 * input; failed fetches become degraded records with zero scores.
 */
export function scoreInstruments(results: readonly InstrumentFetchResult[]): ScoredInstrument[] {
  return results.map((result) => {
    if (!result.ok) {
      return {
        instrument: result.instrument,
        snapshot: degradedSnapshot(result.instrument),
        breakdown: { ...ZERO_BREAKDOWN },
        error: result.error,
      };
    }

    const snapshot = normalizeQuote(result.instrument, result.raw);
    if (snapshot.degraded) {
      logger.warn({ symbol: result.instrument.symbol }, 'No usable price, scoring as degraded');
    }
    return {
      instrument: result.instrument,
      snapshot,
      breakdown: scoreSnapshot(snapshot),
    };
  });
}
