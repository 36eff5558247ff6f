/**
 * Market Context Provider
 *
 * Benchmark readings (index futures, VIX, yields, dollar) for the overview
 * section. Every configured benchmark yields exactly one reading; a fetch
 * that fails becomes an unavailable placeholder.
 */

import type { MarketDataSource } from '@/providers/types';
import {
  POSITIVE_SIGNALS,
  type Benchmark,
  type BenchmarkKind,
  type IndicatorReading,
  type RawIndexQuote,
  type Signal,
  type Verdict,
} from '@/types/market';
import { RequestThrottler } from '@/utils/throttler';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('market-context');

/** Percent thresholds for directional benchmarks */
const STRONG_MOVE_PCT = 0.3;

export interface BenchmarkFetchOptions {
  throttler?: RequestThrottler;
  minIntervalMs?: number;
  timeoutMs?: number;
}

function nonZeroOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value !== 0 ? value : null;
}

export function classifySignal(kind: BenchmarkKind, change: number, changePct: number): Signal {
  if (kind === 'volatility') {
    return change < 0 ? 'decreasing_fear' : 'increasing_fear';
  }
  if (changePct > STRONG_MOVE_PCT) return 'bullish';
  if (changePct > 0) return 'slightly_bullish';
  if (changePct > -STRONG_MOVE_PCT) return 'neutral';
  return 'bearish';
}

export function toIndicatorReading(benchmark: Benchmark, quote: RawIndexQuote): IndicatorReading {
  const level = nonZeroOrNull(quote.regularMarketPrice) ?? nonZeroOrNull(quote.previousClose) ?? 0;
  const previous =
    nonZeroOrNull(quote.regularMarketPreviousClose) ?? nonZeroOrNull(quote.previousClose) ?? level;
  const change = level - previous;
  const changePct = previous !== 0 ? (change / previous) * 100 : 0;

  return {
    symbol: benchmark.symbol,
    name: benchmark.name,
    level: Math.round(level * 100) / 100,
    change: Math.round(change * 100) / 100,
    changePct: Math.round(changePct * 100) / 100,
    signal: classifySignal(benchmark.kind, change, changePct),
    available: true,
  };
}

export function placeholderReading(benchmark: Benchmark): IndicatorReading {
  return {
    symbol: benchmark.symbol,
    name: benchmark.name,
    level: 0,
    change: 0,
    changePct: 0,
    signal: 'unavailable',
    available: false,
  };
}

export async function fetchBenchmarkReadings(
  benchmarks: readonly Benchmark[],
  source: MarketDataSource,
  options: BenchmarkFetchOptions = {}
): Promise<IndicatorReading[]> {
  const throttler =
    options.throttler ??
    new RequestThrottler({ minIntervalMs: options.minIntervalMs, timeoutMs: options.timeoutMs });

  return Promise.all(
    benchmarks.map(async (benchmark) => {
      try {
        const quote = await throttler.schedule(
          () => source.getIndexQuote(benchmark.symbol),
          `index ${benchmark.symbol}`
        );
        return toIndicatorReading(benchmark, quote);
      } catch (error) {
        logger.warn(
          { symbol: benchmark.symbol, error: error instanceof Error ? error.message : String(error) },
          'Benchmark fetch failed, using placeholder'
        );
        return placeholderReading(benchmark);
      }
    })
  );
}

export function countPositive(readings: readonly IndicatorReading[]): number {
  return readings.filter((r) => POSITIVE_SIGNALS.has(r.signal)).length;
}

export function deriveVerdict(positiveCount: number): Verdict {
  if (positiveCount >= 4) return 'positive';
  if (positiveCount >= 2) return 'mixed';
  return 'negative';
}
