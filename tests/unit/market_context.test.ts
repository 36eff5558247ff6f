import { describe, expect, it } from 'vitest';
import {
  classifySignal,
  countPositive,
  deriveVerdict,
  fetchBenchmarkReadings,
  placeholderReading,
  toIndicatorReading,
} from '@/lib/marketContext';
import type { Benchmark, IndicatorReading, Signal } from '@/types/market';
import { BENCHMARKS, FakeMarketSource } from '../fixtures/market';

const directional: Benchmark = { symbol: 'NQ=F', name: 'Nasdaq 100 Futures', kind: 'directional' };
const vix: Benchmark = { symbol: '^VIX', name: 'VIX (Fear Index)', kind: 'volatility' };

function readingWith(signal: Signal): IndicatorReading {
  return { symbol: 'X', name: 'X', level: 1, change: 0, changePct: 0, signal, available: true };
}

describe('classifySignal', () => {
  it('maps directional percent moves onto four bands', () => {
    expect(classifySignal('directional', 1, 0.31)).toBe('bullish');
    expect(classifySignal('directional', 1, 0.3)).toBe('slightly_bullish');
    expect(classifySignal('directional', 1, 0.01)).toBe('slightly_bullish');
    expect(classifySignal('directional', 0, 0)).toBe('neutral');
    expect(classifySignal('directional', -1, -0.29)).toBe('neutral');
    expect(classifySignal('directional', -1, -0.3)).toBe('bearish');
  });

  it('reads a falling volatility index as decreasing fear', () => {
    expect(classifySignal('volatility', -0.5, -3)).toBe('decreasing_fear');
    expect(classifySignal('volatility', 0, 0)).toBe('increasing_fear');
    expect(classifySignal('volatility', 0.8, 4)).toBe('increasing_fear');
  });
});

describe('toIndicatorReading', () => {
  it('derives change and percent from the previous close', () => {
    const reading = toIndicatorReading(directional, {
      symbol: 'NQ=F',
      regularMarketPrice: 20100,
      regularMarketPreviousClose: 20000,
    });

    expect(reading).toEqual({
      symbol: 'NQ=F',
      name: 'Nasdaq 100 Futures',
      level: 20100,
      change: 100,
      changePct: 0.5,
      signal: 'bullish',
      available: true,
    });
  });

  it('falls back to previousClose for level and reference', () => {
    const reading = toIndicatorReading(vix, { symbol: '^VIX', previousClose: 15 });
    expect(reading.level).toBe(15);
    expect(reading.change).toBe(0);
    expect(reading.changePct).toBe(0);
    expect(reading.signal).toBe('increasing_fear');
  });

  it('reports zero percent when there is no price at all', () => {
    const reading = toIndicatorReading(directional, { symbol: 'NQ=F' });
    expect(reading.level).toBe(0);
    expect(reading.changePct).toBe(0);
    expect(reading.signal).toBe('neutral');
  });
});

describe('fetchBenchmarkReadings', () => {
  it('returns one reading per benchmark and placeholders for failures', async () => {
    const source = new FakeMarketSource();
    source.indexes.set('ES=F', { symbol: 'ES=F', regularMarketPrice: 6000, regularMarketPreviousClose: 6030 });
    source.failIndexes.add('^VIX');

    const readings = await fetchBenchmarkReadings(BENCHMARKS, source);

    expect(readings).toHaveLength(2);
    expect(readings[0].signal).toBe('bearish');
    expect(readings[0].changePct).toBe(-0.5);
    expect(readings[1]).toEqual(placeholderReading(BENCHMARKS[1]));
    expect(readings[1]).toMatchObject({ level: 0, signal: 'unavailable', available: false });
  });
});

describe('deriveVerdict', () => {
  const positives: Signal[] = ['bullish', 'slightly_bullish', 'decreasing_fear', 'bullish'];
  const negatives: Signal[] = ['bearish', 'neutral', 'increasing_fear'];

  it('is positive with 4 of 7 positive-leaning readings', () => {
    const readings = [...positives, ...negatives].map(readingWith);
    expect(countPositive(readings)).toBe(4);
    expect(deriveVerdict(countPositive(readings))).toBe('positive');
  });

  it('is mixed with 2 of 7', () => {
    const signals: Signal[] = [...positives.slice(0, 2), ...negatives, 'neutral', 'bearish'];
    const readings = signals.map(readingWith);
    expect(readings).toHaveLength(7);
    expect(deriveVerdict(countPositive(readings))).toBe('mixed');
  });

  it('is negative with none', () => {
    const signals: Signal[] = ['bearish', 'neutral', 'increasing_fear', 'unavailable', 'bearish', 'neutral', 'bearish'];
    expect(deriveVerdict(countPositive(signals.map(readingWith)))).toBe('negative');
  });

  it('does not count unavailable placeholders as positive', () => {
    expect(countPositive([placeholderReading(vix)])).toBe(0);
  });
});
