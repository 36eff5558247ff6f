import { describe, expect, it } from 'vitest';
import {
  SCORE_CAPS,
  liquidityScore,
  momentumScore,
  scoreInstruments,
  scoreSnapshot,
  volatilityScore,
} from '@/scoring/engine';
import { normalizeQuote } from '@/scoring/normalize';
import { INSTRUMENTS, makeQuote, makeSnapshot } from '../fixtures/market';

describe('scoreSnapshot', () => {
  it('computes the reference breakdown', () => {
    const snapshot = makeSnapshot({
      beta: 1.5,
      high52Week: 120,
      low52Week: 80,
      dayHigh: 105,
      dayLow: 100,
      threeMonthChangePct: 0.1,
      dailyChangePct: 0.02,
      averageVolumeMillions: 20,
    });

    expect(scoreSnapshot(snapshot)).toEqual({
      volatility: 27,
      momentum: 7,
      liquidity: 11,
      composite: 45,
    });
  });

  it('truncates fractional subscores toward zero', () => {
    const snapshot = makeSnapshot({ beta: 1.1, averageVolumeMillions: 3 });
    // 1.1 * 8 = 8.8 -> 8; 3 * 0.3 + 5 = 5.9 -> 5
    expect(volatilityScore(snapshot)).toBe(8);
    expect(liquidityScore(snapshot)).toBe(5);
  });

  it('caps every subscore independently', () => {
    const snapshot = makeSnapshot({
      beta: 10,
      threeMonthChangePct: -2,
      dailyChangePct: 0.5,
      averageVolumeMillions: 500,
    });

    const breakdown = scoreSnapshot(snapshot);
    expect(breakdown.volatility).toBe(SCORE_CAPS.volatility);
    expect(breakdown.momentum).toBe(SCORE_CAPS.momentum);
    expect(breakdown.liquidity).toBe(SCORE_CAPS.liquidity);
    expect(breakdown.composite).toBe(100);
  });

  it('uses absolute moves for momentum', () => {
    const up = makeSnapshot({ threeMonthChangePct: 0.25, dailyChangePct: 0.04 });
    const down = makeSnapshot({ threeMonthChangePct: -0.25, dailyChangePct: -0.04 });
    expect(momentumScore(up)).toBe(16);
    expect(momentumScore(down)).toBe(16);
  });

  it('awards the liquidity floor when volume is unknown', () => {
    expect(liquidityScore(makeSnapshot({ averageVolumeMillions: 0 }))).toBe(5);
  });

  it('floors negative inputs at zero', () => {
    const snapshot = makeSnapshot({ beta: -5 });
    expect(volatilityScore(snapshot)).toBe(0);
  });

  it('scores degraded snapshots as zero', () => {
    const snapshot = makeSnapshot({ degraded: true, beta: 2, averageVolumeMillions: 40 });
    expect(scoreSnapshot(snapshot)).toEqual({ volatility: 0, momentum: 0, liquidity: 0, composite: 0 });
  });

  it('keeps composite equal to the subscore sum within range', () => {
    const breakdown = scoreSnapshot(
      makeSnapshot({ beta: 2, high52Week: 150, low52Week: 100, averageVolumeMillions: 10 })
    );
    // 16 + 5 = 21; 0; 3 + 5 = 8
    expect(breakdown).toEqual({ volatility: 21, momentum: 0, liquidity: 8, composite: 29 });
  });
});

describe('scoreInstruments', () => {
  it('returns one record per fetch result in input order', () => {
    const [aaa, bbb, ccc] = INSTRUMENTS;
    const scored = scoreInstruments([
      { ok: true, instrument: aaa, raw: makeQuote('AAA') },
      { ok: false, instrument: bbb, error: 'quote unavailable for BBB' },
      { ok: true, instrument: ccc, raw: { symbol: 'CCC' } },
    ]);

    expect(scored.map((s) => s.instrument.symbol)).toEqual(['AAA', 'BBB', 'CCC']);
    expect(scored[0].breakdown.composite).toBeGreaterThan(0);
    expect(scored[0].error).toBeUndefined();
  });

  it('degrades failed fetches with zero scores and the error text', () => {
    const scored = scoreInstruments([{ ok: false, instrument: INSTRUMENTS[1], error: 'timeout' }]);

    expect(scored[0].error).toBe('timeout');
    expect(scored[0].snapshot.degraded).toBe(true);
    expect(scored[0].snapshot.currentPrice).toBe(0);
    expect(scored[0].breakdown).toEqual({ volatility: 0, momentum: 0, liquidity: 0, composite: 0 });
  });

  it('degrades a quote with no usable price', () => {
    const scored = scoreInstruments([{ ok: true, instrument: INSTRUMENTS[2], raw: { symbol: 'CCC' } }]);
    expect(scored[0].snapshot).toEqual(normalizeQuote(INSTRUMENTS[2], { symbol: 'CCC' }));
    expect(scored[0].breakdown.composite).toBe(0);
  });

  it('is deterministic for identical inputs', () => {
    const results = INSTRUMENTS.map((instrument) => ({
      ok: true as const,
      instrument,
      raw: makeQuote(instrument.symbol, { historicalClose: 75 }),
    }));
    expect(scoreInstruments(results)).toEqual(scoreInstruments(results));
  });
});
