import { describe, expect, it } from 'vitest';
import { failedBatch, fetchInstrumentBatch } from '@/scoring/fetch';
import { RequestThrottler, TimeoutError, withTimeout } from '@/utils/throttler';
import type { RawInstrumentQuote } from '@/types/market';
import { FakeMarketSource, INSTRUMENTS, makeQuote } from '../fixtures/market';

class HangingSource extends FakeMarketSource {
  constructor(private readonly hangOn: string) {
    super();
  }

  override async getQuote(symbol: string): Promise<RawInstrumentQuote> {
    if (symbol === this.hangOn) {
      return new Promise<RawInstrumentQuote>(() => undefined);
    }
    return super.getQuote(symbol);
  }
}

describe('fetchInstrumentBatch', () => {
  it('returns one result per instrument in configured order', async () => {
    const source = new FakeMarketSource();
    source.failQuotes.add('BBB');

    const results = await fetchInstrumentBatch(INSTRUMENTS, source);

    expect(results.map((r) => r.instrument.symbol)).toEqual(['AAA', 'BBB', 'CCC', 'DDD']);
    expect(results.map((r) => r.ok)).toEqual([true, false, true, true]);
    const failed = results[1];
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBe('quote unavailable for BBB');
    }
  });

  it('attaches the historical close to the raw quote', async () => {
    const source = new FakeMarketSource();
    source.quotes.set('AAA', makeQuote('AAA', { regularMarketPrice: 120 }));
    source.history.set('AAA', 96.5);

    const [result] = await fetchInstrumentBatch([INSTRUMENTS[0]], source);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.raw.historicalClose).toBe(96.5);
      expect(result.raw.regularMarketPrice).toBe(120);
    }
  });

  it('keeps the instrument when only history fails', async () => {
    const source = new FakeMarketSource();
    source.failHistory.add('AAA');

    const [result] = await fetchInstrumentBatch([INSTRUMENTS[0]], source);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.raw.historicalClose).toBeNull();
    }
  });

  it('turns a hung request into a failure without stalling the batch', async () => {
    const source = new HangingSource('CCC');

    const results = await fetchInstrumentBatch(INSTRUMENTS, source, { timeoutMs: 50 });

    expect(results).toHaveLength(4);
    const hung = results[2];
    expect(hung.ok).toBe(false);
    if (!hung.ok) {
      expect(hung.error).toBe('quote CCC timed out after 50ms');
    }
    expect(results[3].ok).toBe(true);
  });

  it('builds an all-failure batch when the batch cannot run', () => {
    const results = failedBatch(INSTRUMENTS, new Error('network down'));
    expect(results).toHaveLength(INSTRUMENTS.length);
    expect(results.every((r) => !r.ok)).toBe(true);
  });
});

describe('RequestThrottler', () => {
  it('runs tasks in FIFO order with spacing between starts', async () => {
    const throttler = new RequestThrottler({ minIntervalMs: 30 });
    const starts: Array<[string, number]> = [];

    await Promise.all(
      ['a', 'b', 'c'].map((id) =>
        throttler.schedule(async () => {
          starts.push([id, Date.now()]);
          return id;
        })
      )
    );

    expect(starts.map(([id]) => id)).toEqual(['a', 'b', 'c']);
    expect(starts[1][1] - starts[0][1]).toBeGreaterThanOrEqual(25);
    expect(starts[2][1] - starts[1][1]).toBeGreaterThanOrEqual(25);
  });

  it('keeps running after a task rejects', async () => {
    const throttler = new RequestThrottler();
    const first = throttler.schedule(async () => {
      throw new Error('boom');
    });
    const second = throttler.schedule(async () => 'ok');

    await expect(first).rejects.toThrow('boom');
    await expect(second).resolves.toBe('ok');
  });
});

describe('withTimeout', () => {
  it('rejects with TimeoutError once the bound passes', async () => {
    const pending = new Promise<string>(() => undefined);
    await expect(withTimeout(pending, 20, 'slow call')).rejects.toBeInstanceOf(TimeoutError);
  });

  it('passes through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(3), 1000, 'fast call')).resolves.toBe(3);
  });
});
