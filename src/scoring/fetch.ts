import type { MarketDataSource } from '@/providers/types';
import type { Instrument, RawInstrumentQuote } from '@/types/market';
import { getLookbackWindow } from '@/core/time';
import { RequestThrottler } from '@/utils/throttler';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('fetch');

export type InstrumentFetchResult =
  | { ok: true; instrument: Instrument; raw: RawInstrumentQuote }
  | { ok: false; instrument: Instrument; error: string };

export interface BatchFetchOptions {
  now?: Date;
  throttler?: RequestThrottler;
  minIntervalMs?: number;
  timeoutMs?: number;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function fetchOne(
  instrument: Instrument,
  source: MarketDataSource,
  throttler: RequestThrottler,
  now: Date
): Promise<InstrumentFetchResult> {
  const { symbol } = instrument;

  let quote: RawInstrumentQuote;
  try {
    quote = await throttler.schedule(() => source.getQuote(symbol), `quote ${symbol}`);
  } catch (error) {
    logger.warn({ symbol, error: describeError(error) }, 'Quote fetch failed, record will be degraded');
    return { ok: false, instrument, error: describeError(error) };
  }

  // Missing history only makes the baseline synthetic
  let historicalClose: number | null = null;
  try {
    historicalClose = await throttler.schedule(
      () => source.getHistoricalClose(symbol, getLookbackWindow(now)),
      `history ${symbol}`
    );
  } catch (error) {
    logger.warn({ symbol, error: describeError(error) }, 'History fetch failed');
  }

  return { ok: true, instrument, raw: { ...quote, symbol, historicalClose } };
}

/**
 * Fetch raw quotes for every instrument, in configured order.
 * Always resolves with exactly one result per instrument.
 */
export async function fetchInstrumentBatch(
  instruments: readonly Instrument[],
  source: MarketDataSource,
  options: BatchFetchOptions = {}
): Promise<InstrumentFetchResult[]> {
  const now = options.now ?? new Date();
  const throttler =
    options.throttler ??
    new RequestThrottler({ minIntervalMs: options.minIntervalMs, timeoutMs: options.timeoutMs });

  const results = await Promise.all(
    instruments.map((instrument) => fetchOne(instrument, source, throttler, now))
  );

  const failed = results.filter((r) => !r.ok).length;
  logger.info(
    { provider: source.name, total: results.length, failed },
    'Instrument batch fetched'
  );
  return results;
}

/** Stand-in results when the batch itself could not run. */
export function failedBatch(instruments: readonly Instrument[], error: unknown): InstrumentFetchResult[] {
  const message = describeError(error);
  return instruments.map((instrument): InstrumentFetchResult => ({ ok: false, instrument, error: message }));
}
