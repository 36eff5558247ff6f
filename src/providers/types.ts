/**
 * Shared types and interfaces for market data providers.
 *
 * A source hands back raw, partially-populated payloads. Fallback policy
 * belongs to the normalizer, so sources never invent values.
 */
import type { LookbackWindow } from '@/core/time';
import type { RawIndexQuote, RawInstrumentQuote } from '@/types/market';

export interface MarketDataSource {
  readonly name: string;
  getQuote(symbol: string): Promise<RawInstrumentQuote>;
  /** First daily close inside the window, or null when none traded. */
  getHistoricalClose(symbol: string, window: LookbackWindow): Promise<number | null>;
  getIndexQuote(symbol: string): Promise<RawIndexQuote>;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
