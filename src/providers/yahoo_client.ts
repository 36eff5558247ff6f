/**
 * Yahoo Finance client
 *
 * Uses the chart API (v8) for prices, ranges and volume history; the quote API
 * (v7) answers 401 without a session. Beta and market capitalisation come
 * from quoteSummary, which is best-effort: when it fails those fields stay
 * absent and the normalizer defaults apply.
 */

import { createChildLogger } from '@/utils/logger';
import { withTimeout } from '@/utils/throttler';
import { toUnixSeconds, type LookbackWindow } from '@/core/time';
import type { RawIndexQuote, RawInstrumentQuote } from '@/types/market';
import { ProviderError, type MarketDataSource } from './types';

const logger = createChildLogger('yahoo');

const CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const SUMMARY_URL = 'https://query2.finance.yahoo.com/v10/finance/quoteSummary';
const PROVIDER = 'yahoo';

export interface YahooClientOptions {
  timeoutMs?: number;
  /** Bound for the quoteSummary call; defaults to half of `timeoutMs` */
  summaryTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

/** quoteSummary wraps numbers as { raw, fmt } */
function rawNumber(value: unknown): number | null {
  return isRecord(value) ? numberOrNull(value.raw) : numberOrNull(value);
}

function numberSeries(value: unknown): Array<number | null> {
  return Array.isArray(value) ? value.map(numberOrNull) : [];
}

interface ChartResult {
  meta: JsonRecord;
  closes: Array<number | null>;
  volumes: Array<number | null>;
}

function parseChart(payload: unknown, symbol: string, method: string): ChartResult {
  const chart = isRecord(payload) ? payload.chart : undefined;
  const results = isRecord(chart) ? chart.result : undefined;
  const first: unknown = Array.isArray(results) ? results[0] : undefined;

  if (!isRecord(first) || !isRecord(first.meta)) {
    const error = isRecord(chart) && isRecord(chart.error) ? stringOrNull(chart.error.description) : null;
    throw new ProviderError(
      `Malformed chart payload for ${symbol}${error ? `: ${error}` : ''}`,
      PROVIDER,
      symbol,
      method
    );
  }

  const indicators: JsonRecord = isRecord(first.indicators) ? first.indicators : {};
  const quotes = Array.isArray(indicators.quote) ? indicators.quote : [];
  const quote: unknown = quotes[0];

  return {
    meta: first.meta,
    closes: isRecord(quote) ? numberSeries(quote.close) : [],
    volumes: isRecord(quote) ? numberSeries(quote.volume) : [],
  };
}

function average(values: Array<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  if (present.length === 0) return null;
  return present.reduce((sum, v) => sum + v, 0) / present.length;
}

/** Close of the session before the most recent one */
function previousSessionClose(closes: Array<number | null>): number | null {
  const present = closes.filter((v): v is number => v !== null);
  return present.length >= 2 ? present[present.length - 2] : null;
}

export class YahooFinanceClient implements MarketDataSource {
  readonly name = PROVIDER;
  private readonly timeoutMs: number;
  private readonly summaryTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private requestCount = 0;

  constructor(options: YahooClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.summaryTimeoutMs = options.summaryTimeoutMs ?? Math.floor(this.timeoutMs / 2);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchJson(
    url: URL,
    symbol: string,
    method: string,
    timeoutMs: number = this.timeoutMs
  ): Promise<unknown> {
    let response: Response;
    try {
      this.requestCount++;
      response = await this.fetchImpl(url.toString(), {
        headers: {
          Accept: 'application/json',
          'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`Request failed for ${symbol}: ${cause.message}`, PROVIDER, symbol, method, cause);
    }

    if (!response.ok) {
      throw new ProviderError(
        `Yahoo ${method} request failed for ${symbol} (${response.status})`,
        PROVIDER,
        symbol,
        method
      );
    }

    try {
      return await response.json();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`Invalid JSON for ${symbol}`, PROVIDER, symbol, method, cause);
    }
  }

  private chartUrl(symbol: string, params: Record<string, string | number>): URL {
    const url = new URL(`${CHART_URL}/${encodeURIComponent(symbol)}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }

  async getQuote(symbol: string): Promise<RawInstrumentQuote> {
    // quoteSummary runs beside the chart call under its own shorter bound
    const [payload, fundamentals] = await Promise.all([
      this.fetchJson(this.chartUrl(symbol, { range: '3mo', interval: '1d' }), symbol, 'getQuote'),
      this.getSummaryFields(symbol),
    ]);
    const { meta, closes, volumes } = parseChart(payload, symbol, 'getQuote');

    return {
      symbol,
      shortName: stringOrNull(meta.shortName),
      longName: stringOrNull(meta.longName),
      regularMarketPrice: numberOrNull(meta.regularMarketPrice),
      previousClose: numberOrNull(meta.previousClose),
      regularMarketPreviousClose: previousSessionClose(closes),
      dayHigh: numberOrNull(meta.regularMarketDayHigh),
      dayLow: numberOrNull(meta.regularMarketDayLow),
      fiftyTwoWeekHigh: numberOrNull(meta.fiftyTwoWeekHigh),
      fiftyTwoWeekLow: numberOrNull(meta.fiftyTwoWeekLow),
      averageVolume: average(volumes),
      marketCap: fundamentals?.marketCap ?? null,
      beta: fundamentals?.beta ?? null,
    };
  }

  private async getSummaryFields(
    symbol: string
  ): Promise<{ beta: number | null; marketCap: number | null } | null> {
    const url = new URL(`${SUMMARY_URL}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('modules', 'summaryDetail,price');

    const payload = await withTimeout(
      this.fetchJson(url, symbol, 'getSummary', this.summaryTimeoutMs),
      this.summaryTimeoutMs,
      `quoteSummary ${symbol}`
    ).catch((error: unknown) => {
      logger.debug(
        { symbol, error: error instanceof Error ? error.message : String(error) },
        'quoteSummary unavailable'
      );
      return null;
    });

    const summary = isRecord(payload) ? payload.quoteSummary : undefined;
    const results = isRecord(summary) ? summary.result : undefined;
    const first: unknown = Array.isArray(results) ? results[0] : undefined;
    if (!isRecord(first)) return null;

    const detail: JsonRecord = isRecord(first.summaryDetail) ? first.summaryDetail : {};
    const price: JsonRecord = isRecord(first.price) ? first.price : {};
    return {
      beta: rawNumber(detail.beta),
      marketCap: rawNumber(detail.marketCap) ?? rawNumber(price.marketCap),
    };
  }

  async getHistoricalClose(symbol: string, window: LookbackWindow): Promise<number | null> {
    const payload = await this.fetchJson(
      this.chartUrl(symbol, {
        period1: toUnixSeconds(window.from),
        period2: toUnixSeconds(window.to),
        interval: '1d',
      }),
      symbol,
      'getHistoricalClose'
    );
    const { closes } = parseChart(payload, symbol, 'getHistoricalClose');
    return closes.find((close): close is number => close !== null) ?? null;
  }

  async getIndexQuote(symbol: string): Promise<RawIndexQuote> {
    const payload = await this.fetchJson(
      this.chartUrl(symbol, { range: '5d', interval: '1d' }),
      symbol,
      'getIndexQuote'
    );
    const { meta, closes } = parseChart(payload, symbol, 'getIndexQuote');
    return {
      symbol,
      regularMarketPrice: numberOrNull(meta.regularMarketPrice),
      previousClose: numberOrNull(meta.previousClose),
      regularMarketPreviousClose: previousSessionClose(closes),
    };
  }
}
