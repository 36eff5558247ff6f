export interface Instrument {
  symbol: string;
  name: string;
  sector: string;
}

export type BenchmarkKind = 'volatility' | 'directional';

export interface Benchmark {
  symbol: string;
  name: string;
  kind: BenchmarkKind;
}

export type Signal =
  | 'bullish'
  | 'slightly_bullish'
  | 'neutral'
  | 'bearish'
  | 'decreasing_fear'
  | 'increasing_fear'
  | 'unavailable';

export const SIGNAL_LABELS: Record<Signal, string> = {
  bullish: 'BULLISH',
  slightly_bullish: 'SLIGHTLY BULLISH',
  neutral: 'NEUTRAL',
  bearish: 'BEARISH',
  decreasing_fear: 'DECREASING FEAR',
  increasing_fear: 'INCREASING FEAR',
  unavailable: 'N/A',
};

export const POSITIVE_SIGNALS: ReadonlySet<Signal> = new Set<Signal>([
  'bullish',
  'slightly_bullish',
  'decreasing_fear',
]);

export interface IndicatorReading {
  symbol: string;
  name: string;
  level: number;
  change: number;
  /** Percent units, e.g. 0.42 means +0.42% */
  changePct: number;
  signal: Signal;
  available: boolean;
}

export type Verdict = 'positive' | 'mixed' | 'negative';

export const VERDICT_LABELS: Record<Verdict, string> = {
  positive: 'BULLISH',
  mixed: 'MIXED',
  negative: 'BEARISH',
};

export interface MacroContextRow {
  item: string;
  value: string;
  status: string;
}

export type MacroContext = readonly MacroContextRow[];

/**
 * Raw per-instrument payload as the provider returned it. Every numeric field
 * may be missing; the normalizer owns the fallback policy.
 */
export interface RawInstrumentQuote {
  symbol: string;
  shortName?: string | null;
  longName?: string | null;
  currentPrice?: number | null;
  regularMarketPrice?: number | null;
  previousClose?: number | null;
  regularMarketPreviousClose?: number | null;
  historicalClose?: number | null;
  marketCap?: number | null;
  averageVolume?: number | null;
  beta?: number | null;
  fiftyTwoWeekHigh?: number | null;
  fiftyTwoWeekLow?: number | null;
  dayHigh?: number | null;
  dayLow?: number | null;
}

export interface RawIndexQuote {
  symbol: string;
  regularMarketPrice?: number | null;
  previousClose?: number | null;
  regularMarketPreviousClose?: number | null;
}

export interface MarketSnapshot {
  name: string;
  currentPrice: number;
  previousClose: number;
  historicalPrice: number;
  historicalSource: 'history' | 'synthetic';
  /** Fraction, 0.02 = +2% */
  dailyChangePct: number;
  /** Fraction, 0.10 = +10% */
  threeMonthChangePct: number;
  dayHigh: number;
  dayLow: number;
  high52Week: number;
  low52Week: number;
  averageVolumeMillions: number;
  marketCapBillions: number;
  beta: number;
  degraded: boolean;
}

export interface ScoreBreakdown {
  volatility: number;
  momentum: number;
  liquidity: number;
  composite: number;
}

export interface ScoredInstrument {
  instrument: Instrument;
  snapshot: MarketSnapshot;
  breakdown: ScoreBreakdown;
  error?: string;
}

export interface RankedRecord extends ScoredInstrument {
  rank: number;
}
