import type { IndicatorReading, MacroContext, Verdict } from './market';

/** Ranked section column order. Readers of the workbook depend on it. */
export const RANKED_COLUMNS = [
  'Rank',
  'Ticker',
  'Company',
  'Sector',
  'Current Price',
  'Prev Close',
  '3-Mo Ago Price',
  'Daily % Chg',
  '3-Month % Chg',
  'Market Cap ($B)',
  'Avg Vol (M)',
  'Opportunity Score',
  'Vol Score',
  'Mom Score',
  'Liq Score',
  '52wk Range',
] as const;

export type RankedColumn = (typeof RANKED_COLUMNS)[number];

export const INDICATOR_COLUMNS = ['Index / Future', 'Level', 'Change', '% Change', 'Signal'] as const;

export interface RankedRow {
  rank: number;
  ticker: string;
  company: string;
  sector: string;
  currentPrice: number;
  previousClose: number;
  historicalPrice: number;
  dailyChangePct: number;
  threeMonthChangePct: number;
  marketCapBillions: number;
  averageVolumeMillions: number;
  compositeScore: number;
  volatilityScore: number;
  momentumScore: number;
  liquidityScore: number;
  range52Week: string;
  highlight: boolean;
}

export interface OverviewSection {
  indicators: IndicatorReading[];
  positiveCount: number;
  indicatorCount: number;
  verdict: Verdict;
  macro: MacroContext;
}

export interface ReportDocument {
  generatedAt: string;
  generatedLabel: string;
  overview: OverviewSection;
  ranked: {
    columns: readonly RankedColumn[];
    rows: RankedRow[];
  };
}
