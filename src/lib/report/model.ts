/**
 * Structural report document
 *
 * Pure projection of one run into the two report sections. Rounding and the
 * highlight flag are decided here; the renderer only lays cells out.
 */

import { formatHumanTimestamp } from '@/core/time';
import { countPositive, deriveVerdict } from '@/lib/marketContext';
import type { IndicatorReading, MacroContext, RankedRecord } from '@/types/market';
import { RANKED_COLUMNS, type RankedRow, type ReportDocument } from '@/types/report';

export const HIGHLIGHT_RANKS = 3;

export interface ReportInput {
  generatedAt: Date;
  timeZone: string;
  indicators: readonly IndicatorReading[];
  macro: MacroContext;
  records: readonly RankedRecord[];
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function formatRange(low: number, high: number): string {
  return `$${low.toFixed(2)} – $${high.toFixed(2)}`;
}

export function toRankedRow(record: RankedRecord): RankedRow {
  const { instrument, snapshot, breakdown, rank } = record;
  return {
    rank,
    ticker: instrument.symbol,
    company: snapshot.name,
    sector: instrument.sector,
    currentPrice: roundTo(snapshot.currentPrice, 2),
    previousClose: roundTo(snapshot.previousClose, 2),
    historicalPrice: roundTo(snapshot.historicalPrice, 2),
    dailyChangePct: roundTo(snapshot.dailyChangePct, 4),
    threeMonthChangePct: roundTo(snapshot.threeMonthChangePct, 4),
    marketCapBillions: roundTo(snapshot.marketCapBillions, 1),
    averageVolumeMillions: roundTo(snapshot.averageVolumeMillions, 1),
    compositeScore: breakdown.composite,
    volatilityScore: breakdown.volatility,
    momentumScore: breakdown.momentum,
    liquidityScore: breakdown.liquidity,
    range52Week: formatRange(snapshot.low52Week, snapshot.high52Week),
    highlight: rank <= HIGHLIGHT_RANKS,
  };
}

export function buildReportDocument(input: ReportInput): ReportDocument {
  const positiveCount = countPositive(input.indicators);

  return {
    generatedAt: input.generatedAt.toISOString(),
    generatedLabel: formatHumanTimestamp(input.generatedAt, input.timeZone),
    overview: {
      indicators: input.indicators.map((reading) => ({ ...reading })),
      positiveCount,
      indicatorCount: input.indicators.length,
      verdict: deriveVerdict(positiveCount),
      macro: input.macro,
    },
    ranked: {
      columns: RANKED_COLUMNS,
      rows: input.records
        .slice()
        .sort((a, b) => a.rank - b.rank)
        .map(toRankedRow),
    },
  };
}
