/**
 * Reads the ranked section back out of a rendered workbook.
 * Used to verify each render before it is published.
 */

import ExcelJS from 'exceljs';
import { RANKED_COLUMNS, type RankedRow } from '@/types/report';
import {
  HIGHLIGHT_ARGB,
  RANKED_FIRST_DATA_ROW,
  RANKED_HEADER_ROW,
  RANKED_SHEET,
  ReportAssemblyError,
} from './excelExport';

export interface RankedSection {
  columns: string[];
  rows: RankedRow[];
}

function cellNumber(cell: ExcelJS.Cell): number {
  const value = cell.value;
  if (typeof value !== 'number') {
    throw new ReportAssemblyError(`Expected a number at ${cell.address}`);
  }
  return value;
}

function cellText(cell: ExcelJS.Cell): string {
  const value = cell.value;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new ReportAssemblyError(`Expected text at ${cell.address}`);
}

function isHighlighted(cell: ExcelJS.Cell): boolean {
  const fill = cell.fill;
  if (!fill || fill.type !== 'pattern') return false;
  const argb = fill.fgColor?.argb;
  return typeof argb === 'string' && argb.toUpperCase().endsWith(HIGHLIGHT_ARGB.slice(2));
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}

export async function readRankedSection(buffer: Buffer): Promise<RankedSection> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(toArrayBuffer(buffer));

  const sheet = workbook.getWorksheet(RANKED_SHEET);
  if (!sheet) {
    throw new ReportAssemblyError(`Workbook has no "${RANKED_SHEET}" sheet`);
  }

  const header = sheet.getRow(RANKED_HEADER_ROW);
  const columns = RANKED_COLUMNS.map((_, index) => cellText(header.getCell(index + 1)));

  const rows: RankedRow[] = [];
  for (let r = RANKED_FIRST_DATA_ROW; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    if (typeof row.getCell(1).value !== 'number') break;

    rows.push({
      rank: cellNumber(row.getCell(1)),
      ticker: cellText(row.getCell(2)),
      company: cellText(row.getCell(3)),
      sector: cellText(row.getCell(4)),
      currentPrice: cellNumber(row.getCell(5)),
      previousClose: cellNumber(row.getCell(6)),
      historicalPrice: cellNumber(row.getCell(7)),
      dailyChangePct: cellNumber(row.getCell(8)),
      threeMonthChangePct: cellNumber(row.getCell(9)),
      marketCapBillions: cellNumber(row.getCell(10)),
      averageVolumeMillions: cellNumber(row.getCell(11)),
      compositeScore: cellNumber(row.getCell(12)),
      volatilityScore: cellNumber(row.getCell(13)),
      momentumScore: cellNumber(row.getCell(14)),
      liquidityScore: cellNumber(row.getCell(15)),
      range52Week: cellText(row.getCell(16)),
      highlight: isHighlighted(row.getCell(1)),
    });
  }

  return { columns, rows };
}

/**
 * Checks a parsed section against the run it came from: the fixed header,
 * exactly `expectedCount` rows, and ranks forming 1..N in order.
 */
export function verifyRankedSection(section: RankedSection, expectedCount: number): void {
  const headerMismatch = RANKED_COLUMNS.findIndex((column, index) => section.columns[index] !== column);
  if (headerMismatch !== -1) {
    throw new ReportAssemblyError(
      `Ranked header mismatch at column ${headerMismatch + 1}: "${section.columns[headerMismatch]}"`
    );
  }

  if (section.rows.length !== expectedCount) {
    throw new ReportAssemblyError(
      `Ranked section has ${section.rows.length} rows, expected ${expectedCount}`
    );
  }

  section.rows.forEach((row, index) => {
    if (row.rank !== index + 1) {
      throw new ReportAssemblyError(`Row ${index + 1} carries rank ${row.rank}`);
    }
  });
}
