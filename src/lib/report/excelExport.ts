import ExcelJS from 'exceljs';
import { SIGNAL_LABELS, VERDICT_LABELS, type IndicatorReading, type Signal } from '@/types/market';
import { INDICATOR_COLUMNS, type RankedRow, type ReportDocument } from '@/types/report';

export const OVERVIEW_SHEET = 'Market Overview';
export const RANKED_SHEET = 'Top Opportunities';

/** Ranked sheet layout: title, subtitle, header, then data */
export const RANKED_HEADER_ROW = 3;
export const RANKED_FIRST_DATA_ROW = 4;

export const HIGHLIGHT_ARGB = 'FFFFFF00';

const TITLE_FONT = 'FF1F4E79';
const SUBTITLE_FONT = 'FF666666';
const HEADER_BG = 'FF1F4E79';
const HEADER_FONT = 'FFFFFFFF';
const SECTION_BG = 'FF2E75B6';
const MACRO_SECTION_BG = 'FFC00000';
const GREEN_BG = 'FFC6EFCE';
const GREEN_FONT = 'FF006100';
const RED_BG = 'FFFFC7CE';
const RED_FONT = 'FFC00000';
const AMBER_BG = 'FFFFEB9C';
const AMBER_FONT = 'FFBF8F00';

const RANKED_WIDTHS = [6, 8, 28, 18, 13, 13, 13, 12, 13, 14, 12, 16, 10, 10, 10, 22];
const OVERVIEW_WIDTHS = [35, 28, 25, 20, 35, 45, 5];

export class ReportAssemblyError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ReportAssemblyError';
  }
}

function solidFill(argb: string): ExcelJS.Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

interface CellStyle {
  font?: Partial<ExcelJS.Font>;
  fill?: ExcelJS.Fill;
  numFmt?: string;
  align?: 'left' | 'center' | 'right';
}

function styleCell(
  sheet: ExcelJS.Worksheet,
  row: number,
  column: number,
  value: ExcelJS.CellValue,
  style: CellStyle = {}
): ExcelJS.Cell {
  const cell = sheet.getCell(row, column);
  cell.value = value;
  cell.font = { name: 'Arial', size: 10, ...style.font };
  cell.border = THIN_BORDER;
  cell.alignment = { horizontal: style.align ?? 'center', vertical: 'middle', wrapText: true };
  if (style.fill) cell.fill = style.fill;
  if (style.numFmt) cell.numFmt = style.numFmt;
  return cell;
}

function styleHeaderRow(sheet: ExcelJS.Worksheet, row: number, headers: readonly string[], bg = HEADER_BG) {
  sheet.getRow(row).height = 20;
  headers.forEach((header, index) => {
    styleCell(sheet, row, index + 1, header, {
      font: { bold: true, color: { argb: HEADER_FONT }, size: 11 },
      fill: solidFill(bg),
    });
  });
}

function addBanner(
  sheet: ExcelJS.Worksheet,
  row: number,
  lastColumn: string,
  text: string,
  font: Partial<ExcelJS.Font>,
  fill?: ExcelJS.Fill
) {
  sheet.mergeCells(`A${row}:${lastColumn}${row}`);
  const cell = sheet.getCell(`A${row}`);
  cell.value = text;
  cell.font = { name: 'Arial', ...font };
  cell.alignment = { horizontal: 'center' };
  if (fill) cell.fill = fill;
}

function setColumnWidths(sheet: ExcelJS.Worksheet, widths: number[]) {
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });
}

function signed(value: number, suffix = ''): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}${suffix}`;
}

function signalFill(signal: Signal): ExcelJS.Fill {
  switch (signal) {
    case 'bullish':
    case 'slightly_bullish':
    case 'decreasing_fear':
      return solidFill(GREEN_BG);
    case 'bearish':
    case 'increasing_fear':
      return solidFill(RED_BG);
    default:
      return solidFill(AMBER_BG);
  }
}

function writeIndicatorRow(sheet: ExcelJS.Worksheet, row: number, reading: IndicatorReading) {
  const tone = (value: number) => ({ color: { argb: value >= 0 ? GREEN_FONT : RED_FONT } });
  styleCell(sheet, row, 1, reading.name, { align: 'left' });
  styleCell(sheet, row, 2, reading.level, { numFmt: '#,##0.00' });
  styleCell(sheet, row, 3, reading.available ? signed(reading.change) : 'N/A', {
    font: tone(reading.change),
  });
  styleCell(sheet, row, 4, reading.available ? signed(reading.changePct, '%') : 'N/A', {
    font: tone(reading.changePct),
  });
  styleCell(sheet, row, 5, SIGNAL_LABELS[reading.signal], {
    font: { bold: true },
    fill: signalFill(reading.signal),
  });
}

function writeOverviewSheet(workbook: ExcelJS.Workbook, doc: ReportDocument) {
  const sheet = workbook.addWorksheet(OVERVIEW_SHEET);
  const { overview } = doc;

  addBanner(sheet, 1, 'G', 'MARKET OPPORTUNITY REPORT', { bold: true, size: 16, color: { argb: TITLE_FONT } });
  addBanner(sheet, 2, 'G', `Generated: ${doc.generatedLabel}`, {
    italic: true,
    size: 10,
    color: { argb: SUBTITLE_FONT },
  });

  addBanner(
    sheet,
    4,
    'G',
    'PRE-MARKET / CURRENT FUTURES & MACRO INDICATORS',
    { bold: true, size: 13, color: { argb: HEADER_FONT } },
    solidFill(SECTION_BG)
  );
  styleHeaderRow(sheet, 5, INDICATOR_COLUMNS);

  overview.indicators.forEach((reading, index) => {
    writeIndicatorRow(sheet, 6 + index, reading);
  });

  const verdictRow = 6 + overview.indicators.length;
  const verdictLabel = VERDICT_LABELS[overview.verdict];
  const verdictTone =
    overview.verdict === 'positive'
      ? { font: GREEN_FONT, fill: GREEN_BG }
      : overview.verdict === 'negative'
        ? { font: RED_FONT, fill: RED_BG }
        : { font: AMBER_FONT, fill: AMBER_BG };
  addBanner(
    sheet,
    verdictRow,
    'G',
    `FUTURES VERDICT: ${verdictLabel} (${overview.positiveCount}/${overview.indicatorCount} indicators positive)`,
    { bold: true, size: 10, color: { argb: verdictTone.font } },
    solidFill(verdictTone.fill)
  );

  const macroRow = verdictRow + 2;
  addBanner(
    sheet,
    macroRow,
    'G',
    'OVERALL MARKET & FEDERAL RESERVE STATUS',
    { bold: true, size: 13, color: { argb: HEADER_FONT } },
    solidFill(MACRO_SECTION_BG)
  );
  styleHeaderRow(sheet, macroRow + 1, ['Item', 'Value', 'Status'], 'FF8B0000');
  overview.macro.forEach((entry, index) => {
    const row = macroRow + 2 + index;
    styleCell(sheet, row, 1, entry.item, { align: 'left' });
    styleCell(sheet, row, 2, entry.value, { align: 'left' });
    styleCell(sheet, row, 3, entry.status, { font: { bold: true } });
  });

  setColumnWidths(sheet, OVERVIEW_WIDTHS);
}

function writeRankedRow(sheet: ExcelJS.Worksheet, row: number, data: RankedRow) {
  const fill = data.highlight ? solidFill(HIGHLIGHT_ARGB) : undefined;
  const pctStyle = (value: number): CellStyle => ({
    font: { bold: true, color: { argb: value >= 0 ? GREEN_FONT : RED_FONT } },
    fill: fill ?? solidFill(value >= 0 ? GREEN_BG : RED_BG),
    numFmt: '0.00%',
  });

  styleCell(sheet, row, 1, data.rank, { fill });
  styleCell(sheet, row, 2, data.ticker, { font: { bold: true }, fill });
  styleCell(sheet, row, 3, data.company, { align: 'left', fill });
  styleCell(sheet, row, 4, data.sector, { fill });
  styleCell(sheet, row, 5, data.currentPrice, { numFmt: '$#,##0.00', fill });
  styleCell(sheet, row, 6, data.previousClose, { numFmt: '$#,##0.00', fill });
  styleCell(sheet, row, 7, data.historicalPrice, { numFmt: '$#,##0.00', fill });
  styleCell(sheet, row, 8, data.dailyChangePct, pctStyle(data.dailyChangePct));
  styleCell(sheet, row, 9, data.threeMonthChangePct, pctStyle(data.threeMonthChangePct));
  styleCell(sheet, row, 10, data.marketCapBillions, { numFmt: '#,##0.0', fill });
  styleCell(sheet, row, 11, data.averageVolumeMillions, { numFmt: '#,##0.0', fill });
  styleCell(sheet, row, 12, data.compositeScore, { font: { bold: true }, fill });
  styleCell(sheet, row, 13, data.volatilityScore, { fill });
  styleCell(sheet, row, 14, data.momentumScore, { fill });
  styleCell(sheet, row, 15, data.liquidityScore, { fill });
  styleCell(sheet, row, 16, data.range52Week, { fill });
}

function writeRankedSheet(workbook: ExcelJS.Workbook, doc: ReportDocument) {
  const sheet = workbook.addWorksheet(RANKED_SHEET);
  const { columns, rows } = doc.ranked;

  addBanner(sheet, 1, 'P', `TOP ${rows.length} OPPORTUNITIES`, {
    bold: true,
    size: 16,
    color: { argb: TITLE_FONT },
  });
  addBanner(sheet, 2, 'P', `Updated: ${doc.generatedLabel} | Top 3 highlighted in yellow`, {
    italic: true,
    size: 10,
    color: { argb: SUBTITLE_FONT },
  });

  styleHeaderRow(sheet, RANKED_HEADER_ROW, columns);
  rows.forEach((data, index) => {
    writeRankedRow(sheet, RANKED_FIRST_DATA_ROW + index, data);
  });

  sheet.views = [{ state: 'frozen', ySplit: RANKED_HEADER_ROW }];
  setColumnWidths(sheet, RANKED_WIDTHS);
}

export async function renderWorkbook(doc: ReportDocument): Promise<Buffer> {
  try {
    const workbook = new ExcelJS.Workbook();
    workbook.creator = 'opportunity-report-engine';
    workbook.created = new Date(doc.generatedAt);

    writeOverviewSheet(workbook, doc);
    writeRankedSheet(workbook, doc);

    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ReportAssemblyError(`Workbook render failed: ${cause.message}`, cause);
  }
}
