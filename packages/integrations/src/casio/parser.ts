/**
 * Casio Stock Sheet Parser
 * Maps rows of the remnants workbook to typed product records
 */

import { read, utils, type WorkBook } from 'xlsx';
import { FetchError } from '../unified.js';
import type { ProductRecord } from '../types.js';

export const CASIO_COLUMNS = {
  code: 'Код',
  quantity: 'Количество',
  price: 'Цена',
} as const;

/** Row index of the column titles, the rows above hold the report header */
export const DEFAULT_HEADER_ROW = 17;

/** Stock reported as ">10" is listed as this many units */
export const OVERSTOCK_QUANTITY = 100;

/**
 * Stock cell to units offered on a marketplace.
 * The last remaining unit is held back, so a stock of 1 is offered as 0.
 * Anything unreadable becomes NaN and is rejected downstream.
 */
export function parseStockText(value: unknown): number {
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) return Number.NaN;
    return value === 1 ? 0 : value;
  }

  if (typeof value !== 'string') {
    return Number.NaN;
  }

  const text = value.trim();
  if (text === '>10') return OVERSTOCK_QUANTITY;
  if (text === '1') return 0;
  if (/^-?\d+$/.test(text)) return parseInt(text, 10);
  return Number.NaN;
}

/**
 * Price cell such as `5'990.00 руб.` to a decimal number (5990)
 */
export function parsePriceText(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value !== 'string') {
    return Number.NaN;
  }

  // Keep digits and separators only, so the dot of "руб." is not taken for one
  let text = value.replace(/[^\d.,-]/g, '').replace(/^[.,]+|[.,]+$/g, '');
  if (text.includes(',') && text.includes('.')) {
    text = text.replace(/,/g, '');
  }

  const match = text.match(/-?\d+(?:[.,]\d+)?/);
  if (!match) {
    return Number.NaN;
  }
  return parseFloat(match[0].replace(',', '.'));
}

function cellToIdentifier(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  return '';
}

/**
 * First row holds the column titles. Rows without a code are dropped and the
 * first occurrence of a repeated code wins.
 */
export function parseCatalogRows(rows: unknown[][]): ProductRecord[] {
  const [header, ...body] = rows;
  if (!header) {
    throw new FetchError('Casio feed sheet is empty', 'casio', 'BAD_RESPONSE');
  }

  const titles = header.map((cell) => (typeof cell === 'string' ? cell.trim() : ''));
  const columnIndex = (title: string): number => {
    const index = titles.indexOf(title);
    if (index === -1) {
      throw new FetchError(`Casio feed is missing column "${title}"`, 'casio', 'BAD_RESPONSE');
    }
    return index;
  };

  const codeColumn = columnIndex(CASIO_COLUMNS.code);
  const quantityColumn = columnIndex(CASIO_COLUMNS.quantity);
  const priceColumn = columnIndex(CASIO_COLUMNS.price);

  const records: ProductRecord[] = [];
  const seen = new Set<string>();

  for (const row of body) {
    const identifier = cellToIdentifier(row[codeColumn]);
    if (!identifier || seen.has(identifier)) continue;
    seen.add(identifier);

    records.push({
      identifier,
      stockQuantity: parseStockText(row[quantityColumn]),
      rawPrice: parsePriceText(row[priceColumn]),
    });
  }

  return records;
}

/**
 * Read the first sheet of a workbook, starting at the header row
 */
export function parseCatalogWorkbook(
  content: Uint8Array,
  headerRow: number = DEFAULT_HEADER_ROW
): ProductRecord[] {
  let workbook: WorkBook;
  try {
    workbook = read(content, { type: 'array' });
  } catch (error) {
    throw new FetchError(
      `Casio feed workbook is unreadable: ${error instanceof Error ? error.message : 'unknown error'}`,
      'casio',
      'BAD_RESPONSE'
    );
  }

  const sheet = workbook.SheetNames.length > 0 ? workbook.Sheets[workbook.SheetNames[0]] : undefined;
  if (!sheet) {
    throw new FetchError('Casio feed workbook has no sheets', 'casio', 'BAD_RESPONSE');
  }

  const rows = utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range: headerRow,
    raw: true,
    defval: '',
    blankrows: false,
  });

  return parseCatalogRows(rows);
}
