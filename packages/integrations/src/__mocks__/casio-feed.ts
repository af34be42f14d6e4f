/**
 * Mock Casio Feed
 * Builds remnants workbooks and zip archives in memory
 */

import JSZip from 'jszip';
import { utils, write } from 'xlsx';

export const REMNANTS_HEADER = ['Код', 'Наименование', 'Количество', 'Цена'];

/**
 * Worksheet rows with the report banner above the header row, the way the
 * supplier publishes them
 */
export function remnantsSheetRows(body: unknown[][], headerRow = 17): unknown[][] {
  const banner: unknown[][] = Array.from({ length: headerRow }, (_, i) =>
    i === 0 ? ['Остатки товаров на складе'] : []
  );
  return [...banner, REMNANTS_HEADER, ...body];
}

export function buildWorkbook(rows: unknown[][], bookType: 'xls' | 'xlsx' = 'xls'): Uint8Array {
  const workbook = utils.book_new();
  utils.book_append_sheet(workbook, utils.aoa_to_sheet(rows), 'Остатки');

  const content: unknown = write(workbook, { type: 'buffer', bookType });
  if (!(content instanceof Uint8Array)) {
    throw new Error('xlsx did not produce a buffer');
  }
  return content;
}

export async function buildArchive(entries: Record<string, Uint8Array | string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.file(name, content);
  }
  return zip.generateAsync({ type: 'nodebuffer' });
}
