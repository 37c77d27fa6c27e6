import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'csv-stringify/sync';
import type { ListingRecord } from './scrapers/types.js';

export const NOT_FOUND = 'N/A';

export const CSV_COLUMNS = [
  'Platform',
  'Product',
  'Price Current',
  'Price Original',
  'Discount %',
  'Price Raw',
  'Link',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

function cell(value: string | number | null): string {
  if (value === null) return NOT_FOUND;
  const text = String(value).trim();
  return text === '' ? NOT_FOUND : text;
}

export function toCsvRow(record: ListingRecord): Record<CsvColumn, string> {
  return {
    Platform: cell(record.platform),
    Product: cell(record.product),
    'Price Current': cell(record.priceCurrent),
    'Price Original': cell(record.priceOriginal),
    'Discount %': cell(record.discountPercent),
    'Price Raw': cell(record.priceRaw),
    Link: cell(record.link),
  };
}

export function formatCsv(records: ListingRecord[]): string {
  return stringify(records.map(toCsvRow), {
    header: true,
    columns: [...CSV_COLUMNS],
  });
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** results_YYYYMMDD_HHMMSS.csv in local time */
export function resultsFileName(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `results_${date}_${time}.csv`;
}

export async function writeResultsCsv(
  records: ListingRecord[],
  dir: string,
  now: Date = new Date()
): Promise<string | null> {
  if (records.length === 0) return null;

  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, resultsFileName(now));
  await writeFile(filePath, formatCsv(records), 'utf-8');
  return filePath;
}
