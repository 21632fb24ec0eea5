import fs from 'fs';
import { pipeline } from 'stream/promises';
import { CsvError, parse } from 'csv-parse';
import { z } from 'zod';
import type { CatalogRecord } from './types';
import { InputError } from './errors';
import logger from './logging';

export const REQUIRED_COLUMNS = ['Name', 'Synopsis', 'Cast', 'Year of release', 'Genre', 'Rating'] as const;

type CsvRow = Record<string, string>;

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const RowSchema = z.object({
  Name: z.string().trim().min(1, 'Name is required'),
  Synopsis: z.string().default(''),
  Cast: z.string().default(''),
  Genre: z.string().default(''),
  // exporters write years as 2021 or 2021.0
  'Year of release': z.preprocess(blankToUndefined, z.coerce.number().int('must be a whole year').optional()),
  Rating: z.preprocess(blankToUndefined, z.coerce.number().finite().optional()),
});

// reporting stops after this many bad rows
const MAX_REPORTED_ROWS = 5;

export function assertColumns(header: readonly string[]): void {
  const missing = REQUIRED_COLUMNS.filter(c => !header.includes(c));
  if (missing.length) {
    throw new InputError(
      'MISSING_COLUMNS',
      `Dataset is missing required columns: ${missing.join(', ')}. Found columns: ${header.join(', ') || '(none)'}`,
      { missing, found: [...header] },
    );
  }
}

/** Validates parsed rows once and assigns ids in row order. */
export function toCatalogRecords(rows: readonly CsvRow[]): CatalogRecord[] {
  const out: CatalogRecord[] = [];
  const problems: string[] = [];

  rows.forEach((row, i) => {
    const parsed = RowSchema.safeParse(row);
    if (!parsed.success) {
      if (problems.length < MAX_REPORTED_ROWS) {
        const issues = parsed.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
        problems.push(`row ${i + 1}: ${issues}`);
      }
      return;
    }
    const r = parsed.data;
    out.push(Object.freeze({
      id: out.length,
      title: r.Name,
      synopsis: r.Synopsis,
      cast: r.Cast,
      genre: r.Genre,
      year: r['Year of release'],
      rating: r.Rating,
    }));
  });

  if (problems.length) {
    throw new InputError('INVALID_RECORD', `Invalid catalog rows: ${problems.join(' | ')}`, { rows: problems });
  }
  return out;
}

/** Streams a CSV catalog (header row first) into validated records. */
export async function loadCatalog(file: string): Promise<CatalogRecord[]> {
  if (!fs.existsSync(file)) {
    throw new InputError('DATA_NOT_FOUND', `Dataset not found at: ${file}`, { path: file });
  }

  let header: string[] = [];
  const rows: CsvRow[] = [];
  // pipeline destroys the file stream when the parser fails, and the other way round
  try {
    await pipeline(
      fs.createReadStream(file),
      parse({
        bom: true,
        trim: true,
        skip_empty_lines: true,
        columns: (h: string[]) => (header = h),
      }),
      async (source: AsyncIterable<CsvRow>) => {
        for await (const r of source) rows.push(r);
      },
    );
  } catch (e) {
    if (e instanceof CsvError) {
      throw new InputError('INVALID_RECORD', `Malformed CSV in ${file}: ${e.message}`, { path: file, code: e.code });
    }
    if (e instanceof Error && 'syscall' in e) {
      throw new InputError('DATA_NOT_FOUND', `Could not read dataset at ${file}: ${e.message}`, { path: file });
    }
    throw e;
  }

  assertColumns(header);
  const records = toCatalogRecords(rows);
  logger.info({ path: file, records: records.length }, 'Catalog loaded');
  return records;
}
