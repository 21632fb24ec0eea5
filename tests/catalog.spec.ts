import path from 'path';
import { test, expect } from '@playwright/test';
import { assertColumns, loadCatalog, toCatalogRecords } from '../src/catalog';
import { InputError } from '../src/errors';
import { DEFAULT_DATA_PATH } from '../src/paths';
import { FIXTURES, captureAsyncError, captureError } from './helpers';

test.describe('catalog loader', () => {
  test('reads typed records in file order', async () => {
    const records = await loadCatalog(path.join(FIXTURES, 'catalog.csv'));
    expect(records).toEqual([
      {
        id: 0,
        title: 'Quiet Harbor',
        synopsis: 'A fisherman, his daughter and a storm.',
        cast: 'Kim A, Lee B',
        genre: 'Drama, Family',
        year: 2021,
        rating: 8.4,
      },
      {
        id: 1,
        title: 'Night Courier',
        synopsis: 'A courier delivers letters after midnight.',
        cast: 'Park C',
        genre: 'Thriller, Mystery',
        year: 2020,
      },
      { id: 2, title: 'Paper Cranes', synopsis: '', cast: '', genre: 'Romance', rating: 7.9 },
    ]);
    expect(records[1].rating).toBeUndefined();
    expect(records[2].year).toBeUndefined();
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  test('bundled sample loads', async () => {
    const records = await loadCatalog(DEFAULT_DATA_PATH);
    expect(records).toHaveLength(15);
    expect(records.map(r => r.id)).toEqual([...Array(15).keys()]);
    expect(records[0].title).toBe('Move to Heaven');
    expect(records.find(r => r.title === 'The Light in Your Eyes')?.rating).toBeUndefined();
  });

  test('missing file', async () => {
    const file = path.join(FIXTURES, 'nope.csv');
    const err = await captureAsyncError(() => loadCatalog(file));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ code: 'DATA_NOT_FOUND', message: `Dataset not found at: ${file}` });
  });

  test('missing columns are reported together', async () => {
    const err = await captureAsyncError(() => loadCatalog(path.join(FIXTURES, 'missing_columns.csv')));
    expect(err).toMatchObject({
      code: 'MISSING_COLUMNS',
      message: 'Dataset is missing required columns: Cast, Year of release, Rating. Found columns: Name, Synopsis, Genre',
    });
  });

  test('a ragged row is an input error', async () => {
    const err = await captureAsyncError(() => loadCatalog(path.join(FIXTURES, 'ragged.csv')));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ code: 'INVALID_RECORD' });
  });

  test('a path that cannot be read is an input error', async () => {
    const err = await captureAsyncError(() => loadCatalog(FIXTURES));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ code: 'DATA_NOT_FOUND' });
    expect(err instanceof Error ? err.message : '').toMatch(/^Could not read dataset at /);
  });

  test('after a malformed file the next load still works', async () => {
    await captureAsyncError(() => loadCatalog(path.join(FIXTURES, 'ragged.csv')));
    expect(await loadCatalog(path.join(FIXTURES, 'catalog.csv'))).toHaveLength(3);
  });

  test('an empty header lists no columns', () => {
    expect(captureError(() => assertColumns([]))).toMatchObject({
      code: 'MISSING_COLUMNS',
      details: { missing: ['Name', 'Synopsis', 'Cast', 'Year of release', 'Genre', 'Rating'], found: [] },
    });
  });
});

test.describe('row validation', () => {
  const row = (over: Record<string, string>) => ({
    Name: 'Title',
    Synopsis: '',
    Cast: '',
    'Year of release': '',
    Genre: '',
    Rating: '',
    ...over,
  });

  test('blank year and rating become absent; 2021.0 is a year', () => {
    const [a, b] = toCatalogRecords([row({ 'Year of release': '2021.0', Rating: '8' }), row({ Name: ' Padded ' })]);
    expect(a.year).toBe(2021);
    expect(a.rating).toBe(8);
    expect(b.title).toBe('Padded');
    expect(b.year).toBeUndefined();
    expect(b.rating).toBeUndefined();
  });

  test('bad rows are collected into one error with their row numbers', () => {
    const err = captureError(() => toCatalogRecords([
      row({ Name: '' }),
      row({}),
      row({ 'Year of release': '20x1' }),
      row({ 'Year of release': '2020.5', Rating: 'high' }),
    ]));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ code: 'INVALID_RECORD' });
    const rows = err instanceof InputError ? err.details?.rows : undefined;
    expect(Array.isArray(rows) ? rows.map(r => String(r).split(':')[0]) : rows).toEqual(['row 1', 'row 3', 'row 4']);
  });
});
