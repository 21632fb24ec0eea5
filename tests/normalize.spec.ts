import fs from 'fs';
import { test, expect } from '@playwright/test';
import { normalize } from '../src/normalize';
import { loadStopwords, parseStopwords } from '../src/stopwords';
import { InputError } from '../src/errors';
import { TEST_STOPWORDS, captureError } from './helpers';

test.describe('normalize', () => {
  test('lowercases, strips punctuation and words with digits, drops stopwords', () => {
    expect(normalize("The Doctor's 2nd Life!", TEST_STOPWORDS)).toEqual(['doctor', 's', 'life']);
  });

  test('punctuation becomes a separator so tokens never fuse', () => {
    expect(normalize('Drama,Life;Family', TEST_STOPWORDS)).toEqual(['drama', 'life', 'family']);
  });

  test('a word containing a digit is dropped whole, leaving no fragments', () => {
    expect(normalize('move2heaven', TEST_STOPWORDS)).toEqual([]);
    expect(normalize('The 2nd season of 1990s Seoul, 4th wave', loadStopwords())).toEqual(['season', 'seoul', 'wave']);
    expect(normalize('Episode 12,final', TEST_STOPWORDS)).toEqual(['episode', 'final']);
  });

  test('missing, empty and all-stopword text give no tokens', () => {
    expect(normalize(undefined, TEST_STOPWORDS)).toEqual([]);
    expect(normalize('', TEST_STOPWORDS)).toEqual([]);
    expect(normalize('   \t\n ', TEST_STOPWORDS)).toEqual([]);
    expect(normalize('The and a, of the', TEST_STOPWORDS)).toEqual([]);
  });

  test('keeps non-latin letters', () => {
    expect(normalize('사랑과 전쟁 (2020)', TEST_STOPWORDS)).toEqual(['사랑과', '전쟁']);
  });

  test('built-in english list', () => {
    expect(normalize('The drama of a family', loadStopwords())).toEqual(['drama', 'family']);
  });
});

test.describe('stopwords', () => {
  test('built-in list is loaded once', () => {
    const sw = loadStopwords('english');
    expect(loadStopwords()).toBe(sw);
    expect(sw.has('the')).toBe(true);
    expect(sw.has('drama')).toBe(false);
  });

  test('parses comments, blank lines and case', () => {
    expect([...parseStopwords('# header\nFoo\n\n  bar  \r\nfoo\n')]).toEqual(['foo', 'bar']);
  });

  test('reads a custom word file', async ({}, testInfo) => {
    const file = testInfo.outputPath('words.txt');
    await fs.promises.writeFile(file, 'drama\nlife\n', 'utf-8');
    const sw = loadStopwords(file);
    expect(normalize('Drama about life and love', sw)).toEqual(['about', 'and', 'love']);
  });

  test('missing word file is an input error', () => {
    const err = captureError(() => loadStopwords('/nonexistent/stopwords.txt'));
    expect(err).toBeInstanceOf(InputError);
    expect(err).toMatchObject({ code: 'STOPWORDS_NOT_FOUND' });
  });
});
