import fs from 'fs';
import { InputError } from './errors';
import { ENGLISH_STOPWORDS_PATH } from './paths';

export const BUILTIN_STOPWORDS = 'english';

let english: ReadonlySet<string> | undefined;

/** One word per line; blank lines and `#` comments are skipped. */
export function parseStopwords(raw: string): ReadonlySet<string> {
  const words = raw
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .map((ln) => ln.trim().toLowerCase())
    .filter((ln) => ln && !ln.startsWith('#'));
  return new Set(words);
}

function readList(file: string): ReadonlySet<string> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InputError('STOPWORDS_NOT_FOUND', `Could not read stopword list at ${file}: ${reason}`, { path: file });
  }
  return parseStopwords(raw);
}

/**
 * Resolves a stopword source: `"english"` for the bundled list, anything else is read
 * as a path to a word file.
 */
export function loadStopwords(source: string = BUILTIN_STOPWORDS): ReadonlySet<string> {
  if (source === BUILTIN_STOPWORDS) {
    if (!english) english = readList(ENGLISH_STOPWORDS_PATH);
    return english;
  }
  return readList(source);
}
