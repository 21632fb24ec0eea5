#!/usr/bin/env node
import dotenv from 'dotenv';
import type { Recommendation, RecommendationItem } from './types';
import { loadCatalog } from './catalog';
import { loadConfig } from './config';
import { createContext } from './context';
import { InputError, isInputError } from './errors';
import logger from './logging';
import { recommend, recommendByGenre } from './recommend';
import { formatScore, renderReport } from './report';

export const USAGE =
  'Usage: kdrama-recommend [--data <csv>] [--topk <n>] [--stopwords <english|file>] [--json] [--html <dir>] <title | description | year>\n' +
  '       kdrama-recommend [options] --genre <genre>\n' +
  'Example: kdrama-recommend "Move to Heaven"\n';

export type CliArgs = {
  data?: string;
  topK?: string;
  stopwords?: string;
  html?: string;
  genre?: string;
  json: boolean;
  help: boolean;
  query: string;
};

const VALUE_FLAGS: Record<string, 'data' | 'topK' | 'stopwords' | 'html' | 'genre'> = {
  '--data': 'data',
  '--genre': 'genre',
  '--topk': 'topK',
  '--stopwords': 'stopwords',
  '--html': 'html',
};

/** Flags may appear anywhere; the remaining words, joined by single spaces, are the query. */
export function parseArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { json: false, help: false, query: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      words.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '--json') { out.json = true; continue; }
    if (arg === '-h' || arg === '--help') { out.help = true; continue; }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq >= 0 ? arg.slice(0, eq) : arg;
      const key = VALUE_FLAGS[flag];
      if (!key) throw new InputError('INVALID_CONFIG', `Unknown option: ${flag}`);

      const value = eq >= 0 ? arg.slice(eq + 1) : argv[i + 1];
      if (value === undefined || (eq < 0 && value.startsWith('--'))) {
        throw new InputError('INVALID_CONFIG', `Missing value: ${flag} <value>`);
      }
      out[key] = value;
      if (eq < 0) i++;
      continue;
    }
    words.push(arg);
  }

  out.query = words.join(' ').trim();
  return out;
}

function formatItem(item: RecommendationItem, pos: number): string {
  const year = item.year === undefined ? 'n/a' : String(item.year);
  const rating = item.rating === undefined ? 'n/a' : String(item.rating);
  const line = `${pos}. ${item.title} (${year}) | ${item.genre} | Rating: ${rating}`;
  return item.score === undefined ? line : `${line} | Score: ${formatScore(item.score)}`;
}

export function formatRecommendation(rec: Recommendation): string[] {
  const lines = [`Mode: ${rec.mode}`];
  if (rec.matchedTitle) lines.push(`Matched title: ${rec.matchedTitle}`);
  if (rec.warning) lines.push(`Warning: ${rec.warning}`);
  if (rec.didYouMean) lines.push(`Did you mean: ${rec.didYouMean.join(', ')}`);
  rec.results.forEach((item, i) => lines.push(formatItem(item, i + 1)));
  return lines;
}

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
};

const stdio: CliIO = {
  out: (text) => { process.stdout.write(text); },
  err: (text) => { process.stderr.write(text); },
};

/** Runs one query and returns the exit code: 0 on success, 2 for bad input, 1 otherwise. */
export async function main(argv: readonly string[], io: CliIO = stdio, env: Record<string, string | undefined> = process.env): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.out(USAGE);
      return 0;
    }
    if (args.genre !== undefined && args.query) {
      throw new InputError('INVALID_CONFIG', 'Give either a query or --genre, not both.');
    }
    if (args.genre === undefined && !args.query) {
      io.err(`Please provide a query.\n${USAGE}`);
      return 2;
    }

    const config = loadConfig(env, { dataPath: args.data, topK: args.topK, stopwords: args.stopwords });
    logger.level = config.logLevel;

    const records = await loadCatalog(config.dataPath);
    const ctx = createContext(records, { stopwords: config.stopwords });
    const rec = args.genre === undefined
      ? recommend(ctx, args.query, config.topK)
      : recommendByGenre(ctx, args.genre, config.topK);

    io.out(args.json ? `${JSON.stringify(rec, null, 2)}\n` : `${formatRecommendation(rec).join('\n')}\n`);

    if (args.html) {
      const file = await renderReport(rec, args.html);
      logger.info({ file }, 'HTML report written');
    }
    return 0;
  } catch (e) {
    if (isInputError(e)) {
      logger.debug({ code: e.code, details: e.details }, e.message);
      io.err(`Error: ${e.message}\n`);
      return 2;
    }
    logger.error({ err: e }, 'Recommendation failed');
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}\n`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config();
  main(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (e: unknown) => {
      logger.fatal({ err: e }, 'Unexpected failure');
      process.exitCode = 1;
    },
  );
}
