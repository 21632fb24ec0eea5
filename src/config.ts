/**
 * Runtime options, validated with zod. Environment variables override defaults and
 * explicit overrides (CLI flags) override both. The CLI loads `.env` through dotenv
 * before calling loadConfig.
 */

import { z } from 'zod';
import { InputError } from './errors';
import { DEFAULT_DATA_PATH } from './paths';
import { DEFAULT_TOP_K } from './ranker';
import { BUILTIN_STOPWORDS } from './stopwords';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => {
      const x = blankToUndefined(v);
      return typeof x === 'string' ? Number(x.trim()) : x;
    },
    z.number().int().positive().default(def),
  );

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const schema = z.object({
  dataPath: z.preprocess(blankToUndefined, z.string().default(DEFAULT_DATA_PATH)),
  topK: intWithDefault(DEFAULT_TOP_K),
  stopwords: z.preprocess(blankToUndefined, z.string().default(BUILTIN_STOPWORDS)),
  logLevel: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
});

export type AppConfig = z.infer<typeof schema>;

export type ConfigOverrides = {
  dataPath?: string;
  topK?: string | number;
  stopwords?: string;
  logLevel?: string;
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const raw = {
    dataPath: overrides.dataPath ?? env.KDRAMA_DATA_PATH,
    topK: overrides.topK ?? env.KDRAMA_TOP_K,
    stopwords: overrides.stopwords ?? env.KDRAMA_STOPWORDS,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL,
  };

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new InputError('INVALID_CONFIG', `Invalid configuration: ${issues}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
