/**
 * src/config/schema.ts
 * What: Environment schema and the AppConfig it produces.
 * How: zod schema over raw env strings with numeric coercion and defaults. Cross-field rules:
 *        - VECTOR_STORE=postgres needs DATABASE_URL.
 *        - EMBEDDING_PROVIDER=openai needs OPENAI_API_KEY.
 *        - SUPABASE_URL and SUPABASE_KEY come as a pair; either one, or a supabase.co host in
 *          DATABASE_URL, switches the pg connection to TLS (DATABASE_SSL).
 *        - CHUNK_OVERLAP must stay below CHUNK_SIZE.
 *      parseConfig() is pure so tests can validate arbitrary env maps; parseDatabaseConfig() checks the
 *      connection settings alone.
 */

import { z } from 'zod';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

const intWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => {
      const raw = blankToUndefined(v);
      return typeof raw === 'string' ? Number(raw) : raw;
    },
    z.number().int().positive().default(def),
  );

const scoreWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => {
      const raw = blankToUndefined(v);
      return typeof raw === 'string' ? Number(raw) : raw;
    },
    z.number().min(0).lt(1).default(def),
  );

function checkSupabasePair(env: { SUPABASE_URL?: string; SUPABASE_KEY?: string }, ctx: z.RefinementCtx): void {
  if (Boolean(env.SUPABASE_URL) !== Boolean(env.SUPABASE_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [env.SUPABASE_URL ? 'SUPABASE_KEY' : 'SUPABASE_URL'],
      message: 'SUPABASE_URL and SUPABASE_KEY must be set together',
    });
  }
}

const supabaseUrl = z.preprocess(blankToUndefined, z.string().url().optional());

const schema = z
  .object({
    DATABASE_URL: optionalString,
    SUPABASE_URL: supabaseUrl,
    SUPABASE_KEY: optionalString,
    VECTOR_STORE: z.preprocess(blankToUndefined, z.enum(['postgres', 'memory']).default('postgres')),
    EMBEDDING_PROVIDER: z.preprocess(blankToUndefined, z.enum(['openai', 'hashing']).default('openai')),
    OPENAI_API_KEY: optionalString,
    OPENAI_EMBED_MODEL: z.preprocess(blankToUndefined, z.string().default('text-embedding-3-small')),
    EMBEDDING_DIMENSIONS: intWithDefault(384),
    CHUNK_SIZE: intWithDefault(300),
    CHUNK_OVERLAP: z.preprocess(
      (v: unknown) => {
        const raw = blankToUndefined(v);
        return typeof raw === 'string' ? Number(raw) : raw;
      },
      z.number().int().nonnegative().default(100),
    ),
    EMBED_BATCH_SIZE: intWithDefault(64),
    EMBED_CONCURRENCY: intWithDefault(2),
    SEARCH_DEFAULT_TOP_K: intWithDefault(5),
    SEARCH_MIN_SCORE: scoreWithDefault(0.3),
    SEARCH_OVERFETCH: intWithDefault(2),
    UPLOAD_MAX_BYTES: intWithDefault(25 * 1024 * 1024),
    PORT: intWithDefault(8501),
    NODE_ENV: z.preprocess(
      blankToUndefined,
      z.enum(['production', 'development', 'test']).optional().default('development'),
    ),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when VECTOR_STORE=postgres',
      });
    }
    if (env.EMBEDDING_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDING_PROVIDER=openai',
      });
    }
    checkSupabasePair(env, ctx);
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `CHUNK_OVERLAP (${env.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
      });
    }
  });

export interface AppConfig {
  DATABASE_URL?: string;
  SUPABASE_URL?: string;
  SUPABASE_KEY?: string;
  // True when the pg connection must use TLS (managed Supabase instance).
  DATABASE_SSL: boolean;
  VECTOR_STORE: 'postgres' | 'memory';
  EMBEDDING_PROVIDER: 'openai' | 'hashing';
  OPENAI_API_KEY?: string;
  OPENAI_EMBED_MODEL: string;
  EMBEDDING_DIMENSIONS: number;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  EMBED_BATCH_SIZE: number;
  EMBED_CONCURRENCY: number;
  SEARCH_DEFAULT_TOP_K: number;
  SEARCH_MIN_SCORE: number;
  SEARCH_OVERFETCH: number;
  UPLOAD_MAX_BYTES: number;
  PORT: number;
  NODE_ENV: 'production' | 'development' | 'test';
}

function isSupabaseHost(databaseUrl: string | undefined): boolean {
  if (!databaseUrl) return false;
  try {
    return new URL(databaseUrl).hostname.endsWith('supabase.co');
  } catch {
    return databaseUrl.includes('supabase.co');
  }
}

function formatIssues(error: z.ZodError): string {
  const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
  return `Invalid environment configuration: ${issues}`;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }
  const base = parsed.data;
  return {
    ...base,
    DATABASE_SSL: Boolean(base.SUPABASE_URL) || isSupabaseHost(base.DATABASE_URL),
  };
}

const databaseSchema = z
  .object({
    DATABASE_URL: z.preprocess(blankToUndefined, z.string({ required_error: 'DATABASE_URL is required' }).min(1)),
    SUPABASE_URL: supabaseUrl,
    SUPABASE_KEY: optionalString,
  })
  .superRefine(checkSupabasePair);

export type DatabaseConfig = Pick<AppConfig, 'DATABASE_SSL'> & { DATABASE_URL: string };

/** Only the connection settings, for tools such as the migration runner that never embed or serve. */
export function parseDatabaseConfig(env: Record<string, string | undefined>): DatabaseConfig {
  const parsed = databaseSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }
  const { DATABASE_URL, SUPABASE_URL } = parsed.data;
  return { DATABASE_URL, DATABASE_SSL: Boolean(SUPABASE_URL) || isSupabaseHost(DATABASE_URL) };
}
