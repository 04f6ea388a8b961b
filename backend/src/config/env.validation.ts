import { z } from 'zod';
import { ConfigurationError } from './config.errors.js';

const truthyValues = new Set(['true', '1', 'yes', 'y', 'on']);

const booleanFlag = z.preprocess((value) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized.length === 0) {
      return undefined;
    }
    return truthyValues.has(normalized);
  }
  if (typeof value === 'number') {
    return value === 1;
  }
  return value;
}, z.boolean().optional());

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    AI_PROVIDER: z.enum(['openai']).default('openai'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    OPENAI_EMBEDDING_MODEL: z.string().trim().default('text-embedding-3-small'),
    AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    AI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(800),
    AI_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    VECTOR_STORE: z.enum(['file', 'postgres']).default('file'),
    VECTOR_STORE_PATH: z.string().trim().default('./data/vector-index'),
    VECTOR_COLLECTION: z
      .string()
      .trim()
      .regex(
        /^[A-Za-z0-9_-]+$/,
        'collection name may only contain letters, digits, "_" and "-"',
      )
      .default('course_materials'),
    DATABASE_URL: z.string().trim().optional(),
    DATABASE_SSL: booleanFlag,
    CHUNK_SIZE: z.coerce.number().int().positive().default(800),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(100),
    MAX_RESULTS: z.coerce
      .number()
      .int()
      .positive('MAX_RESULTS must be a positive integer')
      .default(5),
    COURSE_MATCH_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.8),
    SEARCH_CONTEXT_WINDOW: z.coerce.number().int().nonnegative().default(0),
    MAX_HISTORY: z.coerce.number().int().nonnegative().default(2),
    MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(2),
    DOCS_PATH: z.string().trim().default('./docs'),
    INGEST_ON_STARTUP: booleanFlag,
  })
  .superRefine((env, ctx) => {
    if (
      env.AI_PROVIDER === 'openai' &&
      !env.OPENAI_API_KEY &&
      env.NODE_ENV !== 'test'
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: `CHUNK_OVERLAP (${env.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`,
      });
    }
    if (env.VECTOR_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when VECTOR_STORE=postgres',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const messages = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(
      `Configuration validation failed - ${messages}`,
    );
  }
  return parsed.data;
};
