/**
 * Runtime configuration, read once from the environment at startup.
 * `.env` is loaded by the entry points (dotenv) before this runs.
 */
import { z } from 'zod';
import type { AnswerMode } from '../../shared/types.js';
import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_TEMPERATURE,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_TOP_K,
} from '../../shared/constants.js';

export interface AppConfig {
  googleApiKey: string;
  answerMode: AnswerMode;
  chatModel: string;
  embeddingModel: string;
  temperature: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  captionLang?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Blank values count as unset
const optional = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z
  .object({
    GOOGLE_API_KEY: z
      .string({ required_error: 'GOOGLE_API_KEY not found! Please set it in your .env file.' })
      .trim()
      .min(1, 'GOOGLE_API_KEY not found! Please set it in your .env file.'),
    ANSWER_MODE: z.preprocess(optional, z.enum(['rag', 'full']).default('rag')),
    CHAT_MODEL: z.preprocess(optional, z.string().default(DEFAULT_CHAT_MODEL)),
    EMBEDDING_MODEL: z.preprocess(optional, z.string().default(DEFAULT_EMBEDDING_MODEL)),
    TEMPERATURE: z.preprocess(optional, z.coerce.number().min(0).max(2).default(DEFAULT_TEMPERATURE)),
    CHUNK_SIZE: z.preprocess(optional, z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE)),
    CHUNK_OVERLAP: z.preprocess(optional, z.coerce.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP)),
    TOP_K: z.preprocess(optional, z.coerce.number().int().positive().default(DEFAULT_TOP_K)),
    CAPTION_LANG: z.preprocess(optional, z.string().optional()),
  })
  .refine(env => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  });

/** Validate the environment; throws ConfigError naming the first bad variable */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join('.');
    throw new ConfigError(variable === 'GOOGLE_API_KEY' ? issue.message : `${variable}: ${issue.message}`);
  }

  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    answerMode: e.ANSWER_MODE,
    chatModel: e.CHAT_MODEL,
    embeddingModel: e.EMBEDDING_MODEL,
    temperature: e.TEMPERATURE,
    chunkSize: e.CHUNK_SIZE,
    chunkOverlap: e.CHUNK_OVERLAP,
    topK: e.TOP_K,
    ...(e.CAPTION_LANG ? { captionLang: e.CAPTION_LANG } : {}),
  };
}

/** One line for stderr when startup fails; config problems print without a stack */
export function describeStartupError(err: unknown): string {
  if (err instanceof ConfigError) return `⚠️ ${err.message}`;
  return `Fatal error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`;
}
