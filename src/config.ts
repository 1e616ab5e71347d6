import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import type { LevelWithSilent } from './logger.js';

export const BACKENDS = ['memory', 'file', 'redis', 'mongo', 'elasticsearch'] as const;
export type Backend = (typeof BACKENDS)[number];

// Environment variables and their defaults.
const EnvSchema = z.object({
  POLYODM_BACKEND: z.enum(BACKENDS).default('memory'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  MONGO_URL: z.string().url().default('mongodb://localhost:27017'),
  MONGO_DATABASE: z.string().min(1).default('polyodm'),
  ELASTICSEARCH_URL: z.string().url().default('http://localhost:9200'),
  FILE_STORE_DIR: z.string().min(1).default('.'),
  FILE_STORE_PREFIX: z.string().default('db_'),
  FILE_STORE_EXT: z.string().min(1).default('json'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface StorageConfig {
  backend: Backend;
  logLevel: LevelWithSilent;
  redis: { url: string };
  mongo: { url: string; database: string };
  elasticsearch: { node: string };
  file: { directory: string; prefix: string; ext: string };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): StorageConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.join('.');
      (fieldErrors[field] ??= []).push(issue.message);
    }
    throw new ConfigError(`Invalid environment: ${Object.keys(fieldErrors).join(', ')}`, fieldErrors);
  }
  const vars = result.data;
  return {
    backend: vars.POLYODM_BACKEND,
    logLevel: vars.LOG_LEVEL,
    redis: { url: vars.REDIS_URL },
    mongo: { url: vars.MONGO_URL, database: vars.MONGO_DATABASE },
    elasticsearch: { node: vars.ELASTICSEARCH_URL },
    file: { directory: vars.FILE_STORE_DIR, prefix: vars.FILE_STORE_PREFIX, ext: vars.FILE_STORE_EXT },
  };
}
