import Joi from 'joi';
import path from 'path';
import { throwValidationError } from '../models/validation';

export interface AppConfig {
  port: number;
  recordsPath: string;
  catalogPath: string;
  databasePath: string;
  redisUrl?: string;
  cacheTtlSeconds: number;
  historyLimit: number;
  defaultTopK: number;
  defaultBoostFactor: number;
  categoryRootLabel: string;
  reloadCron?: string; // undefined when reloading is switched off
  frontendUrl?: string;
}

interface RawEnvironment {
  PORT: number;
  RECORDS_PATH: string;
  CATALOG_PATH: string;
  DATABASE_PATH: string;
  REDIS_URL?: string;
  CACHE_TTL_SECONDS: number;
  HISTORY_LIMIT: number;
  DEFAULT_TOP_K: number;
  DEFAULT_BOOST_FACTOR: number;
  CATEGORY_ROOT_LABEL: string;
  DATASET_RELOAD_CRON: string;
  FRONTEND_URL?: string;
}

const environmentSchema = Joi.object<RawEnvironment>({
  PORT: Joi.number().port().default(3000),
  RECORDS_PATH: Joi.string().default('data/filtered_data.jsonl'),
  CATALOG_PATH: Joi.string().default('data/classified_games.json'),
  DATABASE_PATH: Joi.string().default('data/history.db'),
  REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).optional(),
  CACHE_TTL_SECONDS: Joi.number().integer().min(1).default(1800),
  HISTORY_LIMIT: Joi.number().integer().min(1).max(100).default(10),
  DEFAULT_TOP_K: Joi.number().integer().min(0).max(100).default(10),
  DEFAULT_BOOST_FACTOR: Joi.number().positive().default(1.5),
  CATEGORY_ROOT_LABEL: Joi.string().default('All Games'),
  DATASET_RELOAD_CRON: Joi.string().default('*/5 * * * *'),
  FRONTEND_URL: Joi.string().optional()
}).unknown(true);

/**
 * Read service configuration from the environment (after dotenv has populated it)
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  // Blank values count as unset so `.env` placeholders fall back to defaults
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = environmentSchema.validate(present, { abortEarly: false });
  if (result.error) {
    throwValidationError(result);
  }
  const raw = result.value;

  const reloadCron = raw.DATASET_RELOAD_CRON.trim().toLowerCase() === 'off'
    ? undefined
    : raw.DATASET_RELOAD_CRON;

  return {
    port: raw.PORT,
    recordsPath: path.resolve(cwd, raw.RECORDS_PATH),
    catalogPath: path.resolve(cwd, raw.CATALOG_PATH),
    databasePath: raw.DATABASE_PATH === ':memory:' ? raw.DATABASE_PATH : path.resolve(cwd, raw.DATABASE_PATH),
    redisUrl: raw.REDIS_URL,
    cacheTtlSeconds: raw.CACHE_TTL_SECONDS,
    historyLimit: raw.HISTORY_LIMIT,
    defaultTopK: raw.DEFAULT_TOP_K,
    defaultBoostFactor: raw.DEFAULT_BOOST_FACTOR,
    categoryRootLabel: raw.CATEGORY_ROOT_LABEL,
    reloadCron,
    frontendUrl: raw.FRONTEND_URL
  };
}
