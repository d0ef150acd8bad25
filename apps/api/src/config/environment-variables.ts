// apps/api/src/config/environment-variables.ts

import * as Joi from 'joi';

import { CONFLICT_STRATEGIES } from '../fieldsync/core/sync/conflicts/conflict-resolver.service';

export const DB_TYPE_VALUES = ['postgres', 'sqlite'] as const;
export type DbType = (typeof DB_TYPE_VALUES)[number];

/**
 * Joi schema for process environment, applied by ConfigModule.forRoot().
 *
 * Numeric and boolean variables are converted by Joi, so ConfigService.get()
 * returns typed values for everything declared here.
 */
export const validationSchemaForEnv = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(3000),

  // Persistence
  DB_TYPE: Joi.string()
    .valid(...DB_TYPE_VALUES)
    .default('postgres'),
  DATABASE_URL: Joi.string().uri().when('DB_TYPE', {
    is: 'postgres',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
  SQLITE_PATH: Joi.string().default(':memory:'),
  DB_SYNCHRONIZE: Joi.boolean().default(false),
  DB_LOGGING: Joi.boolean().default(false),

  // Auth
  JWT_SECRET: Joi.string().min(8).required(),

  // Sync engine
  SYNC_MAX_OPS_PER_PUSH: Joi.number().integer().min(1).default(500),
  SYNC_DEFAULT_PULL_LIMIT: Joi.number().integer().min(1).default(200),
  SYNC_MAX_PULL_LIMIT: Joi.number().integer().min(1).default(500),
  SYNC_IDEMPOTENCY_TTL_SECONDS: Joi.number().integer().min(1).default(86400),
  SYNC_CHANGE_LOG_RETENTION_DAYS: Joi.number().integer().min(1).default(90),
  SYNC_MIN_CLIENT_VERSION: Joi.string()
    .pattern(/^\d+\.\d+\.\d+$/)
    .default('1.0.0'),
  SYNC_CONFLICT_POLICY_DEFAULT: Joi.string()
    .valid(...CONFLICT_STRATEGIES)
    .default('LWW'),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('DEBUG', 'INFO', 'WARN', 'WARNING', 'ERROR', 'CRITICAL')
    .insensitive()
    .default('INFO'),
  LOG_FORMAT: Joi.string().valid('json', 'text').default('json'),
  LOG_DIR: Joi.string().optional(),
});
