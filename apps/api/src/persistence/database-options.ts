// apps/api/src/persistence/database-options.ts

import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';

import { DbType } from '../config/environment-variables';
import { PERSISTED_ENTITIES } from './entities';

/**
 * Builds the TypeORM options for the application DataSource.
 *
 * - postgres (default): DATABASE_URL, the operational database.
 * - sqlite: better-sqlite3 at SQLITE_PATH (":memory:" by default), used for
 *   local development and the test suite.
 */
export function buildDatabaseOptions(
  config: ConfigService,
): TypeOrmModuleOptions {
  const dbType = config.get<DbType>('DB_TYPE') ?? 'postgres';
  const synchronize = config.get<boolean>('DB_SYNCHRONIZE') ?? false;
  const logging = config.get<boolean>('DB_LOGGING') ?? false;

  if (dbType === 'sqlite') {
    return {
      type: 'better-sqlite3',
      database: config.get<string>('SQLITE_PATH') ?? ':memory:',
      entities: PERSISTED_ENTITIES,
      synchronize,
      logging,
    };
  }

  const url = config.get<string>('DATABASE_URL');

  if (!url) {
    throw new Error('DATABASE_URL must be configured when DB_TYPE=postgres.');
  }

  return {
    type: 'postgres',
    url,
    entities: PERSISTED_ENTITIES,
    synchronize,
    logging,
  };
}
