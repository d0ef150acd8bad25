import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

import { buildDatabaseOptions } from './database-options';

/**
 * Owns the single application DataSource. Services inject `DataSource`
 * directly and open their own transactions.
 */
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => buildDatabaseOptions(config),
    }),
  ],
  exports: [TypeOrmModule],
})
export class PersistenceModule {}
