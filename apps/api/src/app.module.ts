// apps/api/src/app.module.ts

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { validationSchemaForEnv } from './config/environment-variables';
import { FieldSyncModule } from './fieldsync/fieldsync.module';
import { PersistenceModule } from './persistence/persistence.module';

@Module({
  imports: [
    // Global ENV config + validation
    ConfigModule.forRoot({
      isGlobal: true,
      validationSchema: validationSchemaForEnv,
    }),

    // TypeORM DataSource (postgres, or better-sqlite3 for local runs)
    PersistenceModule,

    FieldSyncModule,
  ],
})
export class AppModule {}
