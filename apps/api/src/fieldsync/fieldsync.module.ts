import { Module } from '@nestjs/common';

import { HealthModule } from './core/health/health.module';
import { LoggerModule } from './core/logging/logger.module';
import { SyncModule } from './core/sync/sync.module';
import { AuthModule } from './security/auth/auth.module';

/**
 * Root module of the FieldSync backend: logging, auth, health and the sync
 * engine.
 */
@Module({
  imports: [LoggerModule, AuthModule, HealthModule, SyncModule],
})
export class FieldSyncModule {}
