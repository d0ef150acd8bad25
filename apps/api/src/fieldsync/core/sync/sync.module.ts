import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { AuthModule } from '../../security/auth/auth.module';
import { ChangeLedgerService } from './change-ledger/change-ledger.service';
import { ConflictResolverService } from './conflicts/conflict-resolver.service';
import { IdempotencyLedgerService } from './idempotency/idempotency-ledger.service';
import { PullProcessorService } from './pull/pull-processor.service';
import { PushProcessorService } from './push/push-processor.service';
import {
  ENTITY_HANDLERS,
  EntityRegistryService,
} from './registry/entity-registry.service';
import { SYNC_SETTINGS, syncSettingsFromConfig } from './sync-settings';
import { SyncController } from './sync.controller';

/**
 * SyncModule
 *
 * The offline sync engine: ledgers, entity registry, push/pull processors
 * and the /sync HTTP surface.
 */
@Module({
  imports: [ConfigModule, AuthModule],
  controllers: [SyncController],
  providers: [
    {
      provide: SYNC_SETTINGS,
      inject: [ConfigService],
      useFactory: syncSettingsFromConfig,
    },
    ChangeLedgerService,
    IdempotencyLedgerService,
    ...ENTITY_HANDLERS,
    EntityRegistryService,
    ConflictResolverService,
    PushProcessorService,
    PullProcessorService,
  ],
  exports: [
    SYNC_SETTINGS,
    ChangeLedgerService,
    EntityRegistryService,
    ConflictResolverService,
    PushProcessorService,
    PullProcessorService,
  ],
})
export class SyncModule {}
