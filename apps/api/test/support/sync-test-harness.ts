import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';

import { LogService } from '../../src/fieldsync/core/logging/log.service';
import { ChangeLedgerService } from '../../src/fieldsync/core/sync/change-ledger/change-ledger.service';
import { ConflictResolverService } from '../../src/fieldsync/core/sync/conflicts/conflict-resolver.service';
import { IdempotencyLedgerService } from '../../src/fieldsync/core/sync/idempotency/idempotency-ledger.service';
import { PullProcessorService } from '../../src/fieldsync/core/sync/pull/pull-processor.service';
import { PushProcessorService } from '../../src/fieldsync/core/sync/push/push-processor.service';
import { EntityRegistryService } from '../../src/fieldsync/core/sync/registry/entity-registry.service';
import { ApartmentHandler } from '../../src/fieldsync/core/sync/registry/handlers/apartment.handler';
import { DefectHandler } from '../../src/fieldsync/core/sync/registry/handlers/defect.handler';
import { InspectionHandler } from '../../src/fieldsync/core/sync/registry/handlers/inspection.handler';
import { MeasurementHandler } from '../../src/fieldsync/core/sync/registry/handlers/measurement.handler';
import { PropertyHandler } from '../../src/fieldsync/core/sync/registry/handlers/property.handler';
import {
  DEFAULT_SYNC_SETTINGS,
  SyncSettings,
} from '../../src/fieldsync/core/sync/sync-settings';
import { PERSISTED_ENTITIES } from '../../src/persistence/entities';

/**
 * Fresh in-memory SQLite database with the full schema.
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: PERSISTED_ENTITIES,
    synchronize: true,
    logging: false,
  });
  return dataSource.initialize();
}

/**
 * LogService that only emits CRITICAL events, to keep test output quiet.
 */
export function createQuietLogService(): LogService {
  return new LogService(new ConfigService({ LOG_LEVEL: 'CRITICAL' }));
}

export interface SyncHarness {
  dataSource: DataSource;
  settings: SyncSettings;
  logService: LogService;
  changeLedger: ChangeLedgerService;
  idempotencyLedger: IdempotencyLedgerService;
  handlers: {
    property: PropertyHandler;
    inspection: InspectionHandler;
    apartment: ApartmentHandler;
    defect: DefectHandler;
    measurement: MeasurementHandler;
  };
  registry: EntityRegistryService;
  resolver: ConflictResolverService;
  push: PushProcessorService;
  pull: PullProcessorService;
}

/**
 * Wires the sync services by hand against an in-memory database, the same
 * way SyncModule wires them through Nest.
 */
export async function createSyncHarness(
  overrides: Partial<SyncSettings> = {},
): Promise<SyncHarness> {
  const dataSource = await createTestDataSource();
  const settings: SyncSettings = { ...DEFAULT_SYNC_SETTINGS, ...overrides };
  const logService = createQuietLogService();

  const changeLedger = new ChangeLedgerService(dataSource);
  const idempotencyLedger = new IdempotencyLedgerService(dataSource, settings);
  const handlers = {
    property: new PropertyHandler(),
    inspection: new InspectionHandler(),
    apartment: new ApartmentHandler(),
    defect: new DefectHandler(),
    measurement: new MeasurementHandler(),
  };
  const registry = new EntityRegistryService(
    handlers.property,
    handlers.inspection,
    handlers.apartment,
    handlers.defect,
    handlers.measurement,
  );

  return {
    dataSource,
    settings,
    logService,
    changeLedger,
    idempotencyLedger,
    handlers,
    registry,
    resolver: new ConflictResolverService(logService),
    push: new PushProcessorService(
      dataSource,
      changeLedger,
      idempotencyLedger,
      registry,
      logService,
    ),
    pull: new PullProcessorService(changeLedger, logService, settings),
  };
}

export const PROPERTY_FIELDS = {
  property_type: 'flerbostadshus',
  designation: 'Testgården 1:1',
  address: 'Exempelgatan 1',
};
