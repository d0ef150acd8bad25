import { ChangeLogEntry } from '../fieldsync/core/sync/change-ledger/change-log.entity';
import { IdempotencyRecord } from '../fieldsync/core/sync/idempotency/idempotency-record.entity';
import { Apartment } from '../fieldsync/domain/entities/apartment.entity';
import { Defect } from '../fieldsync/domain/entities/defect.entity';
import { Inspection } from '../fieldsync/domain/entities/inspection.entity';
import { Measurement } from '../fieldsync/domain/entities/measurement.entity';
import { Property } from '../fieldsync/domain/entities/property.entity';

/**
 * Every TypeORM entity known to the application DataSource.
 */
export const PERSISTED_ENTITIES = [
  Property,
  Inspection,
  Apartment,
  Defect,
  Measurement,
  ChangeLogEntry,
  IdempotencyRecord,
];
