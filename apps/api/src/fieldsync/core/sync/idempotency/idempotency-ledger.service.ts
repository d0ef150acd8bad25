// apps/api/src/fieldsync/core/sync/idempotency/idempotency-ledger.service.ts

import { Inject, Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';

import { SYNC_SETTINGS, SyncSettings } from '../sync-settings';
import type { PushResponse } from '../sync.types';
import { IdempotencyRecord } from './idempotency-record.entity';

export interface RecordPushInput {
  idempotencyKey: string;
  deviceId: string;
  userId: string;
  opCount: number;
  response: PushResponse;
  statusCode?: number;
}

/**
 * IdempotencyLedgerService
 *
 * Keyed cache of whole-batch push responses. A stored response is replayed
 * verbatim for every resubmission of its key; expires_at only tells the
 * external purge job when the row may go.
 */
@Injectable()
export class IdempotencyLedgerService {
  constructor(
    private readonly dataSource: DataSource,
    @Inject(SYNC_SETTINGS) private readonly settings: SyncSettings,
  ) {}

  async find(
    idempotencyKey: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<IdempotencyRecord | null> {
    return manager
      .getRepository(IdempotencyRecord)
      .findOne({ where: { idempotency_key: idempotencyKey } });
  }

  /**
   * Inserts the record inside the push transaction. Throws the driver's
   * unique violation when a concurrent request already stored this key.
   */
  async record(
    manager: EntityManager,
    input: RecordPushInput,
  ): Promise<IdempotencyRecord> {
    const now = new Date();
    const repository = manager.getRepository(IdempotencyRecord);

    const record = repository.create({
      idempotency_key: input.idempotencyKey,
      device_id: input.deviceId,
      user_id: input.userId,
      op_count: input.opCount,
      response_body: JSON.stringify(input.response),
      status_code: input.statusCode ?? 200,
      created_at: now,
      expires_at: new Date(
        now.getTime() + this.settings.idempotencyTtlSeconds * 1000,
      ),
    });

    return repository.save(record);
  }

  responseOf(record: IdempotencyRecord): PushResponse {
    const parsed: PushResponse = JSON.parse(record.response_body);
    return parsed;
  }
}
