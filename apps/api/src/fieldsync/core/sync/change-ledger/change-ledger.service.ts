// apps/api/src/fieldsync/core/sync/change-ledger/change-ledger.service.ts

import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, MoreThan } from 'typeorm';

import type { SyncAction, SyncSnapshot } from '../sync.types';
import { ChangeLogEntry } from './change-log.entity';

export interface AppendChangeInput {
  entityType: string;
  serverId: number;
  action: SyncAction;
  revision: number;
  /** Must be null for deletes. */
  payload: SyncSnapshot | null;
  userId: string | null;
}

/**
 * ChangeLedgerService
 *
 * Owns the change_log table. Writes always happen inside the caller's
 * transaction (the push batch); reads use the default DataSource manager.
 */
@Injectable()
export class ChangeLedgerService {
  constructor(private readonly dataSource: DataSource) {}

  /**
   * Appends one entry and returns it with its assigned id. Callers collect the
   * returned ids to compute the batch's server cursor.
   */
  async append(
    manager: EntityManager,
    input: AppendChangeInput,
  ): Promise<ChangeLogEntry> {
    const repository = manager.getRepository(ChangeLogEntry);

    const entry = repository.create({
      entity_type: input.entityType,
      server_id: input.serverId,
      action: input.action,
      revision: input.revision,
      payload: input.action === 'delete' ? null : input.payload,
      changed_by_user_id: input.userId,
      created_at: new Date(),
    });

    return repository.save(entry);
  }

  /**
   * Highest id currently in the ledger, or 0 when it is empty.
   */
  async currentTail(
    manager: EntityManager = this.dataSource.manager,
  ): Promise<number> {
    const row = await manager
      .getRepository(ChangeLogEntry)
      .createQueryBuilder('entry')
      .select('MAX(entry.id)', 'max_id')
      .getRawOne<{ max_id: number | string | null }>();

    return row?.max_id == null ? 0 : Number(row.max_id);
  }

  /**
   * Entries with id > sinceId in ascending id order.
   */
  async readAfter(sinceId: number, take: number): Promise<ChangeLogEntry[]> {
    return this.dataSource.getRepository(ChangeLogEntry).find({
      where: { id: MoreThan(sinceId) },
      order: { id: 'ASC' },
      take,
    });
  }
}
