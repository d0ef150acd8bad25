// apps/api/src/fieldsync/core/sync/push/push-processor.service.ts

import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { DataSource, EntityManager } from 'typeorm';

import { SyncableEntity } from '../../../domain/entities/syncable.entity';
import { isUniqueViolation } from '../../database/query-errors';
import { FN_SYNC_APPLY_OPERATION, FN_SYNC_PUSH } from '../../functional-ids';
import { LogCategory, LogLevel, LogService } from '../../logging/log.service';
import { ChangeLedgerService } from '../change-ledger/change-ledger.service';
import { encodeCursor } from '../change-ledger/cursor';
import { IdempotencyRecord } from '../idempotency/idempotency-record.entity';
import { IdempotencyLedgerService } from '../idempotency/idempotency-ledger.service';
import { EntityBuildError } from '../registry/entity-build.error';
import {
  AnySyncEntityHandler,
  EntityRegistryService,
} from '../registry/entity-registry.service';
import { findByClientId, locate } from '../registry/locate';
import {
  IdMapEntry,
  isSyncAction,
  isSyncEntityType,
  PushResponse,
  RejectedOp,
  RejectionReason,
  SyncAction,
  SyncConflict,
  SyncOperation,
} from '../sync.types';
import { parseOperation } from './operation-schema';

/**
 * Result of one operation, before it is folded into the batch response.
 */
type OperationOutcome =
  | { status: 'acked'; idMapEntry?: IdMapEntry; changeId?: number }
  | {
      status: 'rejected';
      reason: RejectionReason;
      message: string;
      details?: Record<string, unknown>;
      conflict?: SyncConflict;
    };

interface BatchState {
  response: PushResponse;
  appendedChangeIds: number[];
}

/**
 * PushProcessorService
 *
 * Responsibilities:
 * - Replay the cached response for an idempotency key already seen.
 * - Apply a batch of client operations in array order inside one
 *   transaction, each op in its own savepoint.
 * - Detect stale writes with a revision compare-and-swap and report them as
 *   conflicts; never overwrite.
 * - Record every mutation in the change ledger and the whole response in the
 *   idempotency ledger, atomically with the mutations.
 *
 * SQLite drivers share one connection, so overlapping transactions would
 * nest into each other. There, pushes run one at a time through a mutex.
 */
@Injectable()
export class PushProcessorService {
  private readonly logger = new Logger(PushProcessorService.name);
  private readonly writeLock: Mutex | null;

  constructor(
    private readonly dataSource: DataSource,
    private readonly changeLedger: ChangeLedgerService,
    private readonly idempotencyLedger: IdempotencyLedgerService,
    private readonly registry: EntityRegistryService,
    private readonly logService: LogService,
  ) {
    this.writeLock = usesSingleConnection(dataSource) ? new Mutex() : null;
  }

  processPush(
    userId: string,
    deviceId: string,
    ops: unknown[],
    idempotencyKey: string,
  ): Promise<PushResponse> {
    const push = () => this.pushBatch(userId, deviceId, ops, idempotencyKey);
    return this.writeLock ? this.writeLock.runExclusive(push) : push();
  }

  private async pushBatch(
    userId: string,
    deviceId: string,
    ops: unknown[],
    idempotencyKey: string,
  ): Promise<PushResponse> {
    const cached = await this.idempotencyLedger.find(idempotencyKey);
    if (cached) {
      return this.replay(cached, userId, idempotencyKey);
    }

    let response: PushResponse;
    try {
      response = await this.dataSource.transaction((manager) =>
        this.applyBatch(manager, userId, deviceId, ops, idempotencyKey),
      );
    } catch (error) {
      // A concurrent request with the same key committed first.
      if (isUniqueViolation(error)) {
        const winner = await this.idempotencyLedger.find(idempotencyKey);
        if (winner) {
          return this.replay(winner, userId, idempotencyKey);
        }
      }
      throw error;
    }

    this.logService.logEvent({
      category: LogCategory.SYNC,
      level: LogLevel.INFO,
      message: `Push applied: ${response.acked_op_ids.length} acked, ${response.rejected_ops.length} rejected`,
      identifier: `idempotency_key:${idempotencyKey}`,
      functionId: FN_SYNC_PUSH,
      actorUserId: userId,
      metadata: {
        deviceId,
        opCount: ops.length,
        serverCursor: response.server_cursor,
      },
    });

    return response;
  }

  private async applyBatch(
    manager: EntityManager,
    userId: string,
    deviceId: string,
    ops: unknown[],
    idempotencyKey: string,
  ): Promise<PushResponse> {
    const batch: BatchState = {
      response: {
        acked_op_ids: [],
        rejected_ops: [],
        id_map: [],
        server_cursor: '',
      },
      appendedChangeIds: [],
    };

    for (const [index, raw] of ops.entries()) {
      await this.applyOperation(manager, userId, raw, index, batch);
    }

    const highestChangeId =
      batch.appendedChangeIds.length > 0
        ? Math.max(...batch.appendedChangeIds)
        : await this.changeLedger.currentTail(manager);
    batch.response.server_cursor = encodeCursor(highestChangeId);

    await this.idempotencyLedger.record(manager, {
      idempotencyKey,
      deviceId,
      userId,
      opCount: ops.length,
      response: batch.response,
    });

    return batch.response;
  }

  private async applyOperation(
    manager: EntityManager,
    userId: string,
    raw: unknown,
    index: number,
    batch: BatchState,
  ): Promise<void> {
    const parsed = parseOperation(raw, index);
    if (!parsed.ok) {
      batch.response.rejected_ops.push(parsed.rejection);
      return;
    }

    const op = parsed.operation;
    const outcome = await this.dispatch(manager, userId, op);

    if (outcome.status === 'acked') {
      batch.response.acked_op_ids.push(op.op_id);
      if (outcome.idMapEntry) {
        batch.response.id_map.push(outcome.idMapEntry);
      }
      if (outcome.changeId !== undefined) {
        batch.appendedChangeIds.push(outcome.changeId);
      }
      return;
    }

    const rejection: RejectedOp = {
      op_id: op.op_id,
      reason: outcome.reason,
      message: outcome.message,
    };
    if (outcome.details) {
      rejection.details = outcome.details;
    }
    if (outcome.conflict) {
      rejection.conflict = outcome.conflict;
    }
    batch.response.rejected_ops.push(rejection);
  }

  private async dispatch(
    manager: EntityManager,
    userId: string,
    op: SyncOperation,
  ): Promise<OperationOutcome> {
    const handler = isSyncEntityType(op.entity_type)
      ? this.registry.get(op.entity_type)
      : undefined;

    if (!handler) {
      return reject('validation', `Unknown entity_type "${op.entity_type}"`, {
        field: 'entity_type',
      });
    }

    const action = op.action;
    if (!isSyncAction(action)) {
      return reject('validation', `Unknown action "${action}"`, {
        field: 'action',
      });
    }

    try {
      // Savepoint: a failing op leaves no partial writes and keeps the
      // outer transaction usable for its siblings.
      return await manager.transaction((opManager) =>
        this.runAction(opManager, handler, action, op, userId),
      );
    } catch (error) {
      if (error instanceof EntityBuildError) {
        return reject('validation', error.message, error.toDetails());
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Operation ${op.op_id} (${op.action} ${op.entity_type}) failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.logService.logEvent({
        category: LogCategory.SYNC,
        level: LogLevel.ERROR,
        message: `Operation failed with an unexpected error: ${message}`,
        identifier: `op_id:${op.op_id}`,
        functionId: FN_SYNC_APPLY_OPERATION,
        actorUserId: userId,
        metadata: { entityType: op.entity_type, action: op.action },
      });

      return reject('internal_error', 'Unexpected error while applying operation');
    }
  }

  private runAction(
    manager: EntityManager,
    handler: AnySyncEntityHandler,
    action: SyncAction,
    op: SyncOperation,
    userId: string,
  ): Promise<OperationOutcome> {
    switch (action) {
      case 'create':
        return this.create(manager, handler, op, userId);
      case 'update':
        return this.update(manager, handler, op, userId);
      case 'delete':
        return this.remove(manager, handler, op, userId);
    }
  }

  private async create(
    manager: EntityManager,
    handler: AnySyncEntityHandler,
    op: SyncOperation,
    userId: string,
  ): Promise<OperationOutcome> {
    if (op.client_id) {
      const existing = await findByClientId(manager, handler.model, op.client_id);
      if (existing) {
        return alreadyCreated(handler, op, existing);
      }
    }

    const entity = await handler.build(manager, op.client_id, op.payload, userId);

    let saved: SyncableEntity;
    try {
      saved = await manager.transaction((insertManager) =>
        insertManager.getRepository(handler.model).save(entity),
      );
    } catch (error) {
      // Lost the client_id race to a concurrent push.
      if (op.client_id && isUniqueViolation(error)) {
        const winner = await findByClientId(manager, handler.model, op.client_id);
        if (winner) {
          return alreadyCreated(handler, op, winner);
        }
      }
      throw error;
    }

    const entry = await this.changeLedger.append(manager, {
      entityType: handler.entityType,
      serverId: saved.id,
      action: 'create',
      revision: saved.revision,
      payload: handler.serialize(saved),
      userId,
    });

    return {
      status: 'acked',
      idMapEntry: idMapEntryFor(handler, op, saved),
      changeId: entry.id,
    };
  }

  private async update(
    manager: EntityManager,
    handler: AnySyncEntityHandler,
    op: SyncOperation,
    userId: string,
  ): Promise<OperationOutcome> {
    const entity = await locate(manager, handler.model, op.server_id, op.client_id);
    if (!entity) {
      return notFound(op);
    }

    if (entity.revision !== op.base_revision) {
      return conflictWith(handler, op, entity);
    }

    const changes = handler.applyPatch(entity, op.payload);
    const swapped = await handler.compareAndSwap(
      manager,
      entity,
      op.base_revision,
      changes,
      new Date(),
    );

    if (!swapped) {
      return this.lostRace(manager, handler, op, entity.id);
    }

    const entry = await this.changeLedger.append(manager, {
      entityType: handler.entityType,
      serverId: entity.id,
      action: 'update',
      revision: entity.revision,
      payload: handler.serialize(entity),
      userId,
    });

    return { status: 'acked', changeId: entry.id };
  }

  private async remove(
    manager: EntityManager,
    handler: AnySyncEntityHandler,
    op: SyncOperation,
    userId: string,
  ): Promise<OperationOutcome> {
    const entity = await locate(manager, handler.model, op.server_id, op.client_id);
    if (!entity) {
      // Missing or already deleted.
      return { status: 'acked' };
    }

    // base_revision 0 means the client did not supply one.
    if (op.base_revision > 0 && entity.revision !== op.base_revision) {
      return conflictWith(handler, op, entity);
    }

    const swapped = await handler.softDelete(
      manager,
      entity,
      entity.revision,
      new Date(),
    );

    if (!swapped) {
      const current = await locate(manager, handler.model, entity.id);
      if (!current) {
        return { status: 'acked' };
      }
      return conflictWith(handler, op, current);
    }

    const entry = await this.changeLedger.append(manager, {
      entityType: handler.entityType,
      serverId: entity.id,
      action: 'delete',
      revision: entity.revision,
      payload: null,
      userId,
    });

    return { status: 'acked', changeId: entry.id };
  }

  /**
   * The compare-and-swap matched no row: another writer bumped the revision
   * or deleted the row between our read and our write.
   */
  private async lostRace(
    manager: EntityManager,
    handler: AnySyncEntityHandler,
    op: SyncOperation,
    serverId: number,
  ): Promise<OperationOutcome> {
    const current = await locate(manager, handler.model, serverId);
    if (!current) {
      return notFound(op);
    }
    return conflictWith(handler, op, current);
  }

  private replay(
    record: IdempotencyRecord,
    userId: string,
    idempotencyKey: string,
  ): PushResponse {
    if (record.user_id !== userId) {
      this.logService.logSecurityEvent(
        'Idempotency key reused by a different user',
        {
          identifier: `idempotency_key:${idempotencyKey}`,
          functionId: FN_SYNC_PUSH,
          actorUserId: userId,
        },
      );
      throw new ConflictException({
        code: 'idempotency_key_reused',
        message: 'This idempotency key was already used by another user',
      });
    }

    this.logger.debug(`Replaying cached push response for key ${idempotencyKey}`);
    return this.idempotencyLedger.responseOf(record);
  }
}

function usesSingleConnection(dataSource: DataSource): boolean {
  const { type } = dataSource.options;
  return type === 'better-sqlite3' || type === 'sqlite';
}

function reject(
  reason: RejectionReason,
  message: string,
  details?: Record<string, unknown>,
): OperationOutcome {
  return details
    ? { status: 'rejected', reason, message, details }
    : { status: 'rejected', reason, message };
}

function notFound(op: SyncOperation): OperationOutcome {
  return reject('not_found', `${op.entity_type} not found`, {
    server_id: op.server_id,
    client_id: op.client_id,
  });
}

function conflictWith(
  handler: AnySyncEntityHandler,
  op: SyncOperation,
  current: SyncableEntity,
): OperationOutcome {
  return {
    status: 'rejected',
    reason: 'conflict',
    message: `Revision mismatch: server is at ${current.revision}, operation is based on ${op.base_revision}`,
    conflict: {
      entity_type: handler.entityType,
      server_id: current.id,
      current_revision: current.revision,
      base_revision: op.base_revision,
      server_state: handler.serialize(current),
      recommended_action: 'pull_and_rebase',
    },
  };
}

function alreadyCreated(
  handler: AnySyncEntityHandler,
  op: SyncOperation,
  existing: SyncableEntity,
): OperationOutcome {
  return { status: 'acked', idMapEntry: idMapEntryFor(handler, op, existing) };
}

function idMapEntryFor(
  handler: AnySyncEntityHandler,
  op: SyncOperation,
  entity: SyncableEntity,
): IdMapEntry {
  return {
    entity_type: handler.entityType,
    client_id: op.client_id,
    server_id: entity.id,
    revision: entity.revision,
  };
}
