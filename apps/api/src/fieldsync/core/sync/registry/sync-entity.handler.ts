// apps/api/src/fieldsync/core/sync/registry/sync-entity.handler.ts

import * as Joi from 'joi';
import { EntityManager, EntityTarget } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import { SyncableEntity } from '../../../domain/entities/syncable.entity';
import type { SyncEntityType, SyncSnapshot } from '../sync.types';
import { EntityBuildError } from './entity-build.error';
import { locate } from './locate';

const JOI_OPTIONS: Joi.ValidationOptions = {
  abortEarly: false,
  stripUnknown: true,
  convert: true,
};

/**
 * Base class for the per-entity-type handlers held by EntityRegistryService.
 *
 * Subclasses supply:
 *  - instantiate():   validate a create payload, resolve parent references and
 *                     return an unsaved entity with its domain fields set;
 *  - validatePatch(): the allow-listed, validated subset of an update payload;
 *  - serializeFields(): the domain fields of a snapshot.
 *
 * The base class owns the system columns (id, client_id, revision,
 * timestamps) so that no payload can write them.
 */
export abstract class SyncEntityHandler<E extends SyncableEntity> {
  abstract readonly entityType: SyncEntityType;
  abstract readonly model: new () => E;

  protected abstract instantiate(
    manager: EntityManager,
    payload: SyncSnapshot,
    userId: string,
  ): Promise<E>;

  protected abstract validatePatch(
    payload: SyncSnapshot,
  ): QueryDeepPartialEntity<E>;

  protected abstract serializeFields(entity: E): SyncSnapshot;

  /**
   * Builds an unsaved entity at revision 1.
   * Throws EntityBuildError on invalid payloads or unresolvable references.
   */
  async build(
    manager: EntityManager,
    clientId: string | null,
    payload: SyncSnapshot,
    userId: string,
  ): Promise<E> {
    const entity = await this.instantiate(manager, payload, userId);
    const now = new Date();

    entity.client_id = clientId;
    entity.revision = 1;
    entity.created_by_user_id = userId;
    entity.created_at = now;
    entity.updated_at = now;
    entity.deleted_at = null;

    return entity;
  }

  /**
   * Applies the allow-listed fields of `payload` to the in-memory entity and
   * returns exactly the columns that were written.
   */
  applyPatch(entity: E, payload: SyncSnapshot): QueryDeepPartialEntity<E> {
    const changes = this.validatePatch(payload);
    Object.assign(entity, changes);
    return changes;
  }

  /**
   * Conditional update: writes `changes` and bumps the revision only if the
   * row is still live and still at `baseRevision`. Returns false when a
   * concurrent writer got there first.
   */
  async compareAndSwap(
    manager: EntityManager,
    entity: E,
    baseRevision: number,
    changes: QueryDeepPartialEntity<E>,
    now: Date,
  ): Promise<boolean> {
    const result = await manager
      .createQueryBuilder()
      .update(this.model)
      .set({ ...changes, revision: baseRevision + 1, updated_at: now })
      .where('id = :id', { id: entity.id })
      .andWhere('revision = :baseRevision', { baseRevision })
      .andWhere('deleted_at IS NULL')
      .updateEntity(false)
      .execute();

    if (!result.affected) {
      return false;
    }

    entity.revision = baseRevision + 1;
    entity.updated_at = now;
    return true;
  }

  /**
   * Soft-deletes the row under the same compare-and-swap rule as updates.
   */
  async softDelete(
    manager: EntityManager,
    entity: E,
    baseRevision: number,
    now: Date,
  ): Promise<boolean> {
    const result = await manager
      .createQueryBuilder()
      .update<SyncableEntity>(this.model)
      .set({ revision: baseRevision + 1, updated_at: now, deleted_at: now })
      .where('id = :id', { id: entity.id })
      .andWhere('revision = :baseRevision', { baseRevision })
      .andWhere('deleted_at IS NULL')
      .updateEntity(false)
      .execute();

    if (!result.affected) {
      return false;
    }

    entity.revision = baseRevision + 1;
    entity.updated_at = now;
    entity.deleted_at = now;
    return true;
  }

  /**
   * Full JSON snapshot, as stored in change_log.payload and returned in
   * conflicts.
   */
  serialize(entity: E): SyncSnapshot {
    return {
      id: entity.id,
      client_id: entity.client_id,
      revision: entity.revision,
      ...this.serializeFields(entity),
      created_by_user_id: entity.created_by_user_id,
      created_at: toIsoString(entity.created_at),
      updated_at: toIsoString(entity.updated_at),
      deleted_at: entity.deleted_at ? toIsoString(entity.deleted_at) : null,
    };
  }

  protected validate<T>(schema: Joi.ObjectSchema<T>, payload: SyncSnapshot): T {
    const result = schema.validate(payload, JOI_OPTIONS);

    if (result.error) {
      const details = result.error.details.map((detail) => ({
        path: detail.path.join('.'),
        message: detail.message,
      }));

      throw new EntityBuildError(
        'invalid_payload',
        `Invalid ${this.entityType} payload: ${result.error.message}`,
        details[0]?.path,
        { errors: details },
      );
    }

    return result.value;
  }

  /**
   * Resolves a parent reference given either its server id or its client id.
   * Soft-deleted parents do not resolve.
   */
  protected async resolveParent<P extends SyncableEntity>(
    manager: EntityManager,
    model: EntityTarget<P>,
    parentType: SyncEntityType,
    serverId: number | null | undefined,
    clientId: string | null | undefined,
  ): Promise<P> {
    const idField = `${parentType}_id`;
    const clientIdField = `${parentType}_client_id`;

    if (serverId == null && !clientId) {
      throw new EntityBuildError(
        'missing_reference',
        `${idField} or ${clientIdField} is required for ${this.entityType}`,
        idField,
      );
    }

    const parent = await locate(manager, model, serverId, clientId);

    if (!parent) {
      throw new EntityBuildError(
        'unresolved_reference',
        `Referenced ${parentType} was not found`,
        serverId != null ? idField : clientIdField,
        { [idField]: serverId ?? null, [clientIdField]: clientId ?? null },
      );
    }

    return parent;
  }
}

function toIsoString(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}
