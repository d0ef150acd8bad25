import { EntityManager, EntityTarget } from 'typeorm';

import { SyncableEntity } from '../../../domain/entities/syncable.entity';

/**
 * Finds a live (not soft-deleted) entity, preferring the server id and
 * falling back to the client id when the server id is absent or unknown.
 */
export async function locate<E extends SyncableEntity>(
  manager: EntityManager,
  model: EntityTarget<E>,
  serverId?: number | null,
  clientId?: string | null,
): Promise<E | null> {
  if (serverId != null) {
    const byId = await manager
      .createQueryBuilder(model, 'entity')
      .where('entity.id = :serverId', { serverId })
      .getOne();

    if (byId) {
      return byId;
    }
  }

  if (clientId) {
    return manager
      .createQueryBuilder(model, 'entity')
      .where('entity.client_id = :clientId', { clientId })
      .getOne();
  }

  return null;
}

/**
 * Finds an entity by client id including soft-deleted rows, since client_id
 * stays reserved after a delete.
 */
export async function findByClientId<E extends SyncableEntity>(
  manager: EntityManager,
  model: EntityTarget<E>,
  clientId: string,
): Promise<E | null> {
  return manager
    .createQueryBuilder(model, 'entity')
    .withDeleted()
    .where('entity.client_id = :clientId', { clientId })
    .getOne();
}
