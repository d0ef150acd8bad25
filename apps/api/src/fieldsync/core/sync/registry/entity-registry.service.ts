// apps/api/src/fieldsync/core/sync/registry/entity-registry.service.ts

import { Injectable, Logger } from '@nestjs/common';

import { SyncableEntity } from '../../../domain/entities/syncable.entity';
import type { SyncEntityType } from '../sync.types';
import { ApartmentHandler } from './handlers/apartment.handler';
import { DefectHandler } from './handlers/defect.handler';
import { InspectionHandler } from './handlers/inspection.handler';
import { MeasurementHandler } from './handlers/measurement.handler';
import { PropertyHandler } from './handlers/property.handler';
import { SyncEntityHandler } from './sync-entity.handler';

export type AnySyncEntityHandler = SyncEntityHandler<SyncableEntity>;

/**
 * EntityRegistryService
 *
 * Maps an entity_type tag to the handler that knows how to build, patch and
 * serialise that entity. The push processor never touches a domain model
 * except through this registry.
 */
@Injectable()
export class EntityRegistryService {
  private readonly logger = new Logger(EntityRegistryService.name);
  private readonly handlers = new Map<SyncEntityType, AnySyncEntityHandler>();

  constructor(
    property: PropertyHandler,
    inspection: InspectionHandler,
    apartment: ApartmentHandler,
    defect: DefectHandler,
    measurement: MeasurementHandler,
  ) {
    [property, inspection, apartment, defect, measurement].forEach((handler) =>
      this.register(handler),
    );
  }

  register(handler: AnySyncEntityHandler): void {
    if (this.handlers.has(handler.entityType)) {
      this.logger.warn(
        `Replacing handler for entity type "${handler.entityType}"`,
      );
    }
    this.handlers.set(handler.entityType, handler);
  }

  get(entityType: SyncEntityType): AnySyncEntityHandler | undefined {
    return this.handlers.get(entityType);
  }

  entityTypes(): SyncEntityType[] {
    return Array.from(this.handlers.keys());
  }
}

export const ENTITY_HANDLERS = [
  PropertyHandler,
  InspectionHandler,
  ApartmentHandler,
  DefectHandler,
  MeasurementHandler,
];
