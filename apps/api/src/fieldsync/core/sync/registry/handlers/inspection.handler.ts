import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { EntityManager } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import {
  INSPECTION_STATUS_VALUES,
  Inspection,
  InspectionStatus,
} from '../../../../domain/entities/inspection.entity';
import { Property } from '../../../../domain/entities/property.entity';
import type { SyncSnapshot } from '../../sync.types';
import { SyncEntityHandler } from '../sync-entity.handler';

interface InspectionFields {
  date: string;
  active_time_seconds?: number;
  status?: InspectionStatus;
  notes?: string | null;
}

interface InspectionCreateFields extends InspectionFields {
  property_id?: number | null;
  property_client_id?: string | null;
}

const FIELD_RULES = {
  date: Joi.string().pattern(/^\d{4}-\d{2}-\d{2}$/, 'YYYY-MM-DD'),
  active_time_seconds: Joi.number().integer().min(0),
  status: Joi.string().valid(...INSPECTION_STATUS_VALUES),
  notes: Joi.string().max(2000).allow(null, ''),
};

const CREATE_SCHEMA = Joi.object<InspectionCreateFields>({
  ...FIELD_RULES,
  date: FIELD_RULES.date.required(),
  active_time_seconds: FIELD_RULES.active_time_seconds.default(0),
  status: FIELD_RULES.status.default('draft'),
  property_id: Joi.number().integer().positive().allow(null),
  property_client_id: Joi.string().max(64).allow(null),
});

const PATCH_SCHEMA = Joi.object<Partial<InspectionFields>>(FIELD_RULES);

@Injectable()
export class InspectionHandler extends SyncEntityHandler<Inspection> {
  readonly entityType = 'inspection' as const;
  readonly model = Inspection;

  protected async instantiate(
    manager: EntityManager,
    payload: SyncSnapshot,
    userId: string,
  ): Promise<Inspection> {
    const { property_id, property_client_id, ...fields } = this.validate(
      CREATE_SCHEMA,
      payload,
    );

    const property = await this.resolveParent(
      manager,
      Property,
      'property',
      property_id,
      property_client_id,
    );

    return Object.assign(new Inspection(), fields, {
      property_id: property.id,
      inspector_id: userId,
    });
  }

  protected validatePatch(
    payload: SyncSnapshot,
  ): QueryDeepPartialEntity<Inspection> {
    return this.validate(PATCH_SCHEMA, payload);
  }

  protected serializeFields(inspection: Inspection): SyncSnapshot {
    return {
      property_id: inspection.property_id,
      inspector_id: inspection.inspector_id ?? null,
      date: inspection.date,
      active_time_seconds: inspection.active_time_seconds,
      status: inspection.status,
      notes: inspection.notes ?? null,
    };
  }
}
