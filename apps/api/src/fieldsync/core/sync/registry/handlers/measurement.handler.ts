import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { EntityManager } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import { Inspection } from '../../../../domain/entities/inspection.entity';
import {
  MEASUREMENT_TYPE_VALUES,
  Measurement,
  MeasurementType,
} from '../../../../domain/entities/measurement.entity';
import type { SyncSnapshot } from '../../sync.types';
import { SyncEntityHandler } from '../sync-entity.handler';

interface MeasurementFields {
  type: MeasurementType;
  value: number;
  unit: string;
  apartment_number?: string | null;
  sort_key?: string | null;
  notes?: string | null;
}

interface MeasurementCreateFields extends MeasurementFields {
  inspection_id?: number | null;
  inspection_client_id?: string | null;
}

const FIELD_RULES = {
  type: Joi.string().valid(...MEASUREMENT_TYPE_VALUES),
  value: Joi.number(),
  unit: Joi.string().max(20),
  apartment_number: Joi.string().max(20).allow(null, ''),
  sort_key: Joi.string().max(60).allow(null, ''),
  notes: Joi.string().max(300).allow(null, ''),
};

const CREATE_SCHEMA = Joi.object<MeasurementCreateFields>({
  ...FIELD_RULES,
  type: FIELD_RULES.type.required(),
  value: FIELD_RULES.value.required(),
  unit: FIELD_RULES.unit.required(),
  inspection_id: Joi.number().integer().positive().allow(null),
  inspection_client_id: Joi.string().max(64).allow(null),
});

const PATCH_SCHEMA = Joi.object<Partial<MeasurementFields>>(FIELD_RULES);

@Injectable()
export class MeasurementHandler extends SyncEntityHandler<Measurement> {
  readonly entityType = 'measurement' as const;
  readonly model = Measurement;

  protected async instantiate(
    manager: EntityManager,
    payload: SyncSnapshot,
  ): Promise<Measurement> {
    const { inspection_id, inspection_client_id, ...fields } = this.validate(
      CREATE_SCHEMA,
      payload,
    );

    const inspection = await this.resolveParent(
      manager,
      Inspection,
      'inspection',
      inspection_id,
      inspection_client_id,
    );

    return Object.assign(new Measurement(), fields, {
      inspection_id: inspection.id,
    });
  }

  protected validatePatch(
    payload: SyncSnapshot,
  ): QueryDeepPartialEntity<Measurement> {
    return this.validate(PATCH_SCHEMA, payload);
  }

  protected serializeFields(measurement: Measurement): SyncSnapshot {
    return {
      inspection_id: measurement.inspection_id,
      type: measurement.type,
      value: measurement.value,
      unit: measurement.unit,
      apartment_number: measurement.apartment_number ?? null,
      sort_key: measurement.sort_key ?? null,
      notes: measurement.notes ?? null,
    };
  }
}
