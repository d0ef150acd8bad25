import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { EntityManager } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import { Apartment } from '../../../../domain/entities/apartment.entity';
import {
  DEFECT_SEVERITY_VALUES,
  Defect,
  DefectSeverity,
} from '../../../../domain/entities/defect.entity';
import type { SyncSnapshot } from '../../sync.types';
import { SyncEntityHandler } from '../sync-entity.handler';

interface DefectFields {
  room_index: number;
  code?: string | null;
  title?: string | null;
  description: string;
  remedy?: string | null;
  severity?: DefectSeverity;
}

interface DefectCreateFields extends DefectFields {
  apartment_id?: number | null;
  apartment_client_id?: string | null;
}

const FIELD_RULES = {
  room_index: Joi.number().integer().min(0),
  code: Joi.string().max(30).allow(null, ''),
  title: Joi.string().max(120).allow(null, ''),
  description: Joi.string(),
  remedy: Joi.string().allow(null, ''),
  severity: Joi.string().valid(...DEFECT_SEVERITY_VALUES),
};

const CREATE_SCHEMA = Joi.object<DefectCreateFields>({
  ...FIELD_RULES,
  room_index: FIELD_RULES.room_index.required(),
  description: FIELD_RULES.description.required(),
  severity: FIELD_RULES.severity.default('medium'),
  apartment_id: Joi.number().integer().positive().allow(null),
  apartment_client_id: Joi.string().max(64).allow(null),
});

const PATCH_SCHEMA = Joi.object<Partial<DefectFields>>(FIELD_RULES);

@Injectable()
export class DefectHandler extends SyncEntityHandler<Defect> {
  readonly entityType = 'defect' as const;
  readonly model = Defect;

  protected async instantiate(
    manager: EntityManager,
    payload: SyncSnapshot,
  ): Promise<Defect> {
    const { apartment_id, apartment_client_id, ...fields } = this.validate(
      CREATE_SCHEMA,
      payload,
    );

    const apartment = await this.resolveParent(
      manager,
      Apartment,
      'apartment',
      apartment_id,
      apartment_client_id,
    );

    return Object.assign(new Defect(), fields, { apartment_id: apartment.id });
  }

  protected validatePatch(payload: SyncSnapshot): QueryDeepPartialEntity<Defect> {
    return this.validate(PATCH_SCHEMA, payload);
  }

  protected serializeFields(defect: Defect): SyncSnapshot {
    return {
      apartment_id: defect.apartment_id,
      room_index: defect.room_index,
      code: defect.code ?? null,
      title: defect.title ?? null,
      description: defect.description,
      remedy: defect.remedy ?? null,
      severity: defect.severity,
    };
  }
}
