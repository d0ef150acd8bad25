import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { EntityManager } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import {
  Apartment,
  ApartmentRoom,
} from '../../../../domain/entities/apartment.entity';
import { Inspection } from '../../../../domain/entities/inspection.entity';
import type { SyncSnapshot } from '../../sync.types';
import { SyncEntityHandler } from '../sync-entity.handler';

interface ApartmentFields {
  apartment_number: string;
  rooms?: ApartmentRoom[];
  notes?: string | null;
}

interface ApartmentCreateFields extends ApartmentFields {
  inspection_id?: number | null;
  inspection_client_id?: string | null;
}

const ROOM_SCHEMA = Joi.object<ApartmentRoom>({
  index: Joi.number().integer().min(0).required(),
  type: Joi.string().max(50).required(),
});

const FIELD_RULES = {
  apartment_number: Joi.string().max(20),
  rooms: Joi.array().items(ROOM_SCHEMA),
  notes: Joi.string().max(1000).allow(null, ''),
};

const CREATE_SCHEMA = Joi.object<ApartmentCreateFields>({
  ...FIELD_RULES,
  apartment_number: FIELD_RULES.apartment_number.required(),
  rooms: FIELD_RULES.rooms.default([]),
  inspection_id: Joi.number().integer().positive().allow(null),
  inspection_client_id: Joi.string().max(64).allow(null),
});

const PATCH_SCHEMA = Joi.object<Partial<ApartmentFields>>(FIELD_RULES);

@Injectable()
export class ApartmentHandler extends SyncEntityHandler<Apartment> {
  readonly entityType = 'apartment' as const;
  readonly model = Apartment;

  protected async instantiate(
    manager: EntityManager,
    payload: SyncSnapshot,
  ): Promise<Apartment> {
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

    return Object.assign(new Apartment(), fields, {
      inspection_id: inspection.id,
    });
  }

  protected validatePatch(
    payload: SyncSnapshot,
  ): QueryDeepPartialEntity<Apartment> {
    return this.validate(PATCH_SCHEMA, payload);
  }

  protected serializeFields(apartment: Apartment): SyncSnapshot {
    return {
      inspection_id: apartment.inspection_id,
      apartment_number: apartment.apartment_number,
      rooms: apartment.rooms ?? [],
      notes: apartment.notes ?? null,
    };
  }
}
