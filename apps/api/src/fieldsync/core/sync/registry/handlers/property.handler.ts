import { Injectable } from '@nestjs/common';
import * as Joi from 'joi';
import { EntityManager } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';

import { Property } from '../../../../domain/entities/property.entity';
import type { SyncSnapshot } from '../../sync.types';
import { SyncEntityHandler } from '../sync-entity.handler';

interface PropertyFields {
  property_type: string;
  designation: string;
  owner?: string | null;
  address: string;
  postal_code?: string | null;
  city?: string | null;
  num_apartments?: number | null;
  num_premises?: number | null;
  notes?: string | null;
}

const optionalText = (max?: number) =>
  (max ? Joi.string().max(max) : Joi.string()).allow(null, '');

const FIELD_RULES = {
  property_type: Joi.string().max(100),
  designation: Joi.string().max(255),
  owner: optionalText(255),
  address: Joi.string().max(500),
  postal_code: optionalText(20),
  city: optionalText(100),
  num_apartments: Joi.number().integer().min(0).allow(null),
  num_premises: Joi.number().integer().min(0).allow(null),
  notes: optionalText(),
};

const CREATE_SCHEMA = Joi.object<PropertyFields>({
  ...FIELD_RULES,
  property_type: FIELD_RULES.property_type.required(),
  designation: FIELD_RULES.designation.required(),
  address: FIELD_RULES.address.required(),
});

const PATCH_SCHEMA = Joi.object<Partial<PropertyFields>>(FIELD_RULES);

@Injectable()
export class PropertyHandler extends SyncEntityHandler<Property> {
  readonly entityType = 'property' as const;
  readonly model = Property;

  protected async instantiate(
    _manager: EntityManager,
    payload: SyncSnapshot,
  ): Promise<Property> {
    const fields = this.validate(CREATE_SCHEMA, payload);
    return Object.assign(new Property(), fields);
  }

  protected validatePatch(
    payload: SyncSnapshot,
  ): QueryDeepPartialEntity<Property> {
    return this.validate(PATCH_SCHEMA, payload);
  }

  protected serializeFields(property: Property): SyncSnapshot {
    return {
      property_type: property.property_type,
      designation: property.designation,
      owner: property.owner ?? null,
      address: property.address,
      postal_code: property.postal_code ?? null,
      city: property.city ?? null,
      num_apartments: property.num_apartments ?? null,
      num_premises: property.num_premises ?? null,
      notes: property.notes ?? null,
    };
  }
}
