import { Column, Entity, Index } from 'typeorm';

import { SyncableEntity } from './syncable.entity';

/**
 * flode: air flow (l/s), tryck: pressure (Pa), temp: temperature,
 * co2: ppm, fukt: humidity (%), ljud: sound level (dB), okand: other.
 */
export const MEASUREMENT_TYPE_VALUES = [
  'flode',
  'tryck',
  'temp',
  'co2',
  'fukt',
  'ljud',
  'okand',
] as const;
export type MeasurementType = (typeof MEASUREMENT_TYPE_VALUES)[number];

@Entity({ name: 'measurements' })
export class Measurement extends SyncableEntity {
  @Index()
  @Column({ type: 'integer' })
  inspection_id!: number;

  @Index()
  @Column({ type: 'varchar', length: 10 })
  type!: MeasurementType;

  @Column({ type: 'double precision' })
  value!: number;

  @Column({ type: 'varchar', length: 20 })
  unit!: string;

  @Index()
  @Column({ type: 'varchar', length: 20, nullable: true })
  apartment_number!: string | null;

  @Column({ type: 'varchar', length: 60, nullable: true })
  sort_key!: string | null;

  @Column({ type: 'varchar', length: 300, nullable: true })
  notes!: string | null;
}
