import { Column, Entity, Index } from 'typeorm';

import { SyncableEntity } from './syncable.entity';

export const INSPECTION_STATUS_VALUES = ['draft', 'final', 'archived'] as const;
export type InspectionStatus = (typeof INSPECTION_STATUS_VALUES)[number];

@Entity({ name: 'inspections' })
export class Inspection extends SyncableEntity {
  @Index()
  @Column({ type: 'integer' })
  property_id!: number;

  /** User who created the inspection on their device. */
  @Index()
  @Column({ type: 'varchar', length: 255, nullable: true })
  inspector_id!: string | null;

  /** Calendar date, YYYY-MM-DD. */
  @Index()
  @Column({ type: 'date' })
  date!: string;

  @Column({ type: 'integer', default: 0 })
  active_time_seconds!: number;

  @Index()
  @Column({ type: 'varchar', length: 20, default: 'draft' })
  status!: InspectionStatus;

  @Column({ type: 'varchar', length: 2000, nullable: true })
  notes!: string | null;
}
