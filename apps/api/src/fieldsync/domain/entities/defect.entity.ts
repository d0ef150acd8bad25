import { Column, Entity, Index } from 'typeorm';

import { SyncableEntity } from './syncable.entity';

export const DEFECT_SEVERITY_VALUES = ['low', 'medium', 'high'] as const;
export type DefectSeverity = (typeof DEFECT_SEVERITY_VALUES)[number];

@Entity({ name: 'defects' })
export class Defect extends SyncableEntity {
  @Index()
  @Column({ type: 'integer' })
  apartment_id!: number;

  /** Index into the parent apartment's rooms (0-based). */
  @Column({ type: 'integer' })
  room_index!: number;

  /** Standard defect code, e.g. "VF01". */
  @Column({ type: 'varchar', length: 30, nullable: true })
  code!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  title!: string | null;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'text', nullable: true })
  remedy!: string | null;

  @Column({ type: 'varchar', length: 10, default: 'medium' })
  severity!: DefectSeverity;
}
