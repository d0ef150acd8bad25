import { Column, Entity, Index } from 'typeorm';

import { SyncableEntity } from './syncable.entity';

export interface ApartmentRoom {
  index: number;
  type: string;
}

@Entity({ name: 'apartments' })
export class Apartment extends SyncableEntity {
  @Index()
  @Column({ type: 'integer' })
  inspection_id!: number;

  /** e.g. "1201", "A12", "12B" */
  @Index()
  @Column({ type: 'varchar', length: 20 })
  apartment_number!: string;

  @Column({ type: 'simple-json' })
  rooms!: ApartmentRoom[];

  @Column({ type: 'varchar', length: 1000, nullable: true })
  notes!: string | null;
}
