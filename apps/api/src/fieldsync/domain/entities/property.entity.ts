import { Column, Entity, Index } from 'typeorm';

import { SyncableEntity } from './syncable.entity';

/**
 * A building or site where inspections take place.
 */
@Entity({ name: 'properties' })
export class Property extends SyncableEntity {
  /** flerbostadshus, villa, kontor, ... */
  @Column({ type: 'varchar', length: 100 })
  property_type!: string;

  /** Cadastral designation. */
  @Index()
  @Column({ type: 'varchar', length: 255 })
  designation!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  owner!: string | null;

  @Column({ type: 'varchar', length: 500 })
  address!: string;

  @Column({ type: 'varchar', length: 20, nullable: true })
  postal_code!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  city!: string | null;

  @Column({ type: 'integer', nullable: true })
  num_apartments!: number | null;

  @Column({ type: 'integer', nullable: true })
  num_premises!: number | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;
}
