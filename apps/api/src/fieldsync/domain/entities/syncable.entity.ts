import {
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

/**
 * Columns shared by every entity that mobile clients can create, update and
 * delete through /sync/push.
 *
 * - client_id: UUID minted on the device before the server id is known.
 * - revision:  starts at 1, incremented by every successful mutation; the
 *              optimistic-concurrency token compared against base_revision.
 * - deleted_at: soft-delete marker; rows are never physically removed by sync.
 */
export abstract class SyncableEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 64, nullable: true })
  client_id!: string | null;

  @Column({ type: 'integer', default: 1 })
  revision!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  created_by_user_id!: string | null;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;

  @DeleteDateColumn({ nullable: true })
  deleted_at!: Date | null;
}
