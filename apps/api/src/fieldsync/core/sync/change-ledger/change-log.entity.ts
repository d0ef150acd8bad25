import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

import type { SyncAction, SyncSnapshot } from '../sync.types';

/**
 * Append-only record of one entity mutation.
 *
 * The auto-increment id is the pull cursor. Rows are written once by the push
 * path and never updated; old rows are purged by an external retention job.
 */
@Entity({ name: 'change_log' })
@Index('idx_change_log_entity', ['entity_type', 'server_id'])
export class ChangeLogEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  entity_type!: string;

  @Column({ type: 'integer' })
  server_id!: number;

  @Column({ type: 'varchar', length: 20 })
  action!: SyncAction;

  /** Entity revision after this change. */
  @Column({ type: 'integer' })
  revision!: number;

  /** Full entity snapshot; null for deletes. */
  @Column({ type: 'simple-json', nullable: true })
  payload!: SyncSnapshot | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  changed_by_user_id!: string | null;

  @Index()
  @CreateDateColumn()
  created_at!: Date;
}
