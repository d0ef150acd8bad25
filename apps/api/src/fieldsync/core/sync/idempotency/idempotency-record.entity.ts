import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * Cached response of one /sync/push batch, keyed by the client's
 * X-Idempotency-Key. The unique index on idempotency_key is what makes two
 * simultaneous retries of the same batch collapse into one.
 */
@Entity({ name: 'sync_idempotency_records' })
@Index('idx_sync_idempotency_device_user', ['device_id', 'user_id'])
export class IdempotencyRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 255 })
  idempotency_key!: string;

  @Column({ type: 'varchar', length: 255 })
  device_id!: string;

  @Column({ type: 'varchar', length: 255 })
  user_id!: string;

  @Column({ type: 'integer', default: 0 })
  op_count!: number;

  /** Exact JSON body returned to the client. */
  @Column({ type: 'text' })
  response_body!: string;

  @Column({ type: 'integer', default: 200 })
  status_code!: number;

  @CreateDateColumn()
  created_at!: Date;

  @Index()
  @Column()
  expires_at!: Date;
}
