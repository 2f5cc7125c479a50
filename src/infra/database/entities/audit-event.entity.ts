import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * Append-only audit log. Rows are only ever inserted.
 */
@Entity('audit_events')
export class AuditEventEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'text' })
  @Index()
  type!: string;

  @Column({ type: 'simple-json' })
  data!: Record<string, string | number>;

  @Column({ type: 'integer' })
  timestamp!: number; // transaction timestamp, unix seconds

  @CreateDateColumn({ type: 'datetime' })
  recordedAt!: Date;
}
