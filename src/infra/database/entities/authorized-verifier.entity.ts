import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';

@Entity('authorized_verifiers')
export class AuthorizedVerifierEntity {
  @PrimaryColumn({ type: 'text' })
  address!: string;

  @Column({ type: 'text' })
  authorizedBy!: string;

  @Column({ type: 'integer' })
  authorizedAt!: number; // unix seconds

  @CreateDateColumn({ type: 'datetime' })
  recordedAt!: Date;
}
