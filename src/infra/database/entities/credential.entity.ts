import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('credentials')
export class CredentialEntity {
  @PrimaryColumn({ type: 'integer' })
  id!: number; // assigned from the registry counter, never generated

  @Column({ type: 'text' })
  @Index()
  issuer!: string;

  @Column({ type: 'text' })
  @Index()
  subject!: string;

  @Column({ type: 'text' })
  credentialType!: string;

  @Column({ type: 'text' })
  data!: string; // opaque off-ledger reference

  @Column({ type: 'integer' })
  issuedAt!: number;

  @Column({ type: 'integer' })
  expiresAt!: number;

  @Column({ type: 'boolean', default: true })
  isValid!: boolean;

  @Column({ type: 'integer', nullable: true })
  revokedAt!: number | null;
}
