import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/**
 * One row per (identity, verifier) pair that performed a general verification
 */
@Entity('identity_verifiers')
export class IdentityVerifierEntity {
  @PrimaryColumn({ type: 'text' })
  @Index()
  owner!: string;

  @PrimaryColumn({ type: 'text' })
  verifier!: string;

  @Column({ type: 'integer' })
  firstVerifiedAt!: number;
}
