import { Column, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm';

/**
 * Registry state - admin and the credential issuance counter
 * Singleton entity (always id=1), created once at initialization
 */
@Entity('registry_state')
export class RegistryStateEntity {
  @PrimaryColumn({ type: 'integer' })
  id: number = 1;

  @Column({ type: 'text' })
  admin!: string;

  @Column({ type: 'integer', default: 0 })
  credentialCount!: number; // last issued credential id

  @Column({ type: 'integer' })
  initializedAt!: number; // unix seconds

  @UpdateDateColumn({ type: 'datetime' })
  updatedAt!: Date;
}
