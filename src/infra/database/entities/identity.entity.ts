import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('identities')
export class IdentityEntity {
  @PrimaryColumn({ type: 'text' })
  owner!: string;

  @Column({ type: 'text' })
  name!: string;

  @Column({ type: 'text' })
  email!: string;

  @Column({ type: 'integer' })
  createdAt!: number; // unix seconds

  @Column({ type: 'boolean', default: false })
  isVerified!: boolean;
}
