import { Column, Entity, PrimaryColumn } from 'typeorm';

@Entity('identity_attributes')
export class IdentityAttributeEntity {
  @PrimaryColumn({ type: 'text' })
  owner!: string;

  @PrimaryColumn({ type: 'text' })
  name!: string;

  @Column({ type: 'text' })
  value!: string;
}
