import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import {
  AuditEventEntity,
  AuthorizedVerifierEntity,
  CredentialEntity,
  IdentityAttributeEntity,
  IdentityEntity,
  IdentityVerifierEntity,
  RegistryStateEntity,
} from './entities';
import { RegistryStateRepository } from './registry-state.repository';
import { AuthorizedVerifierRepository } from './authorized-verifier.repository';
import { IdentityRepository } from './identity.repository';
import { CredentialRepository } from './credential.repository';
import { AuditEventRepository } from './audit-event.repository';

export interface DatabaseModuleOptions {
  /** sqlite file path, or ':memory:' */
  database: string;
  logging?: boolean;
}

export const REGISTRY_ENTITIES = [
  RegistryStateEntity,
  AuthorizedVerifierEntity,
  IdentityEntity,
  IdentityVerifierEntity,
  IdentityAttributeEntity,
  CredentialEntity,
  AuditEventEntity,
];

const repositories = [
  RegistryStateRepository,
  AuthorizedVerifierRepository,
  IdentityRepository,
  CredentialRepository,
  AuditEventRepository,
];

@Module({})
export class DatabaseModule {
  static forRoot(options: DatabaseModuleOptions): DynamicModule {
    return {
      module: DatabaseModule,
      global: true,
      imports: [
        TypeOrmModule.forRoot({
          type: 'sqlite',
          database: options.database,
          entities: REGISTRY_ENTITIES,
          synchronize: true,
          logging: options.logging ?? false,
        }),
        TypeOrmModule.forFeature(REGISTRY_ENTITIES),
      ],
      providers: repositories,
      exports: repositories,
    };
  }
}
