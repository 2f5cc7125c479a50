import { DynamicModule, Module } from '@nestjs/common';
import { AuditLogService } from './audit-log.service';
import { CLOCK, SystemClock } from './clock';
import { CredentialStoreService } from './credential-store.service';
import { EventProcessorService } from './event-processor.service';
import { IdentityStoreService } from './identity-store.service';
import { LedgerService } from './ledger.service';
import { REGISTRY_OPTIONS, RegistryOptions, RoleRegistryService } from './role-registry.service';
import { VerificationEngineService } from './verification-engine.service';

const services = [
  LedgerService,
  AuditLogService,
  RoleRegistryService,
  IdentityStoreService,
  CredentialStoreService,
  VerificationEngineService,
  EventProcessorService,
];

/**
 * Core module containing the registry state machine
 * Global so adapters can inject the services without explicit imports
 * Expects DatabaseModule, MessagingModule and EventEmitterModule to be registered
 */
@Module({})
export class CoreModule {
  static register(options: RegistryOptions): DynamicModule {
    return {
      module: CoreModule,
      global: true,
      providers: [
        ...services,
        { provide: CLOCK, useClass: SystemClock },
        { provide: REGISTRY_OPTIONS, useValue: options },
      ],
      exports: [...services, CLOCK],
    };
  }
}
