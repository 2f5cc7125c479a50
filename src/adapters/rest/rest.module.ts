import { DynamicModule, Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { AuditController } from './controllers/audit.controller';
import { CredentialController } from './controllers/credential.controller';
import { HealthController } from './controllers/health.controller';
import { IdentityController } from './controllers/identity.controller';
import { VerifierController } from './controllers/verifier.controller';
import { RegistryExceptionFilter } from './filters/registry-exception.filter';
import { REST_OPTIONS, RestOptions, SignedRequestGuard } from './guards/signed-request.guard';

/**
 * Global request validation: DTO classes only, unknown properties rejected
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  });
}

@Module({})
export class RestModule {
  static register(options: RestOptions): DynamicModule {
    return {
      module: RestModule,
      controllers: [
        IdentityController,
        VerifierController,
        CredentialController,
        AuditController,
        HealthController,
      ],
      providers: [
        { provide: REST_OPTIONS, useValue: options },
        { provide: APP_GUARD, useClass: SignedRequestGuard },
        { provide: APP_FILTER, useClass: RegistryExceptionFilter },
      ],
    };
  }
}
