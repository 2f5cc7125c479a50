export * from './entities';
export * from './database.module';
export * from './registry-state.repository';
export * from './authorized-verifier.repository';
export * from './identity.repository';
export * from './credential.repository';
export * from './audit-event.repository';
