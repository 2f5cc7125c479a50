export * from './registry-state.entity';
export * from './authorized-verifier.entity';
export * from './identity.entity';
export * from './identity-verifier.entity';
export * from './identity-attribute.entity';
export * from './credential.entity';
export * from './audit-event.entity';
