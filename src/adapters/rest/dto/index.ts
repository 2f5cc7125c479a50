export * from './identity.dto';
export * from './credential.dto';
export * from './verifier.dto';
export * from './audit.dto';
