import { Principal } from '../principal';

/**
 * Core entity representing an issued credential.
 * `data` is an opaque reference to off-ledger content and is never dereferenced.
 */
export interface Credential {
  id: number;
  issuer: Principal;
  subject: Principal;
  credentialType: string;
  data: string;
  issuedAt: number;
  expiresAt: number;
  isValid: boolean;
}

export interface CredentialFilter {
  subject?: Principal;
  issuer?: Principal;
}

export function isExpired(credential: Credential, now: number): boolean {
  return now > credential.expiresAt;
}

/**
 * A credential is usable while it is unrevoked and `now` has not passed `expiresAt`.
 */
export function isUsable(credential: Credential, now: number): boolean {
  return credential.isValid && !isExpired(credential, now);
}
