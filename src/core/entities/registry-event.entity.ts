import { Principal } from '../principal';

/**
 * Payload of each audit event type
 */
export type RegistryEventPayloads = {
  'identity.created': { owner: Principal; name: string };
  'identity.verified': { subject: Principal; verifier: Principal };
  'credential.issued': {
    credentialId: number;
    issuer: Principal;
    subject: Principal;
    credentialType: string;
  };
  'credential.revoked': { credentialId: number; revokedBy: Principal };
  'verifier.authorized': { verifier: Principal; authorizedBy: Principal };
};

export type RegistryEventType = keyof RegistryEventPayloads;

export const REGISTRY_EVENT_TYPES: readonly RegistryEventType[] = [
  'identity.created',
  'identity.verified',
  'credential.issued',
  'credential.revoked',
  'verifier.authorized',
];

/**
 * An event recorded by an operation before it commits
 */
export type RegistryEventInput = {
  [K in RegistryEventType]: { type: K; data: RegistryEventPayloads[K] };
}[RegistryEventType];

/**
 * A committed event, numbered and stamped with its transaction timestamp
 */
export type RegistryEvent = RegistryEventInput & {
  id: number;
  timestamp: number;
};

/**
 * Event bus names, dispatched after commit
 */
export const REGISTRY_EVENTS = {
  ALL: 'registry.**',
  prefix: 'registry',
} as const;

export function registryEventName(type: RegistryEventType): string {
  return `${REGISTRY_EVENTS.prefix}.${type}`;
}
