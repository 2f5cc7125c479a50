import { ethers } from 'ethers';
import { RegistryError } from './registry-errors';

/**
 * An account address in checksummed form.
 */
export type Principal = string;

export const NULL_PRINCIPAL: Principal = ethers.constants.AddressZero;

/**
 * Normalize an address, or return null when it is malformed or the zero address.
 */
export function tryPrincipal(value: string): Principal | null {
  if (!ethers.utils.isAddress(value)) {
    return null;
  }
  const address = ethers.utils.getAddress(value);
  return address === NULL_PRINCIPAL ? null : address;
}

/**
 * Normalize an address supplied to a mutating operation.
 * @throws RegistryError InvalidInput
 */
export function toPrincipal(value: string, field = 'principal'): Principal {
  const principal = tryPrincipal(value);
  if (!principal) {
    throw RegistryError.invalidInput(`${field} must be a non-zero account address, got "${value}"`);
  }
  return principal;
}

export function shortPrincipal(principal: Principal): string {
  return `${principal.substring(0, 10)}...`;
}
