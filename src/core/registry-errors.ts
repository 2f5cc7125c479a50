/**
 * Failure reasons of registry operations.
 * A thrown RegistryError always rolls back the transaction it was raised in.
 */
export type RegistryErrorCode =
  | 'Unauthorized'
  | 'AlreadyExists'
  | 'NotFound'
  | 'InvalidInput'
  | 'Mismatch'
  | 'Invalid'
  | 'Expired'
  | 'NotInitialized';

export class RegistryError extends Error {
  constructor(
    readonly code: RegistryErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RegistryError';
  }

  static unauthorized(message: string): RegistryError {
    return new RegistryError('Unauthorized', message);
  }

  static alreadyExists(message: string): RegistryError {
    return new RegistryError('AlreadyExists', message);
  }

  static notFound(message: string): RegistryError {
    return new RegistryError('NotFound', message);
  }

  static invalidInput(message: string): RegistryError {
    return new RegistryError('InvalidInput', message);
  }

  static mismatch(message: string): RegistryError {
    return new RegistryError('Mismatch', message);
  }

  static invalid(message: string): RegistryError {
    return new RegistryError('Invalid', message);
  }

  static expired(message: string): RegistryError {
    return new RegistryError('Expired', message);
  }

  static notInitialized(): RegistryError {
    return new RegistryError('NotInitialized', 'Registry has not been initialized');
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
