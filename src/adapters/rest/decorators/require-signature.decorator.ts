import { SetMetadata } from '@nestjs/common';

export const REQUIRE_SIGNATURE_KEY = 'requireSignature';

/**
 * Marks an endpoint as acting on behalf of a principal
 * Used with SignedRequestGuard, which authenticates the caller from the request signature
 *
 * @example
 * @RequireSignature()
 * @Post()
 * async createIdentity(@Caller() caller: string) { ... }
 */
export const RequireSignature = () => SetMetadata(REQUIRE_SIGNATURE_KEY, true);
