import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ethers } from 'ethers';
import { CLOCK, Clock } from '@core/clock';
import { errorMessage } from '@core/registry-errors';
import { AuthenticatedRequest } from '../authenticated-request';
import { REQUIRE_SIGNATURE_KEY } from '../decorators/require-signature.decorator';

export const REST_OPTIONS = Symbol('REST_OPTIONS');

export interface RestOptions {
  /** Accepted distance between x-timestamp and the server clock */
  maxClockSkewSeconds: number;
}

export const SIGNATURE_HEADERS = {
  PRINCIPAL: 'x-principal',
  TIMESTAMP: 'x-timestamp',
  SIGNATURE: 'x-signature',
} as const;

/**
 * Message a client signs (EIP-191 personal_sign) to act as a principal:
 * `<METHOD> <path>\n<timestamp>\n<keccak256 of the JSON body>`
 */
export function buildSigningMessage(
  method: string,
  path: string,
  timestamp: number,
  body: unknown,
): string {
  const bodyHash = ethers.utils.keccak256(ethers.utils.toUtf8Bytes(JSON.stringify(body ?? {})));
  return `${method.toUpperCase()} ${path}\n${timestamp}\n${bodyHash}`;
}

function readHeader(request: AuthenticatedRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Guard that authenticates the caller of endpoints marked with @RequireSignature
 * The recovered signer becomes `request.principal`
 *
 * A signed request is accepted once. Accepted requests are remembered until their
 * timestamp leaves the skew window, after which the window check rejects them anyway.
 */
@Injectable()
export class SignedRequestGuard implements CanActivate {
  private readonly logger = new Logger(SignedRequestGuard.name);
  // `<signer>\n<signed message>` -> request timestamp
  private readonly accepted = new Map<string, number>();

  constructor(
    private readonly reflector: Reflector,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(REST_OPTIONS) private readonly options: RestOptions,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.get<boolean | undefined>(
      REQUIRE_SIGNATURE_KEY,
      context.getHandler(),
    );

    if (!required) {
      // Read-only endpoint, no caller needed
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const principal = readHeader(request, SIGNATURE_HEADERS.PRINCIPAL);
    const timestampHeader = readHeader(request, SIGNATURE_HEADERS.TIMESTAMP);
    const signature = readHeader(request, SIGNATURE_HEADERS.SIGNATURE);

    if (!principal || !timestampHeader || !signature) {
      throw new UnauthorizedException(
        `Signed request headers required: ${Object.values(SIGNATURE_HEADERS).join(', ')}`,
      );
    }

    if (!ethers.utils.isAddress(principal)) {
      throw new UnauthorizedException(`Invalid ${SIGNATURE_HEADERS.PRINCIPAL}: ${principal}`);
    }

    const timestamp = Number(timestampHeader);
    if (!Number.isSafeInteger(timestamp)) {
      throw new UnauthorizedException(`Invalid ${SIGNATURE_HEADERS.TIMESTAMP}: ${timestampHeader}`);
    }
    const now = this.clock.now();
    if (Math.abs(now - timestamp) > this.options.maxClockSkewSeconds) {
      throw new UnauthorizedException('Request timestamp is outside the accepted window');
    }

    const message = buildSigningMessage(
      request.method,
      request.originalUrl,
      timestamp,
      request.body,
    );

    let signer: string;
    try {
      signer = ethers.utils.verifyMessage(message, signature);
    } catch (error) {
      throw new UnauthorizedException(`Malformed signature: ${errorMessage(error)}`);
    }

    if (signer !== ethers.utils.getAddress(principal)) {
      this.logger.warn(`Signature mismatch: claimed ${principal}, recovered ${signer}`);
      throw new UnauthorizedException(`Signature does not match ${SIGNATURE_HEADERS.PRINCIPAL}`);
    }

    this.prune(now);
    const key = `${signer}\n${message}`;
    if (this.accepted.has(key)) {
      this.logger.warn(`Replayed request from ${signer}: ${request.method} ${request.originalUrl}`);
      throw new UnauthorizedException('Request has already been used');
    }
    this.accepted.set(key, timestamp);

    request.principal = signer;
    return true;
  }

  private prune(now: number) {
    for (const [key, timestamp] of this.accepted) {
      if (now - timestamp > this.options.maxClockSkewSeconds) {
        this.accepted.delete(key);
      }
    }
  }
}
