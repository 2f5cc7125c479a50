import { UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ethers } from 'ethers';
import { ManualClock, START_TIME } from '../../../../test/registry-harness';
import { RequireSignature } from '../decorators/require-signature.decorator';
import { SignedRequestGuard, buildSigningMessage } from './signed-request.guard';

class SampleController {
  @RequireSignature()
  signed() {
    return 'signed';
  }

  open() {
    return 'open';
  }
}

interface SampleRequest {
  method: string;
  originalUrl: string;
  headers: Record<string, string>;
  body: unknown;
  principal?: string;
}

const PATH = '/api/v1/identities';
const BODY = { name: 'Alice', email: 'alice@example.com' };

describe('SignedRequestGuard', () => {
  const wallet = new ethers.Wallet('0x' + '11'.repeat(32));
  const otherWallet = new ethers.Wallet('0x' + '22'.repeat(32));

  let clock: ManualClock;
  let guard: SignedRequestGuard;

  beforeEach(() => {
    clock = new ManualClock();
    guard = new SignedRequestGuard(new Reflector(), clock, { maxClockSkewSeconds: 300 });
  });

  async function signedRequest(
    overrides: { signer?: ethers.Wallet; principal?: string; timestamp?: number; body?: unknown } = {},
  ): Promise<SampleRequest> {
    const signer = overrides.signer ?? wallet;
    const timestamp = overrides.timestamp ?? START_TIME;
    const signature = await signer.signMessage(buildSigningMessage('POST', PATH, timestamp, BODY));
    return {
      method: 'POST',
      originalUrl: PATH,
      headers: {
        'x-principal': overrides.principal ?? wallet.address,
        'x-timestamp': String(timestamp),
        'x-signature': signature,
      },
      body: overrides.body ?? BODY,
    };
  }

  function contextFor(request: SampleRequest, handler: () => string = SampleController.prototype.signed) {
    return new ExecutionContextHost([request, {}, () => undefined], SampleController, handler);
  }

  it('authenticates a correctly signed request', async () => {
    const request = await signedRequest();

    expect(guard.canActivate(contextFor(request))).toBe(true);
    expect(request.principal).toBe(wallet.address);
  });

  it('accepts a lowercase principal and exposes it checksummed', async () => {
    const request = await signedRequest({ principal: wallet.address.toLowerCase() });

    expect(guard.canActivate(contextFor(request))).toBe(true);
    expect(request.principal).toBe(wallet.address);
  });

  it('accepts a signed request only once', async () => {
    const original = await signedRequest();
    const replay: SampleRequest = { ...original, headers: { ...original.headers } };

    expect(guard.canActivate(contextFor(original))).toBe(true);
    expect(() => guard.canActivate(contextFor(replay))).toThrow('Request has already been used');
    expect(replay.principal).toBeUndefined();
  });

  it('accepts the same body again under a new timestamp', async () => {
    const first = await signedRequest();
    clock.advance(1);
    const second = await signedRequest({ timestamp: START_TIME + 1 });

    expect(guard.canActivate(contextFor(first))).toBe(true);
    expect(guard.canActivate(contextFor(second))).toBe(true);
  });

  it('rejects a replay even after older entries are pruned', async () => {
    const early = await signedRequest({ timestamp: START_TIME - 300 });
    const request = await signedRequest();
    expect(guard.canActivate(contextFor(early))).toBe(true);
    expect(guard.canActivate(contextFor(request))).toBe(true);

    clock.advance(200);

    expect(() => guard.canActivate(contextFor({ ...request, headers: { ...request.headers } }))).toThrow(
      'Request has already been used',
    );
  });

  it('lets unmarked handlers through without headers', () => {
    const request: SampleRequest = { method: 'GET', originalUrl: PATH, headers: {}, body: {} };

    expect(guard.canActivate(contextFor(request, SampleController.prototype.open))).toBe(true);
    expect(request.principal).toBeUndefined();
  });

  it('rejects requests without signature headers', () => {
    const request: SampleRequest = { method: 'POST', originalUrl: PATH, headers: {}, body: BODY };

    expect(() => guard.canActivate(contextFor(request))).toThrow(UnauthorizedException);
  });

  it('rejects a signature made by another key', async () => {
    const request = await signedRequest({ signer: otherWallet });

    expect(() => guard.canActivate(contextFor(request))).toThrow(UnauthorizedException);
    expect(request.principal).toBeUndefined();
  });

  it('rejects a body that differs from the signed one', async () => {
    const request = await signedRequest({ body: { name: 'Mallory', email: 'alice@example.com' } });

    expect(() => guard.canActivate(contextFor(request))).toThrow(UnauthorizedException);
  });

  it('accepts timestamps within the allowed skew', async () => {
    const request = await signedRequest({ timestamp: START_TIME - 300 });

    expect(guard.canActivate(contextFor(request))).toBe(true);
  });

  it('rejects timestamps beyond the allowed skew', async () => {
    const request = await signedRequest({ timestamp: START_TIME + 301 });

    expect(() => guard.canActivate(contextFor(request))).toThrow(
      'Request timestamp is outside the accepted window',
    );
  });

  it('rejects malformed signatures', async () => {
    const request = await signedRequest();
    request.headers['x-signature'] = '0x1234';

    expect(() => guard.canActivate(contextFor(request))).toThrow(UnauthorizedException);
  });

  it('rejects an invalid principal header', async () => {
    const request = await signedRequest({ principal: 'not-an-address' });

    expect(() => guard.canActivate(contextFor(request))).toThrow(
      'Invalid x-principal: not-an-address',
    );
  });
});
