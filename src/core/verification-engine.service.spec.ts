import {
  ADMIN,
  OTHER_USER,
  OUTSIDER,
  RegistryHarness,
  START_TIME,
  USER,
  VERIFIER,
  createRegistry,
} from '../../test/registry-harness';

describe('VerificationEngineService', () => {
  let registry: RegistryHarness;

  beforeEach(async () => {
    registry = await createRegistry();
    await registry.roles.authorizeVerifier(ADMIN, VERIFIER);
    await registry.identities.createIdentity(USER, 'Alice', 'alice@example.com');
    await registry.identities.createIdentity(OTHER_USER, 'Bob', 'bob@example.com');
    await registry.credentials.issueCredential(VERIFIER, USER, 'education', 'ipfs://hash1', 3600);
  });

  afterEach(async () => {
    await registry.close();
  });

  describe('general mode', () => {
    it('marks the identity verified and records the verifier', async () => {
      const outcome = await registry.verification.verifyIdentity(VERIFIER, USER);

      expect(outcome).toEqual({
        mode: 'identity',
        verified: true,
        subject: USER,
        verifier: VERIFIER,
        verifiedAt: START_TIME,
      });
      expect(await registry.identities.getIdentity(USER)).toMatchObject({
        isVerified: true,
        verifiers: [VERIFIER],
      });

      const events = await registry.auditLog.listEvents({ after: 4 });
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        type: 'identity.verified',
        data: { subject: USER, verifier: VERIFIER },
      });
    });

    it('treats credential id 0 as general verification', async () => {
      const outcome = await registry.verification.verifyIdentity(VERIFIER, USER, 0);
      expect(outcome.mode).toBe('identity');
    });

    it('accumulates verifiers on repeated verification', async () => {
      await registry.verification.verifyIdentity(VERIFIER, USER);
      await registry.verification.verifyIdentity(VERIFIER, USER);
      registry.clock.advance(10);
      await registry.verification.verifyIdentity(ADMIN, USER);

      expect(await registry.identities.getIdentity(USER)).toMatchObject({
        isVerified: true,
        verifiers: [VERIFIER, ADMIN],
      });
      expect(await registry.auditLog.listEvents({ after: 4 })).toHaveLength(3);
    });

    it('leaves other identities untouched', async () => {
      await registry.verification.verifyIdentity(VERIFIER, USER);
      expect(await registry.identities.getIdentity(OTHER_USER)).toMatchObject({
        isVerified: false,
        verifiers: [],
      });
    });
  });

  describe('credential mode', () => {
    it('confirms a valid credential without changing state', async () => {
      const outcome = await registry.verification.verifyIdentity(VERIFIER, USER, 1);

      expect(outcome).toEqual({
        mode: 'credential',
        verified: true,
        subject: USER,
        verifier: VERIFIER,
        credentialId: 1,
        expiresAt: START_TIME + 3600,
        checkedAt: START_TIME,
      });
      expect(await registry.identities.getIdentity(USER)).toMatchObject({
        isVerified: false,
        verifiers: [],
      });
      expect(await registry.auditLog.countEvents()).toBe(4);
    });

    it('accepts the expiry second and rejects the one after', async () => {
      registry.clock.set(START_TIME + 3600);
      await expect(registry.verification.verifyIdentity(VERIFIER, USER, 1)).resolves.toMatchObject({
        verified: true,
      });

      registry.clock.set(START_TIME + 3601);
      await expect(registry.verification.verifyIdentity(VERIFIER, USER, 1)).rejects.toMatchObject({
        code: 'Expired',
      });
    });

    it('rejects revoked credentials as Invalid, before expiry is considered', async () => {
      await registry.credentials.revokeCredential(VERIFIER, 1);
      await expect(registry.verification.verifyIdentity(ADMIN, USER, 1)).rejects.toMatchObject({
        code: 'Invalid',
      });

      registry.clock.advance(7200);
      await expect(registry.verification.verifyIdentity(ADMIN, USER, 1)).rejects.toMatchObject({
        code: 'Invalid',
      });
    });

    it('rejects a credential presented for another subject', async () => {
      await expect(
        registry.verification.verifyIdentity(VERIFIER, OTHER_USER, 1),
      ).rejects.toMatchObject({ code: 'Mismatch' });
    });

    it('rejects unknown credentials', async () => {
      await expect(registry.verification.verifyIdentity(VERIFIER, USER, 42)).rejects.toMatchObject({
        code: 'NotFound',
      });
    });
  });

  describe('authorization', () => {
    it('rejects callers that are not verifiers without side effects', async () => {
      await expect(registry.verification.verifyIdentity(OUTSIDER, USER)).rejects.toMatchObject({
        code: 'Unauthorized',
      });
      await expect(registry.verification.verifyIdentity(USER, USER, 1)).rejects.toMatchObject({
        code: 'Unauthorized',
      });

      expect(await registry.identities.getIdentity(USER)).toMatchObject({ isVerified: false });
      expect(await registry.auditLog.countEvents()).toBe(4);
    });

    it('checks authorization before the subject', async () => {
      await expect(registry.verification.verifyIdentity(OUTSIDER, OUTSIDER)).rejects.toMatchObject({
        code: 'Unauthorized',
      });
    });

    it('requires the subject to have an identity', async () => {
      await expect(registry.verification.verifyIdentity(VERIFIER, OUTSIDER)).rejects.toMatchObject({
        code: 'NotFound',
      });
    });
  });
});
