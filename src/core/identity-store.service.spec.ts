import { ethers } from 'ethers';
import {
  OTHER_USER,
  RegistryHarness,
  START_TIME,
  USER,
  createRegistry,
} from '../../test/registry-harness';

describe('IdentityStoreService', () => {
  let registry: RegistryHarness;

  beforeEach(async () => {
    registry = await createRegistry();
  });

  afterEach(async () => {
    await registry.close();
  });

  it('creates an unverified identity for the caller', async () => {
    const expected = {
      owner: USER,
      name: 'Alice',
      email: 'alice@example.com',
      createdAt: START_TIME,
      isVerified: false,
      attributes: {},
      verifiers: [],
    };

    expect(await registry.identities.createIdentity(USER, 'Alice', 'alice@example.com')).toEqual(
      expected,
    );
    expect(await registry.identities.getIdentity(USER)).toEqual(expected);

    const events = await registry.auditLog.listEvents();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'identity.created',
      data: { owner: USER, name: 'Alice' },
      timestamp: START_TIME,
    });
  });

  it('stamps identities with the transaction time', async () => {
    await registry.identities.createIdentity(USER, 'Alice', 'alice@example.com');
    registry.clock.advance(50);
    await registry.identities.createIdentity(OTHER_USER, 'Bob', 'bob@example.com');

    expect(await registry.identities.getIdentity(OTHER_USER)).toMatchObject({
      createdAt: START_TIME + 50,
    });
  });

  it('allows only one identity per principal', async () => {
    await registry.identities.createIdentity(USER, 'Alice', 'alice@example.com');

    await expect(
      registry.identities.createIdentity(USER, 'Mallory', 'mallory@example.com'),
    ).rejects.toMatchObject({ code: 'AlreadyExists' });
    await expect(registry.identities.createIdentity(USER, '', '')).rejects.toMatchObject({
      code: 'AlreadyExists',
    });

    expect(await registry.identities.getIdentity(USER)).toMatchObject({
      name: 'Alice',
      email: 'alice@example.com',
    });
    expect(await registry.auditLog.countEvents()).toBe(1);
  });

  it('rejects empty name or email without storing anything', async () => {
    await expect(registry.identities.createIdentity(USER, '', 'a@example.com')).rejects.toMatchObject({
      code: 'InvalidInput',
    });
    await expect(registry.identities.createIdentity(USER, 'Alice', '')).rejects.toMatchObject({
      code: 'InvalidInput',
    });

    expect(await registry.identities.getIdentity(USER)).toBeNull();
    expect(await registry.auditLog.countEvents()).toBe(0);
  });

  it('returns null for unknown or malformed principals', async () => {
    expect(await registry.identities.getIdentity(OTHER_USER)).toBeNull();
    expect(await registry.identities.getIdentity('not-an-address')).toBeNull();
  });

  it('keys identities by checksummed address', async () => {
    const lower = '0xabcdef0000000000000000000000000000000001';
    const checksummed = ethers.utils.getAddress(lower);

    await registry.identities.createIdentity(lower, 'Carol', 'carol@example.com');

    expect(await registry.identities.getIdentity(checksummed)).toMatchObject({ owner: checksummed });
    await expect(
      registry.identities.createIdentity(checksummed, 'Carol', 'carol@example.com'),
    ).rejects.toMatchObject({ code: 'AlreadyExists' });
  });

  it('counts identities', async () => {
    await registry.identities.createIdentity(USER, 'Alice', 'alice@example.com');
    await registry.identities.createIdentity(OTHER_USER, 'Bob', 'bob@example.com');

    expect(await registry.identities.getStats()).toEqual({ total: 2, verified: 0 });
  });
});
