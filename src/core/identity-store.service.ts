import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { IdentityRepository } from '@infra/database';
import { Identity } from './entities/identity.entity';
import { LedgerService } from './ledger.service';
import { Principal, shortPrincipal, toPrincipal, tryPrincipal } from './principal';
import { RegistryError } from './registry-errors';

/**
 * Maps each principal to at most one identity
 */
@Injectable()
export class IdentityStoreService {
  private readonly logger = new Logger(IdentityStoreService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly identityRepository: IdentityRepository,
  ) {}

  /**
   * Register the caller's identity. Name and email cannot be changed afterwards.
   */
  async createIdentity(caller: string, name: string, email: string): Promise<Identity> {
    const owner = toPrincipal(caller, 'caller');

    const entity = await this.ledger.execute(async (tx) => {
      if (await this.identityRepository.exists(owner, tx.manager)) {
        throw RegistryError.alreadyExists(`Identity already exists for ${owner}`);
      }
      if (!name || !email) {
        throw RegistryError.invalidInput('Name and email must not be empty');
      }

      const created = await this.identityRepository.insert(
        { owner, name, email, createdAt: tx.timestamp },
        tx.manager,
      );
      tx.record({ type: 'identity.created', data: { owner, name } });
      return created;
    });

    this.logger.log(`🆔 Identity created for ${shortPrincipal(owner)}`);

    return {
      owner: entity.owner,
      name: entity.name,
      email: entity.email,
      createdAt: entity.createdAt,
      isVerified: false,
      attributes: {},
      verifiers: [],
    };
  }

  /**
   * @returns the identity, or null when none is registered
   */
  async getIdentity(principal: string): Promise<Identity | null> {
    const owner = tryPrincipal(principal);
    if (!owner) {
      return null;
    }
    return this.ledger.read(() => this.load(owner));
  }

  /**
   * Existence check for use inside a running transaction
   * @throws RegistryError NotFound
   */
  async requireIdentity(principal: string, manager: EntityManager): Promise<Principal> {
    const owner = tryPrincipal(principal);
    if (!owner || !(await this.identityRepository.exists(owner, manager))) {
      throw RegistryError.notFound(`No identity registered for ${principal}`);
    }
    return owner;
  }

  /**
   * Mark an identity verified and remember the verifier. Never unsets the flag.
   */
  async recordVerification(
    owner: Principal,
    verifier: Principal,
    verifiedAt: number,
    manager: EntityManager,
  ): Promise<void> {
    await this.identityRepository.markVerified(owner, manager);
    await this.identityRepository.addVerifier(owner, verifier, verifiedAt, manager);
  }

  async getStats() {
    return this.ledger.read(async () => ({
      total: await this.identityRepository.countAll(),
      verified: await this.identityRepository.countVerified(),
    }));
  }

  private async load(owner: Principal): Promise<Identity | null> {
    const entity = await this.identityRepository.findByOwner(owner);
    if (!entity) {
      return null;
    }

    const verifiers = await this.identityRepository.findVerifiers(owner);
    const attributes = await this.identityRepository.findAttributes(owner);

    return {
      owner: entity.owner,
      name: entity.name,
      email: entity.email,
      createdAt: entity.createdAt,
      isVerified: entity.isVerified,
      attributes,
      verifiers,
    };
  }
}
