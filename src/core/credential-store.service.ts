import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { CredentialEntity, CredentialRepository, RegistryStateRepository } from '@infra/database';
import { Credential, CredentialFilter } from './entities/credential.entity';
import { IdentityStoreService } from './identity-store.service';
import { LedgerService } from './ledger.service';
import { shortPrincipal, tryPrincipal } from './principal';
import { RegistryError } from './registry-errors';
import { RoleRegistryService } from './role-registry.service';

function toCredential(entity: CredentialEntity): Credential {
  return {
    id: entity.id,
    issuer: entity.issuer,
    subject: entity.subject,
    credentialType: entity.credentialType,
    data: entity.data,
    issuedAt: entity.issuedAt,
    expiresAt: entity.expiresAt,
    isValid: entity.isValid,
  };
}

function isCredentialId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

/**
 * Issues, revokes and serves credentials numbered from 1 upwards
 */
@Injectable()
export class CredentialStoreService {
  private readonly logger = new Logger(CredentialStoreService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly credentialRepository: CredentialRepository,
    private readonly stateRepository: RegistryStateRepository,
    private readonly roleRegistry: RoleRegistryService,
    private readonly identityStore: IdentityStoreService,
  ) {}

  /**
   * Issue a credential about `subject`, valid until `now + expiresInSeconds` inclusive.
   * A zero duration is accepted and expires the credential after the current second.
   */
  async issueCredential(
    caller: string,
    subject: string,
    credentialType: string,
    data: string,
    expiresInSeconds: number,
  ): Promise<Credential> {
    const credential = await this.ledger.execute(async (tx) => {
      const issuer = await this.roleRegistry.assertAuthorizedVerifier(caller, tx.manager);
      const owner = await this.identityStore.requireIdentity(subject, tx.manager);

      if (!credentialType || !data) {
        throw RegistryError.invalidInput('Credential type and data must not be empty');
      }
      const expiresAt = tx.timestamp + expiresInSeconds;
      if (
        !Number.isSafeInteger(expiresInSeconds) ||
        expiresInSeconds < 0 ||
        !Number.isSafeInteger(expiresAt)
      ) {
        throw RegistryError.invalidInput(
          `Expiration must be a non-negative whole number of seconds, got ${expiresInSeconds}`,
        );
      }

      const id = await this.stateRepository.nextCredentialId(tx.manager);
      const entity = await this.credentialRepository.insert(
        {
          id,
          issuer,
          subject: owner,
          credentialType,
          data,
          issuedAt: tx.timestamp,
          expiresAt,
        },
        tx.manager,
      );
      tx.record({
        type: 'credential.issued',
        data: { credentialId: id, issuer, subject: owner, credentialType },
      });
      return toCredential(entity);
    });

    this.logger.log(
      `📜 Credential #${credential.id} (${credential.credentialType}) issued to ${shortPrincipal(credential.subject)}`,
    );
    return credential;
  }

  /**
   * Invalidate a credential. Issuer only; repeating the call succeeds.
   */
  async revokeCredential(caller: string, credentialId: number): Promise<Credential> {
    const credential = await this.ledger.execute(async (tx) => {
      const entity = isCredentialId(credentialId)
        ? await this.credentialRepository.findById(credentialId, tx.manager)
        : null;
      if (!entity) {
        throw RegistryError.notFound(`Credential ${credentialId} does not exist`);
      }
      if (tryPrincipal(caller) !== entity.issuer) {
        throw RegistryError.unauthorized(`Only the issuer can revoke credential ${credentialId}`);
      }

      await this.credentialRepository.markRevoked(entity, tx.timestamp, tx.manager);
      tx.record({
        type: 'credential.revoked',
        data: { credentialId: entity.id, revokedBy: entity.issuer },
      });
      return { ...toCredential(entity), isValid: false };
    });

    this.logger.log(`🚫 Credential #${credential.id} revoked`);
    return credential;
  }

  /**
   * @returns the credential, or null for an unknown id
   */
  async getCredential(credentialId: number): Promise<Credential | null> {
    if (!isCredentialId(credentialId)) {
      return null;
    }
    const entity = await this.ledger.read(() => this.credentialRepository.findById(credentialId));
    return entity ? toCredential(entity) : null;
  }

  /**
   * Lookup for use inside a running transaction
   */
  async findCredential(credentialId: number, manager: EntityManager): Promise<Credential | null> {
    if (!isCredentialId(credentialId)) {
      return null;
    }
    const entity = await this.credentialRepository.findById(credentialId, manager);
    return entity ? toCredential(entity) : null;
  }

  /**
   * Number of credentials ever issued, which is also the highest id
   */
  async getTotalCredentials(): Promise<number> {
    const state = await this.ledger.read(() => this.stateRepository.findState());
    return state ? state.credentialCount : 0;
  }

  async listCredentials(filter: { subject?: string; issuer?: string } = {}): Promise<Credential[]> {
    const normalized: CredentialFilter = {};
    for (const key of ['subject', 'issuer'] as const) {
      const value = filter[key];
      if (value === undefined) {
        continue;
      }
      const principal = tryPrincipal(value);
      if (!principal) {
        return [];
      }
      normalized[key] = principal;
    }

    const rows = await this.ledger.read(() => this.credentialRepository.find(normalized));
    return rows.map(toCredential);
  }
}
