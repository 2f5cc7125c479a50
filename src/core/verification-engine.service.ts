import { Injectable, Logger } from '@nestjs/common';
import { isExpired } from './entities/credential.entity';
import { CredentialStoreService } from './credential-store.service';
import { IdentityStoreService } from './identity-store.service';
import { LedgerService } from './ledger.service';
import { Principal, shortPrincipal } from './principal';
import { RegistryError } from './registry-errors';
import { RoleRegistryService } from './role-registry.service';

/** Credential id that selects general identity verification */
export const GENERAL_VERIFICATION = 0;

export type VerificationOutcome =
  | {
      mode: 'identity';
      verified: true;
      subject: Principal;
      verifier: Principal;
      verifiedAt: number;
    }
  | {
      mode: 'credential';
      verified: true;
      subject: Principal;
      verifier: Principal;
      credentialId: number;
      expiresAt: number;
      checkedAt: number;
    };

/**
 * Answers whether an identity or one of its credentials is currently valid.
 *
 * General mode escalates trust in the identity and is recorded permanently.
 * Credential mode only checks the credential and changes nothing.
 */
@Injectable()
export class VerificationEngineService {
  private readonly logger = new Logger(VerificationEngineService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly roleRegistry: RoleRegistryService,
    private readonly identityStore: IdentityStoreService,
    private readonly credentialStore: CredentialStoreService,
  ) {}

  async verifyIdentity(
    caller: string,
    subject: string,
    credentialId: number = GENERAL_VERIFICATION,
  ): Promise<VerificationOutcome> {
    const outcome = await this.ledger.execute(async (tx): Promise<VerificationOutcome> => {
      const verifier = await this.roleRegistry.assertAuthorizedVerifier(caller, tx.manager);
      const owner = await this.identityStore.requireIdentity(subject, tx.manager);

      if (credentialId === GENERAL_VERIFICATION) {
        await this.identityStore.recordVerification(owner, verifier, tx.timestamp, tx.manager);
        tx.record({ type: 'identity.verified', data: { subject: owner, verifier } });
        return { mode: 'identity', verified: true, subject: owner, verifier, verifiedAt: tx.timestamp };
      }

      const credential = await this.credentialStore.findCredential(credentialId, tx.manager);
      if (!credential) {
        throw RegistryError.notFound(`Credential ${credentialId} does not exist`);
      }
      if (credential.subject !== owner) {
        throw RegistryError.mismatch(`Credential ${credentialId} does not belong to ${owner}`);
      }
      if (!credential.isValid) {
        throw RegistryError.invalid(`Credential ${credentialId} has been revoked`);
      }
      if (isExpired(credential, tx.timestamp)) {
        throw RegistryError.expired(`Credential ${credentialId} expired at ${credential.expiresAt}`);
      }

      return {
        mode: 'credential',
        verified: true,
        subject: owner,
        verifier,
        credentialId: credential.id,
        expiresAt: credential.expiresAt,
        checkedAt: tx.timestamp,
      };
    });

    if (outcome.mode === 'identity') {
      this.logger.log(
        `✅ Identity ${shortPrincipal(outcome.subject)} verified by ${shortPrincipal(outcome.verifier)}`,
      );
    } else {
      this.logger.debug(`Credential #${outcome.credentialId} checked valid`);
    }
    return outcome;
  }
}
