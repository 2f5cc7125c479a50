import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { AuthorizedVerifierRepository, RegistryStateRepository } from '@infra/database';
import { LedgerService } from './ledger.service';
import { Principal, toPrincipal, tryPrincipal } from './principal';
import { RegistryError } from './registry-errors';

export const REGISTRY_OPTIONS = Symbol('REGISTRY_OPTIONS');

export interface RegistryOptions {
  /** Admin used to initialize an empty registry at startup */
  adminAddress?: string;
}

export interface VerifierRecord {
  address: Principal;
  authorizedBy: Principal;
  authorizedAt: number;
}

export interface VerifierAuthorization {
  verifier: Principal;
  alreadyAuthorized: boolean;
}

/**
 * Tracks the registry admin and the set of authorized verifiers.
 * The admin is fixed at initialization and verifiers are never removed.
 */
@Injectable()
export class RoleRegistryService implements OnModuleInit {
  private readonly logger = new Logger(RoleRegistryService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly stateRepository: RegistryStateRepository,
    private readonly verifierRepository: AuthorizedVerifierRepository,
    @Inject(REGISTRY_OPTIONS) private readonly options: RegistryOptions,
  ) {}

  /**
   * Initialize from configuration on first boot, otherwise load the stored admin
   */
  async onModuleInit() {
    const admin = await this.getAdmin();
    if (admin) {
      this.logger.log(`✅ Registry loaded from database, admin: ${admin}`);
      const configured = this.options.adminAddress ? tryPrincipal(this.options.adminAddress) : null;
      if (configured && configured !== admin) {
        this.logger.warn(
          `⚠️  Configured admin ${configured} differs from stored admin ${admin}; the stored admin is kept`,
        );
      }
      return;
    }

    if (!this.options.adminAddress) {
      this.logger.warn('⚠️  No admin configured, registry left uninitialized');
      return;
    }

    await this.initialize(this.options.adminAddress);
  }

  /**
   * Set the admin and make it the first authorized verifier. Runs once.
   */
  async initialize(initiator: string): Promise<Principal> {
    const admin = toPrincipal(initiator, 'admin');

    await this.ledger.execute(async (tx) => {
      if (await this.stateRepository.findState(tx.manager)) {
        throw RegistryError.alreadyExists('Registry is already initialized');
      }
      await this.stateRepository.create(admin, tx.timestamp, tx.manager);
      await this.verifierRepository.add(admin, admin, tx.timestamp, tx.manager);
    });

    this.logger.log(`🔧 Registry initialized, admin: ${admin}`);
    return admin;
  }

  /**
   * Grant verifier rights. Admin only; authorizing an existing verifier is a no-op
   * that still records an audit event.
   */
  async authorizeVerifier(caller: string, target: string): Promise<VerifierAuthorization> {
    const authorization = await this.ledger.execute(async (tx) => {
      const admin = await this.requireAdmin(tx.manager);
      if (tryPrincipal(caller) !== admin) {
        throw RegistryError.unauthorized('Only the admin can authorize verifiers');
      }

      const verifier = toPrincipal(target, 'verifier');
      const added = await this.verifierRepository.add(verifier, admin, tx.timestamp, tx.manager);
      tx.record({ type: 'verifier.authorized', data: { verifier, authorizedBy: admin } });

      return { verifier, alreadyAuthorized: !added };
    });

    this.logger.log(
      `✅ Verifier ${authorization.verifier} authorized${authorization.alreadyAuthorized ? ' (already present)' : ''}`,
    );
    return authorization;
  }

  async isAuthorizedVerifier(principal: string): Promise<boolean> {
    const address = tryPrincipal(principal);
    if (!address) {
      return false;
    }
    return this.ledger.read(() => this.verifierRepository.isAuthorized(address));
  }

  /**
   * Authorization check for use inside a running transaction
   * @throws RegistryError Unauthorized
   */
  async assertAuthorizedVerifier(principal: string, manager: EntityManager): Promise<Principal> {
    const address = tryPrincipal(principal);
    if (!address || !(await this.verifierRepository.isAuthorized(address, manager))) {
      throw RegistryError.unauthorized(`${principal} is not an authorized verifier`);
    }
    return address;
  }

  async getAdmin(): Promise<Principal | null> {
    const state = await this.ledger.read(() => this.stateRepository.findState());
    return state ? state.admin : null;
  }

  async listVerifiers(): Promise<VerifierRecord[]> {
    const rows = await this.ledger.read(() => this.verifierRepository.findAll());
    return rows.map((row) => ({
      address: row.address,
      authorizedBy: row.authorizedBy,
      authorizedAt: row.authorizedAt,
    }));
  }

  private async requireAdmin(manager: EntityManager): Promise<Principal> {
    const state = await this.stateRepository.findState(manager);
    if (!state) {
      throw RegistryError.notInitialized();
    }
    return state.admin;
  }
}
