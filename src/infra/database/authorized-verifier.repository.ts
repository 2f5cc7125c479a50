import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AuthorizedVerifierEntity } from './entities';

/**
 * Repository for authorized verifiers. Rows are never deleted.
 */
@Injectable()
export class AuthorizedVerifierRepository {
  private readonly logger = new Logger(AuthorizedVerifierRepository.name);

  constructor(
    @InjectRepository(AuthorizedVerifierEntity)
    private readonly repository: Repository<AuthorizedVerifierEntity>,
  ) {}

  private scoped(manager?: EntityManager): Repository<AuthorizedVerifierEntity> {
    return manager ? manager.getRepository(AuthorizedVerifierEntity) : this.repository;
  }

  async isAuthorized(address: string, manager?: EntityManager): Promise<boolean> {
    const count = await this.scoped(manager).count({ where: { address } });
    return count > 0;
  }

  /**
   * Insert a verifier unless already present
   * @returns true when a new row was written
   */
  async add(
    address: string,
    authorizedBy: string,
    authorizedAt: number,
    manager: EntityManager,
  ): Promise<boolean> {
    const repository = this.scoped(manager);
    if (await this.isAuthorized(address, manager)) {
      return false;
    }
    await repository.insert({ address, authorizedBy, authorizedAt });
    this.logger.log(`💾 Verifier saved: ${address}`);
    return true;
  }

  async findAll(): Promise<AuthorizedVerifierEntity[]> {
    return this.repository.find({ order: { authorizedAt: 'ASC', address: 'ASC' } });
  }

  async countAll(): Promise<number> {
    return this.repository.count();
  }
}
