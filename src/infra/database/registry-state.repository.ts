import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { RegistryError } from '@core/registry-errors';
import { RegistryStateEntity } from './entities';

/**
 * Repository for the registry singleton (always id=1)
 */
@Injectable()
export class RegistryStateRepository {
  private readonly logger = new Logger(RegistryStateRepository.name);
  private readonly SINGLETON_ID = 1;

  constructor(
    @InjectRepository(RegistryStateEntity)
    private readonly repository: Repository<RegistryStateEntity>,
  ) {}

  private scoped(manager?: EntityManager): Repository<RegistryStateEntity> {
    return manager ? manager.getRepository(RegistryStateEntity) : this.repository;
  }

  /**
   * Find the registry state
   * @returns RegistryStateEntity or null if not initialized
   */
  async findState(manager?: EntityManager): Promise<RegistryStateEntity | null> {
    return this.scoped(manager).findOne({ where: { id: this.SINGLETON_ID } });
  }

  async create(
    admin: string,
    initializedAt: number,
    manager: EntityManager,
  ): Promise<RegistryStateEntity> {
    const repository = this.scoped(manager);
    const state = repository.create({
      id: this.SINGLETON_ID,
      admin,
      credentialCount: 0,
      initializedAt,
    });
    await repository.insert(state);
    this.logger.log(`💾 Registry state created: admin=${admin}`);
    return state;
  }

  /**
   * Advance the issuance counter and return the new value
   * Must run inside the issuing transaction so a rollback releases the id
   */
  async nextCredentialId(manager: EntityManager): Promise<number> {
    const repository = this.scoped(manager);
    const state = await repository.findOne({ where: { id: this.SINGLETON_ID } });
    if (!state) {
      throw RegistryError.notInitialized();
    }
    const next = state.credentialCount + 1;
    await repository.update({ id: this.SINGLETON_ID }, { credentialCount: next });
    return next;
  }
}
