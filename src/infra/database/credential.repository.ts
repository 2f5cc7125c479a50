import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { CredentialEntity } from './entities';

/**
 * Repository for issued credentials
 */
@Injectable()
export class CredentialRepository {
  constructor(
    @InjectRepository(CredentialEntity)
    private readonly repository: Repository<CredentialEntity>,
  ) {}

  private scoped(manager?: EntityManager): Repository<CredentialEntity> {
    return manager ? manager.getRepository(CredentialEntity) : this.repository;
  }

  async findById(id: number, manager?: EntityManager): Promise<CredentialEntity | null> {
    return this.scoped(manager).findOne({ where: { id } });
  }

  async insert(
    credential: Omit<CredentialEntity, 'isValid' | 'revokedAt'>,
    manager: EntityManager,
  ): Promise<CredentialEntity> {
    const repository = this.scoped(manager);
    const entity = repository.create({ ...credential, isValid: true, revokedAt: null });
    await repository.insert(entity);
    return entity;
  }

  /**
   * Clear the validity flag. The first revocation time is kept on repeated calls.
   */
  async markRevoked(credential: CredentialEntity, revokedAt: number, manager: EntityManager) {
    await this.scoped(manager).update(
      { id: credential.id },
      { isValid: false, revokedAt: credential.revokedAt ?? revokedAt },
    );
  }

  async find(filter: { subject?: string; issuer?: string }): Promise<CredentialEntity[]> {
    const where: FindOptionsWhere<CredentialEntity> = {};
    if (filter.subject) {
      where.subject = filter.subject;
    }
    if (filter.issuer) {
      where.issuer = filter.issuer;
    }
    return this.repository.find({ where, order: { id: 'ASC' } });
  }
}
