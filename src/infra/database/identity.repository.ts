import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { IdentityAttributeEntity, IdentityEntity, IdentityVerifierEntity } from './entities';

/**
 * Repository for identities and their verifier and attribute rows
 */
@Injectable()
export class IdentityRepository {
  constructor(
    @InjectRepository(IdentityEntity)
    private readonly repository: Repository<IdentityEntity>,
    @InjectRepository(IdentityVerifierEntity)
    private readonly verifierRepository: Repository<IdentityVerifierEntity>,
    @InjectRepository(IdentityAttributeEntity)
    private readonly attributeRepository: Repository<IdentityAttributeEntity>,
  ) {}

  private identities(manager?: EntityManager): Repository<IdentityEntity> {
    return manager ? manager.getRepository(IdentityEntity) : this.repository;
  }

  private verifiers(manager?: EntityManager): Repository<IdentityVerifierEntity> {
    return manager ? manager.getRepository(IdentityVerifierEntity) : this.verifierRepository;
  }

  private attributes(manager?: EntityManager): Repository<IdentityAttributeEntity> {
    return manager ? manager.getRepository(IdentityAttributeEntity) : this.attributeRepository;
  }

  async findByOwner(owner: string, manager?: EntityManager): Promise<IdentityEntity | null> {
    return this.identities(manager).findOne({ where: { owner } });
  }

  async exists(owner: string, manager?: EntityManager): Promise<boolean> {
    const count = await this.identities(manager).count({ where: { owner } });
    return count > 0;
  }

  async insert(
    identity: Pick<IdentityEntity, 'owner' | 'name' | 'email' | 'createdAt'>,
    manager: EntityManager,
  ): Promise<IdentityEntity> {
    const repository = this.identities(manager);
    const entity = repository.create({ ...identity, isVerified: false });
    await repository.insert(entity);
    return entity;
  }

  async markVerified(owner: string, manager: EntityManager): Promise<void> {
    await this.identities(manager).update({ owner }, { isVerified: true });
  }

  /**
   * Record a verifier against an identity unless already recorded
   */
  async addVerifier(
    owner: string,
    verifier: string,
    verifiedAt: number,
    manager: EntityManager,
  ): Promise<void> {
    const repository = this.verifiers(manager);
    const count = await repository.count({ where: { owner, verifier } });
    if (count === 0) {
      await repository.insert({ owner, verifier, firstVerifiedAt: verifiedAt });
    }
  }

  async findVerifiers(owner: string, manager?: EntityManager): Promise<string[]> {
    const rows = await this.verifiers(manager).find({
      where: { owner },
      order: { firstVerifiedAt: 'ASC', verifier: 'ASC' },
    });
    return rows.map((row) => row.verifier);
  }

  async findAttributes(owner: string, manager?: EntityManager): Promise<Record<string, string>> {
    const rows = await this.attributes(manager).find({ where: { owner } });
    const attributes: Record<string, string> = {};
    for (const row of rows) {
      attributes[row.name] = row.value;
    }
    return attributes;
  }

  async countAll(): Promise<number> {
    return this.repository.count();
  }

  async countVerified(): Promise<number> {
    return this.repository.count({ where: { isVerified: true } });
  }
}
