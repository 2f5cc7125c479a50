import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, MoreThan, Repository } from 'typeorm';
import { AuditEventEntity } from './entities';

/**
 * Repository for the append-only audit log
 */
@Injectable()
export class AuditEventRepository {
  private readonly logger = new Logger(AuditEventRepository.name);

  constructor(
    @InjectRepository(AuditEventEntity)
    private readonly repository: Repository<AuditEventEntity>,
  ) {}

  /**
   * Append events in order inside the given transaction
   */
  async append(
    events: Pick<AuditEventEntity, 'type' | 'data' | 'timestamp'>[],
    manager: EntityManager,
  ): Promise<AuditEventEntity[]> {
    const repository = manager.getRepository(AuditEventEntity);
    const saved: AuditEventEntity[] = [];
    for (const event of events) {
      saved.push(await repository.save(repository.create(event)));
    }
    if (saved.length > 0) {
      this.logger.debug(`Appended ${saved.length} audit event(s)`);
    }
    return saved;
  }

  /**
   * Events with an id greater than `after`, oldest first
   */
  async findAfter(after: number, limit: number): Promise<AuditEventEntity[]> {
    return this.repository.find({
      where: { id: MoreThan(after) },
      order: { id: 'ASC' },
      take: limit,
    });
  }

  async countAll(): Promise<number> {
    return this.repository.count();
  }
}
