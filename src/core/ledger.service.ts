import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DataSource, EntityManager } from 'typeorm';
import { AuditEventRepository } from '@infra/database';
import { CLOCK, Clock } from './clock';
import {
  RegistryEvent,
  RegistryEventInput,
  registryEventName,
} from './entities/registry-event.entity';
import { errorMessage, errorStack, isRegistryError } from './registry-errors';

/**
 * Handle given to an operation while its transaction is open
 */
export interface LedgerTransaction {
  readonly manager: EntityManager;
  /** Single timestamp shared by every write of the transaction */
  readonly timestamp: number;
  /** Queue an audit event; it is persisted only if the transaction commits */
  record(event: RegistryEventInput): void;
}

/**
 * Executes registry operations one at a time.
 * Writes run in a database transaction together with their audit events and are
 * rolled back as a whole when the operation throws. Committed events are dispatched
 * on the event bus in commit order.
 */
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);
  private tail: Promise<void> = Promise.resolve();

  private stats = {
    committed: 0,
    rejected: 0,
    lastCommitAt: null as number | null,
  };

  constructor(
    private readonly dataSource: DataSource,
    private readonly auditEventRepository: AuditEventRepository,
    private readonly eventEmitter: EventEmitter2,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Run a mutating operation atomically
   */
  async execute<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      try {
        const { result, events, timestamp } = await this.dataSource.transaction(
          async (manager) => {
            const pending: RegistryEventInput[] = [];
            const timestamp = this.clock.now();
            const result = await work({
              manager,
              timestamp,
              record: (event) => {
                pending.push(event);
              },
            });
            const saved = await this.auditEventRepository.append(
              pending.map((event) => ({ type: event.type, data: event.data, timestamp })),
              manager,
            );
            const events: RegistryEvent[] = pending.map((event, index) => ({
              ...event,
              id: saved[index].id,
              timestamp,
            }));
            return { result, events, timestamp };
          },
        );

        this.stats.committed++;
        this.stats.lastCommitAt = timestamp;
        this.dispatch(events);
        return result;
      } catch (error) {
        this.stats.rejected++;
        if (isRegistryError(error)) {
          this.logger.warn(`Transaction rejected [${error.code}]: ${error.message}`);
        } else {
          this.logger.error(`Transaction failed: ${errorMessage(error)}`, errorStack(error));
        }
        throw error;
      }
    });
  }

  /**
   * Run a read against committed state.
   * sqlite shares one connection, so a read outside the queue would see an open transaction.
   */
  async read<T>(work: () => Promise<T>): Promise<T> {
    return this.serialize(work);
  }

  now(): number {
    return this.clock.now();
  }

  getStats() {
    return { ...this.stats };
  }

  private serialize<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    // the queue only tracks completion; callers still receive the failure through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private dispatch(events: RegistryEvent[]) {
    for (const event of events) {
      try {
        this.eventEmitter.emit(registryEventName(event.type), event);
      } catch (error) {
        this.logger.error(
          `Listener failed for event #${event.id} (${event.type}): ${errorMessage(error)}`,
          errorStack(error),
        );
      }
    }
  }
}
