import { Injectable } from '@nestjs/common';
import { AuditEventRepository } from '@infra/database';
import { LedgerService } from './ledger.service';

export const DEFAULT_AUDIT_PAGE_SIZE = 100;
export const MAX_AUDIT_PAGE_SIZE = 500;

/**
 * Audit log entry as read back from storage
 */
export interface AuditLogEntry {
  id: number;
  type: string;
  data: Record<string, string | number>;
  timestamp: number;
  recordedAt: string;
}

/**
 * Read side of the append-only audit log. Rows are written by LedgerService
 * in the transaction that produced them.
 */
@Injectable()
export class AuditLogService {
  constructor(
    private readonly ledger: LedgerService,
    private readonly auditEventRepository: AuditEventRepository,
  ) {}

  async listEvents(query: { after?: number; limit?: number } = {}): Promise<AuditLogEntry[]> {
    const after = query.after ?? 0;
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_AUDIT_PAGE_SIZE, 1), MAX_AUDIT_PAGE_SIZE);
    const rows = await this.ledger.read(() => this.auditEventRepository.findAfter(after, limit));
    return rows.map((row) => ({
      id: row.id,
      type: row.type,
      data: row.data,
      timestamp: row.timestamp,
      recordedAt: row.recordedAt.toISOString(),
    }));
  }

  async countEvents(): Promise<number> {
    return this.ledger.read(() => this.auditEventRepository.countAll());
  }
}
