import { Controller, Get, Query } from '@nestjs/common';
import { AuditLogService } from '@core/audit-log.service';
import { AuditQueryDto } from '../dto';

/**
 * Read access to the audit log
 */
@Controller('audit')
export class AuditController {
  constructor(private readonly auditLog: AuditLogService) {}

  /**
   * GET /api/v1/audit?after=0&limit=100
   * Pages forward by passing the last returned id as `after`
   */
  @Get()
  async listEvents(@Query() query: AuditQueryDto) {
    const events = await this.auditLog.listEvents({ after: query.after, limit: query.limit });
    return {
      events,
      nextAfter: events.length > 0 ? events[events.length - 1].id : (query.after ?? 0),
      timestamp: new Date().toISOString(),
    };
  }
}
