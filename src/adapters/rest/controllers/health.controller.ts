import { Controller, Get } from '@nestjs/common';
import { AuditLogService } from '@core/audit-log.service';
import { CredentialStoreService } from '@core/credential-store.service';
import { EventProcessorService } from '@core/event-processor.service';
import { IdentityStoreService } from '@core/identity-store.service';
import { LedgerService } from '@core/ledger.service';
import { RoleRegistryService } from '@core/role-registry.service';
import { errorMessage } from '@core/registry-errors';
import { MessagingService } from '@infra/messaging';

/**
 * Health check controller
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly ledger: LedgerService,
    private readonly roleRegistry: RoleRegistryService,
    private readonly identityStore: IdentityStoreService,
    private readonly credentialStore: CredentialStoreService,
    private readonly auditLog: AuditLogService,
    private readonly eventProcessor: EventProcessorService,
    private readonly messagingService: MessagingService,
  ) {}

  /**
   * Health check endpoint
   * GET /api/v1/health
   *
   * Returns:
   * - status: healthy once the registry has an admin, degraded before
   * - registry: admin and record counts
   * - ledger: committed and rejected transactions
   * - events: processed audit events and MQTT forwarding
   */
  @Get()
  async check() {
    try {
      const admin = await this.roleRegistry.getAdmin();
      const verifiers = await this.roleRegistry.listVerifiers();
      const identities = await this.identityStore.getStats();
      const totalCredentials = await this.credentialStore.getTotalCredentials();
      const totalEvents = await this.auditLog.countEvents();

      return {
        status: admin ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        registry: {
          initialized: admin !== null,
          admin,
          verifiers: verifiers.length,
          identities: identities.total,
          verifiedIdentities: identities.verified,
          credentials: totalCredentials,
          auditEvents: totalEvents,
        },
        ledger: this.ledger.getStats(),
        events: this.eventProcessor.getStats(),
        messaging: this.messagingService.getStatus(),
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        error: errorMessage(error),
        timestamp: new Date().toISOString(),
      };
    }
  }
}
