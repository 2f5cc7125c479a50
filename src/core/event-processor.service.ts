import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { MessagingService } from '@infra/messaging';
import {
  REGISTRY_EVENT_TYPES,
  REGISTRY_EVENTS,
  RegistryEvent,
  RegistryEventType,
} from './entities/registry-event.entity';
import { shortPrincipal } from './principal';
import { errorMessage, errorStack } from './registry-errors';

function describeEvent(event: RegistryEvent): string {
  switch (event.type) {
    case 'identity.created':
      return `owner=${shortPrincipal(event.data.owner)}`;
    case 'identity.verified':
      return `subject=${shortPrincipal(event.data.subject)} verifier=${shortPrincipal(event.data.verifier)}`;
    case 'credential.issued':
      return `id=${event.data.credentialId} type=${event.data.credentialType} subject=${shortPrincipal(event.data.subject)}`;
    case 'credential.revoked':
      return `id=${event.data.credentialId} by=${shortPrincipal(event.data.revokedBy)}`;
    case 'verifier.authorized':
      return `verifier=${shortPrincipal(event.data.verifier)}`;
  }
}

/**
 * Consumes committed registry events: logs them, counts them and forwards them to MQTT
 */
@Injectable()
export class EventProcessorService {
  private readonly logger = new Logger(EventProcessorService.name);

  private readonly counts: Record<RegistryEventType, number> = {
    'identity.created': 0,
    'identity.verified': 0,
    'credential.issued': 0,
    'credential.revoked': 0,
    'verifier.authorized': 0,
  };

  private lastEventId: number | null = null;
  private forwarded = 0;
  private forwardFailures = 0;

  constructor(private readonly messagingService: MessagingService) {}

  @OnEvent(REGISTRY_EVENTS.ALL)
  async handleRegistryEvent(event: RegistryEvent): Promise<void> {
    this.counts[event.type]++;
    this.lastEventId = event.id;
    this.logger.log(`🔔 #${event.id} ${event.type} ${describeEvent(event)}`);

    try {
      const topic = `${this.messagingService.topicPrefix}/${event.type}`;
      if (await this.messagingService.publish(topic, event)) {
        this.forwarded++;
      }
    } catch (error) {
      this.forwardFailures++;
      this.logger.error(
        `❌ Failed to forward event #${event.id}: ${errorMessage(error)}`,
        errorStack(error),
      );
    }
  }

  getStats() {
    const processed = REGISTRY_EVENT_TYPES.reduce((sum, type) => sum + this.counts[type], 0);
    return {
      processed,
      byType: { ...this.counts },
      lastEventId: this.lastEventId,
      forwarded: this.forwarded,
      forwardFailures: this.forwardFailures,
    };
  }
}
