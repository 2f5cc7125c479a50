import { Test } from '@nestjs/testing';
import { MessagingService } from '@infra/messaging';
import { RegistryEvent } from './entities/registry-event.entity';
import { EventProcessorService } from './event-processor.service';

const OWNER = '0x3000000000000000000000000000000000000003';

function identityCreated(id: number): RegistryEvent {
  return {
    id,
    type: 'identity.created',
    data: { owner: OWNER, name: 'Alice' },
    timestamp: 1_700_000_000,
  };
}

describe('EventProcessorService', () => {
  let processor: EventProcessorService;
  let messaging: { topicPrefix: string; publish: jest.Mock };

  beforeEach(async () => {
    messaging = { topicPrefix: 'registry/events', publish: jest.fn().mockResolvedValue(true) };

    const moduleRef = await Test.createTestingModule({
      providers: [EventProcessorService, { provide: MessagingService, useValue: messaging }],
    }).compile();

    processor = moduleRef.get(EventProcessorService);
  });

  it('forwards each event to a topic named after its type', async () => {
    const event = identityCreated(1);

    await processor.handleRegistryEvent(event);

    expect(messaging.publish).toHaveBeenCalledWith('registry/events/identity.created', event);
    expect(processor.getStats()).toEqual({
      processed: 1,
      byType: {
        'identity.created': 1,
        'identity.verified': 0,
        'credential.issued': 0,
        'credential.revoked': 0,
        'verifier.authorized': 0,
      },
      lastEventId: 1,
      forwarded: 1,
      forwardFailures: 0,
    });
  });

  it('counts events that could not be forwarded without a broker', async () => {
    messaging.publish.mockResolvedValue(false);

    await processor.handleRegistryEvent(identityCreated(1));
    await processor.handleRegistryEvent({
      id: 2,
      type: 'credential.revoked',
      data: { credentialId: 7, revokedBy: OWNER },
      timestamp: 1_700_000_010,
    });

    expect(processor.getStats()).toMatchObject({
      processed: 2,
      lastEventId: 2,
      forwarded: 0,
      forwardFailures: 0,
    });
  });

  it('keeps processing when publishing fails', async () => {
    messaging.publish.mockRejectedValueOnce(new Error('broker unavailable'));

    await expect(processor.handleRegistryEvent(identityCreated(1))).resolves.toBeUndefined();
    await processor.handleRegistryEvent(identityCreated(2));

    expect(processor.getStats()).toMatchObject({
      processed: 2,
      lastEventId: 2,
      forwarded: 1,
      forwardFailures: 1,
    });
  });
});
