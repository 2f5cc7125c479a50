import { EventEmitter } from 'node:events';
import * as mqtt from 'mqtt';
import { MessagingService } from './messaging.service';

class MockMqttClient extends EventEmitter {
  published: { topic: string; payload: string; qos: number }[] = [];
  failWith: Error | null = null;
  ended = false;

  publish(
    topic: string,
    payload: string,
    options: { qos: number },
    callback: (error?: Error) => void,
  ) {
    if (this.failWith) {
      callback(this.failWith);
      return;
    }
    this.published.push({ topic, payload, qos: options.qos });
    callback();
  }

  end(_force: boolean, _options: object, callback: () => void) {
    this.ended = true;
    this.emit('close');
    callback();
  }
}

let mockClient = new MockMqttClient();

jest.mock('mqtt', () => ({
  connect: jest.fn(() => mockClient),
}));

describe('MessagingService', () => {
  beforeEach(() => {
    mockClient = new MockMqttClient();
    jest.mocked(mqtt.connect).mockClear();
  });

  describe('without a broker', () => {
    const service = new MessagingService({ enabled: false });

    it('does not connect and skips publishing', async () => {
      await service.onModuleInit();

      expect(mqtt.connect).not.toHaveBeenCalled();
      await expect(service.publish('registry/events/identity.created', {})).resolves.toBe(false);
      expect(service.getStatus()).toEqual({
        enabled: false,
        isConnected: false,
        brokerUrl: null,
        published: 0,
      });
    });

    it('uses the default topic prefix', () => {
      expect(service.topicPrefix).toBe('registry/events');
    });
  });

  describe('with a broker', () => {
    let service: MessagingService;

    beforeEach(async () => {
      service = new MessagingService({
        enabled: true,
        brokerUrl: 'mqtt://localhost:1883',
        clientId: 'registry-test',
        topicPrefix: 'site-a/events',
      });
      await service.onModuleInit();
    });

    it('connects with the configured client id', () => {
      expect(mqtt.connect).toHaveBeenCalledWith(
        'mqtt://localhost:1883',
        expect.objectContaining({ clientId: 'registry-test', reconnectPeriod: 5000 }),
      );
      expect(service.topicPrefix).toBe('site-a/events');
    });

    it('returns false until the broker acknowledges the connection', async () => {
      await expect(service.publish('site-a/events/x', {})).resolves.toBe(false);

      mockClient.emit('connect');

      await expect(service.publish('site-a/events/x', { id: 1 })).resolves.toBe(true);
      expect(mockClient.published).toEqual([
        { topic: 'site-a/events/x', payload: '{"id":1}', qos: 1 },
      ]);
      expect(service.getStatus()).toEqual({
        enabled: true,
        isConnected: true,
        brokerUrl: 'mqtt://localhost:1883',
        published: 1,
      });
    });

    it('sends string messages unchanged', async () => {
      mockClient.emit('connect');

      await service.publish('site-a/events/raw', 'hello');

      expect(mockClient.published[0].payload).toBe('hello');
    });

    it('rejects when the broker refuses a message', async () => {
      mockClient.emit('connect');
      mockClient.failWith = new Error('not authorized');

      await expect(service.publish('site-a/events/x', {})).rejects.toThrow('not authorized');
      expect(service.getStatus().published).toBe(0);
    });

    it('ends the client on shutdown', async () => {
      mockClient.emit('connect');

      await service.onModuleDestroy();

      expect(mockClient.ended).toBe(true);
      expect(service.getStatus().isConnected).toBe(false);
      await expect(service.publish('site-a/events/x', {})).resolves.toBe(false);
    });
  });
});
