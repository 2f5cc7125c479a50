import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as mqtt from 'mqtt';
import { errorMessage, errorStack } from '@core/registry-errors';

export const MESSAGING_OPTIONS = Symbol('MESSAGING_OPTIONS');

export interface MessagingOptions {
  enabled?: boolean;
  brokerUrl?: string;
  clientId?: string;
  username?: string;
  password?: string;
  topicPrefix?: string;
}

/**
 * MQTT messaging service for IoT mode
 * Publishes committed registry events for external subscribers
 */
@Injectable()
export class MessagingService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MessagingService.name);
  private client: mqtt.MqttClient | null = null;
  private isConnected = false;
  private published = 0;

  constructor(@Inject(MESSAGING_OPTIONS) private readonly options: MessagingOptions) {}

  async onModuleInit() {
    if (this.options.enabled && this.options.brokerUrl) {
      this.connect();
    }
  }

  async onModuleDestroy() {
    await this.disconnect();
  }

  get topicPrefix(): string {
    return this.options.topicPrefix ?? 'registry/events';
  }

  /**
   * Connect to MQTT broker
   */
  connect() {
    const brokerUrl = this.options.brokerUrl;
    if (!brokerUrl) {
      this.logger.warn('MQTT broker URL not configured');
      return;
    }

    try {
      const client = mqtt.connect(brokerUrl, {
        clientId: this.options.clientId || 'registry-node',
        username: this.options.username,
        password: this.options.password,
        clean: true,
        reconnectPeriod: 5000,
      });

      client.on('connect', () => {
        this.isConnected = true;
        this.logger.log('Connected to MQTT broker');
      });

      client.on('error', (error) => {
        this.logger.error(`MQTT error: ${error.message}`, error.stack);
      });

      client.on('close', () => {
        if (this.isConnected) {
          this.logger.warn('Disconnected from MQTT broker');
        }
        this.isConnected = false;
      });

      this.client = client;
    } catch (error) {
      this.logger.error(
        `Failed to connect to MQTT broker: ${errorMessage(error)}`,
        errorStack(error),
      );
    }
  }

  /**
   * Publish message to a topic
   * @returns false when no broker connection is available
   */
  async publish(topic: string, message: unknown): Promise<boolean> {
    const client = this.client;
    if (!client || !this.isConnected) {
      this.logger.debug(`MQTT client not connected, skipping publish to ${topic}`);
      return false;
    }

    const payload = typeof message === 'string' ? message : JSON.stringify(message);

    await new Promise<void>((resolve, reject) => {
      client.publish(topic, payload, { qos: 1 }, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.published++;
    this.logger.debug(`Published message to topic: ${topic}`);
    return true;
  }

  /**
   * Disconnect from MQTT broker
   */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return;
    }
    await new Promise<void>((resolve) => {
      client.end(false, {}, () => {
        this.isConnected = false;
        this.logger.log('Disconnected from MQTT broker');
        resolve();
      });
    });
    this.client = null;
  }

  /**
   * Get connection status
   */
  getStatus() {
    return {
      enabled: Boolean(this.options.enabled && this.options.brokerUrl),
      isConnected: this.isConnected,
      brokerUrl: this.options.brokerUrl ?? null,
      published: this.published,
    };
  }
}
