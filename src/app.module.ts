import { DynamicModule, Module } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AppConfig, ConfigModule } from '@infra/config';
import { DatabaseModule } from '@infra/database';
import { MessagingModule } from '@infra/messaging';
import { RestModule } from '@adapters/rest';
import { CoreModule } from '@core/core.module';

@Module({})
export class AppModule {
  static register(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        // Global configuration
        ConfigModule,

        // Event bus for committed registry events
        EventEmitterModule.forRoot({
          wildcard: true,
          delimiter: '.',
          maxListeners: 20,
        }),

        // Infrastructure
        DatabaseModule.forRoot({
          database: config.DATABASE_PATH,
          logging: config.NODE_ENV === 'development' && config.LOG_LEVEL === 'verbose',
        }),
        MessagingModule.register({
          enabled: config.MODE === 'IOT',
          brokerUrl: config.MQTT_BROKER_URL,
          clientId: config.MQTT_CLIENT_ID,
          username: config.MQTT_USERNAME,
          password: config.MQTT_PASSWORD,
          topicPrefix: config.MQTT_TOPIC_PREFIX,
        }),

        // Registry state machine
        CoreModule.register({ adminAddress: config.ADMIN_ADDRESS }),

        // HTTP surface
        RestModule.register({ maxClockSkewSeconds: config.AUTH_MAX_CLOCK_SKEW_SECONDS }),
      ],
    };
  }
}
