import { LogLevel, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { ethers } from 'ethers';

/**
 * Configuration interface matching .env structure
 */
export interface AppConfig {
  // Application
  MODE: 'API' | 'IOT';
  PORT: number;
  NODE_ENV: string;
  CORS_ORIGIN: string;

  // Registry
  ADMIN_ADDRESS: string;

  // Database
  DATABASE_PATH: string;

  // Signed request authentication
  AUTH_MAX_CLOCK_SKEW_SECONDS: number;

  // Logging
  LOG_LEVEL: string;

  // MQTT (Optional)
  MQTT_BROKER_URL?: string;
  MQTT_CLIENT_ID: string;
  MQTT_USERNAME?: string;
  MQTT_PASSWORD?: string;
  MQTT_TOPIC_PREFIX: string;
}

const MODES = ['API', 'IOT'] as const;

const LOG_LEVELS: Record<string, LogLevel[]> = {
  error: ['error', 'fatal'],
  warn: ['error', 'fatal', 'warn'],
  log: ['error', 'fatal', 'warn', 'log'],
  info: ['error', 'fatal', 'warn', 'log'],
  debug: ['error', 'fatal', 'warn', 'log', 'debug'],
  verbose: ['error', 'fatal', 'warn', 'log', 'debug', 'verbose'],
};

function isMode(value: string): value is AppConfig['MODE'] {
  return MODES.some((mode) => mode === value);
}

/**
 * Nest logger levels enabled at the given LOG_LEVEL threshold
 */
export function resolveLogLevels(level: string): LogLevel[] {
  return LOG_LEVELS[level.toLowerCase()] ?? LOG_LEVELS.info;
}

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      cache: true,
    }),
  ],
})
export class ConfigModule {
  static validate(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const errors: string[] = [];

    const mode = (env.MODE || 'API').toUpperCase();
    if (!isMode(mode)) {
      errors.push(`MODE must be one of ${MODES.join(', ')}`);
    }
    const MODE = isMode(mode) ? mode : 'API';

    const PORT = parseInt(env.PORT || '3000', 10);
    if (isNaN(PORT) || PORT < 1 || PORT > 65535) {
      errors.push('PORT must be between 1 and 65535');
    }

    const NODE_ENV = env.NODE_ENV || 'development';
    const CORS_ORIGIN = env.CORS_ORIGIN || '*';

    // Admin is fixed at first boot and never changes afterwards
    const ADMIN_ADDRESS = env.ADMIN_ADDRESS || '';
    if (!ADMIN_ADDRESS) {
      errors.push('ADMIN_ADDRESS is required');
    } else if (!ethers.utils.isAddress(ADMIN_ADDRESS)) {
      errors.push(`Invalid ADMIN_ADDRESS format: ${ADMIN_ADDRESS}`);
    } else if (ethers.utils.getAddress(ADMIN_ADDRESS) === ethers.constants.AddressZero) {
      errors.push('ADMIN_ADDRESS must not be the zero address');
    }

    const DATABASE_PATH = env.DATABASE_PATH || './data/registry.db';

    const AUTH_MAX_CLOCK_SKEW_SECONDS = parseInt(env.AUTH_MAX_CLOCK_SKEW_SECONDS || '300', 10);
    if (isNaN(AUTH_MAX_CLOCK_SKEW_SECONDS) || AUTH_MAX_CLOCK_SKEW_SECONDS < 1) {
      errors.push('AUTH_MAX_CLOCK_SKEW_SECONDS must be a positive number');
    }

    const LOG_LEVEL = (env.LOG_LEVEL || 'info').toLowerCase();
    if (!(LOG_LEVEL in LOG_LEVELS)) {
      errors.push(`LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS).join(', ')}`);
    }

    // Optional MQTT settings
    const MQTT_BROKER_URL = env.MQTT_BROKER_URL || undefined;
    const MQTT_CLIENT_ID = env.MQTT_CLIENT_ID || 'registry-node';
    const MQTT_USERNAME = env.MQTT_USERNAME || undefined;
    const MQTT_PASSWORD = env.MQTT_PASSWORD || undefined;
    const MQTT_TOPIC_PREFIX = (env.MQTT_TOPIC_PREFIX || 'registry/events').replace(/\/+$/, '');

    if (MQTT_BROKER_URL && !/^(mqtts?|wss?|tcp|tls):\/\//.test(MQTT_BROKER_URL)) {
      errors.push(`Invalid MQTT_BROKER_URL: ${MQTT_BROKER_URL}`);
    }

    // Throw errors if validation failed
    if (errors.length > 0) {
      throw new Error(`Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
    }

    return {
      MODE,
      PORT,
      NODE_ENV,
      CORS_ORIGIN,
      ADMIN_ADDRESS: ethers.utils.getAddress(ADMIN_ADDRESS),
      DATABASE_PATH,
      AUTH_MAX_CLOCK_SKEW_SECONDS,
      LOG_LEVEL,
      MQTT_BROKER_URL,
      MQTT_CLIENT_ID,
      MQTT_USERNAME,
      MQTT_PASSWORD,
      MQTT_TOPIC_PREFIX,
    };
  }
}
