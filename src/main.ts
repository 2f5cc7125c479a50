import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { AppModule } from './app.module';
import { ConfigModule, resolveLogLevels } from '@infra/config';
import { errorMessage, errorStack } from '@core/registry-errors';
import { createValidationPipe } from '@adapters/rest';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    // Validate configuration
    const config = ConfigModule.validate();
    logger.log(`Starting registry in ${config.MODE} mode...`);

    if (config.DATABASE_PATH !== ':memory:') {
      mkdirSync(dirname(config.DATABASE_PATH), { recursive: true });
    }

    const app = await NestFactory.create(AppModule.register(config), {
      logger: resolveLogLevels(config.LOG_LEVEL),
    });

    // Enable validation
    app.useGlobalPipes(createValidationPipe());

    app.enableCors({
      origin: config.CORS_ORIGIN,
      credentials: true,
    });

    app.setGlobalPrefix('api/v1');
    app.enableShutdownHooks();

    await app.listen(config.PORT, '0.0.0.0');
    logger.log(`🚀 Server running on http://localhost:${config.PORT}/api/v1`);
    logger.log(`📊 Health check: http://localhost:${config.PORT}/api/v1/health`);
    logger.log(`Database: ${config.DATABASE_PATH}`);
    if (config.MODE === 'IOT' && config.MQTT_BROKER_URL) {
      logger.log(`MQTT broker: ${config.MQTT_BROKER_URL} (topics ${config.MQTT_TOPIC_PREFIX}/#)`);
    }
  } catch (error) {
    logger.error(`Failed to start application: ${errorMessage(error)}`, errorStack(error));
    process.exit(1);
  }
}

void bootstrap();
