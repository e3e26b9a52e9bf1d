import 'reflect-metadata';

import { type INestApplication, type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app: INestApplication = await NestFactory.create(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  const appConfigService: AppConfigService = app.get(AppConfigService);
  const logger: Logger = new Logger('Bootstrap');

  app.enableShutdownHooks();

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, snapshotEnabled=${String(appConfigService.snapshotEnabled)}, keepAliveEnabled=${String(appConfigService.keepAliveUrl !== null)}, metricsEnabled=${String(appConfigService.metricsEnabled)}`,
  );

  await app.listen(appConfigService.port);
  logger.log(`Portfolio pricing service is listening on port ${String(appConfigService.port)}.`);
};

void bootstrap();
