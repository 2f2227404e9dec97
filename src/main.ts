import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { DomainExceptionFilter } from './http/filters/domain-exception.filter';

/**
 * Bootstrap the export service
 * Serves the export HTTP API and consumes queued export jobs from SQS
 */
async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), {
    bufferLogs: true,
  });

  // Get services
  const configService = app.get(ConfigService<AppConfig>);
  const logger = app.get(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  app.useGlobalFilters(new DomainExceptionFilter());

  // Stops the SQS consumers and lets running handlers finish
  app.enableShutdownHooks();

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
  });

  const port = configService.getOrThrow('port', { infer: true });
  const storage = configService.getOrThrow('storage', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });

  await app.listen(port, '0.0.0.0');

  logger.info(
    {
      nodeEnv: configService.get('nodeEnv', { infer: true }),
      pid: process.pid,
      port,
      storageDriver: storage.driver,
      exportJobsQueue: sqsConfig.exportJobsUrl,
    },
    'Export service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start export service:', error);
  process.exit(1);
});
