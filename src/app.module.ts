import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsModule } from '@ssut/nestjs-sqs';
import { SQSClient } from '@aws-sdk/client-sqs';
import { AppConfig } from './config/configuration';
import { ConfigModule } from './config/config.module';
import { LoggingModule } from './shared/logging/logging.module';
import { CorrelationIdMiddleware } from './shared/logging/correlation-id.middleware';
import { EXPORT_JOBS_QUEUE } from './processing/consumers/export-job.consumer';
import { EXPORT_JOBS_PRODUCER } from './infrastructure/adapters/queue/sqs-job-queue.adapter';
import { ProcessingModule } from './processing/processing.module';
import { HttpModule } from './http/http.module';
import { HealthModule } from './health/health.module';

/**
 * Application Module
 * Export service: HTTP API for accepting exports, SQS consumer for running them
 * Uses @ssut/nestjs-sqs for producing and consuming job messages
 */
@Module({
  imports: [
    ConfigModule,
    LoggingModule,

    SqsModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig>) => {
        const awsConfig = configService.getOrThrow('aws', { infer: true });
        const sqsConfig = configService.getOrThrow('sqs', { infer: true });
        const jobsConfig = configService.getOrThrow('jobs', { infer: true });

        // LocalStack is reached through AWS_ENDPOINT
        const sqsClient = new SQSClient({
          region: awsConfig.region,
          ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
          ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
        });

        return {
          consumers: [
            {
              name: EXPORT_JOBS_QUEUE,
              queueUrl: sqsConfig.exportJobsUrl,
              region: awsConfig.region,
              sqs: sqsClient,
              batchSize: jobsConfig.maxConcurrentJobs,
              waitTimeSeconds: sqsConfig.waitTimeSeconds,
              visibilityTimeout: sqsConfig.visibilityTimeout,
            },
          ],
          producers: [
            {
              name: EXPORT_JOBS_PRODUCER,
              queueUrl: sqsConfig.exportJobsUrl,
              region: awsConfig.region,
              sqs: sqsClient,
            },
          ],
        };
      },
    }),

    ProcessingModule,
    HttpModule,
    HealthModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
