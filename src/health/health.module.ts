import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { DynamoDbHealthIndicator } from './indicators/dynamodb.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { DynamoDbModule } from '../shared/aws/dynamodb/dynamodb.module';

@Module({
  imports: [TerminusModule, DynamoDbModule],
  controllers: [HealthController],
  providers: [DynamoDbHealthIndicator, DiskSpaceHealthIndicator],
})
export class HealthModule {}
