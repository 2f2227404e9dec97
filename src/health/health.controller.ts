import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { DynamoDbHealthIndicator } from './indicators/dynamodb.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';

const HEAP_LIMIT_BYTES = 500 * 1024 * 1024;
const RSS_LIMIT_BYTES = 1024 * 1024 * 1024;

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly dynamoDbHealth: DynamoDbHealthIndicator,
    private readonly diskSpaceHealth: DiskSpaceHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    // Jobs cannot be accepted without the job table or room for their files
    return this.health.check([
      () => this.dynamoDbHealth.isHealthy('dynamodb'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }
}
