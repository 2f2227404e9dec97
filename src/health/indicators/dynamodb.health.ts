import { Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { DynamoDbService } from '../../shared/aws/dynamodb/dynamodb.service';

@Injectable()
export class DynamoDbHealthIndicator extends HealthIndicator {
  constructor(private readonly dynamoDb: DynamoDbService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      const table = await this.dynamoDb.describeTable();

      const details = {
        tableName: this.dynamoDb.table,
        tableStatus: table.status,
        itemCount: table.itemCount,
      };

      if (table.status === 'ACTIVE') {
        return this.getStatus(key, true, details);
      }

      throw new HealthCheckError(
        `DynamoDB table is not active: ${table.status}`,
        this.getStatus(key, false, details),
      );
    } catch (error) {
      if (error instanceof HealthCheckError) {
        throw error;
      }

      throw new HealthCheckError(
        'DynamoDB health check failed',
        this.getStatus(key, false, {
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }
  }
}
