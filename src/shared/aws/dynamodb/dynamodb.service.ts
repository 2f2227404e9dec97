import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConditionalCheckFailedException,
  DescribeTableCommand,
  DynamoDBClient,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { AppConfig } from '../../../config/configuration';

export type JobItem = Record<string, unknown>;

/**
 * Only update the item when `attribute` currently holds one of `anyOf`
 */
export interface UpdateCondition {
  attribute: string;
  anyOf: ReadonlyArray<string | boolean>;
}

/**
 * Thin wrapper over the export jobs table, keyed by `jobId`.
 * Conditional writes return null instead of throwing when the condition fails.
 */
@Injectable()
export class DynamoDbService implements OnModuleDestroy {
  private readonly logger = new Logger(DynamoDbService.name);
  private readonly client: DynamoDBClient;
  private readonly docClient: DynamoDBDocumentClient;
  private readonly tableName: string;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const awsConfig = this.configService.getOrThrow('aws', { infer: true });
    const dynamoConfig = this.configService.getOrThrow('dynamodb', { infer: true });

    this.client = new DynamoDBClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.docClient = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: {
        removeUndefinedValues: true,
      },
    });

    this.tableName = dynamoConfig.tableName;
  }

  get table(): string {
    return this.tableName;
  }

  /**
   * @returns false when an item with the same jobId already exists
   */
  async putJob(item: JobItem & { jobId: string }): Promise<boolean> {
    try {
      await this.docClient.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
          ConditionExpression: 'attribute_not_exists(jobId)',
        }),
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw error;
    }

    this.logger.debug(`Job item ${item.jobId} created`);
    return true;
  }

  async getJob(jobId: string): Promise<JobItem | null> {
    const result = await this.docClient.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { jobId },
        ConsistentRead: true,
      }),
    );

    return result.Item ?? null;
  }

  /**
   * SET every key of `updates`; undefined values are skipped.
   * @returns the updated item, or null when the item is missing or the condition fails
   */
  async updateJob(
    jobId: string,
    updates: JobItem,
    condition?: UpdateCondition,
  ): Promise<JobItem | null> {
    const names: Record<string, string> = {};
    const values: Record<string, unknown> = {};
    const assignments: string[] = [];

    Object.entries(updates).forEach(([key, value], index) => {
      if (value === undefined || key === 'jobId') {
        return;
      }
      names[`#u${index}`] = key;
      values[`:u${index}`] = value;
      assignments.push(`#u${index} = :u${index}`);
    });

    if (assignments.length === 0) {
      throw new Error(`No attributes to update for job ${jobId}`);
    }

    let conditionExpression = 'attribute_exists(jobId)';
    if (condition) {
      names['#cond'] = condition.attribute;
      const placeholders = condition.anyOf.map((value, index) => {
        values[`:c${index}`] = value;
        return `:c${index}`;
      });
      conditionExpression += ` AND #cond IN (${placeholders.join(', ')})`;
    }

    try {
      const result = await this.docClient.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { jobId },
          UpdateExpression: `SET ${assignments.join(', ')}`,
          ConditionExpression: conditionExpression,
          ExpressionAttributeNames: names,
          ExpressionAttributeValues: values,
          ReturnValues: 'ALL_NEW',
        }),
      );
      return result.Attributes ?? null;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        this.logger.debug(`Conditional update of job ${jobId} rejected`);
        return null;
      }
      throw error;
    }
  }

  async describeTable(): Promise<{ status?: string; itemCount?: number }> {
    const response = await this.client.send(
      new DescribeTableCommand({ TableName: this.tableName }),
    );
    return {
      status: response.Table?.TableStatus,
      itemCount: response.Table?.ItemCount,
    };
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
