import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { promises as fs } from 'fs';
import { AppConfig } from '../../config/configuration';

/**
 * Free space on the local export root. Always healthy with the s3 driver.
 */
@Injectable()
export class DiskSpaceHealthIndicator extends HealthIndicator {
  private readonly storageRoot?: string;
  private readonly minFreeSpacePercent = 10;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    super();

    const storage = this.configService.getOrThrow('storage', { infer: true });
    this.storageRoot = storage.driver === 'local' ? storage.root : undefined;
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    if (!this.storageRoot) {
      return this.getStatus(key, true, { driver: 's3' });
    }

    try {
      await fs.mkdir(this.storageRoot, { recursive: true });
      const stats = await fs.statfs(this.storageRoot);

      const total = stats.blocks * stats.bsize;
      const free = stats.bavail * stats.bsize;
      const freePercent = total > 0 ? (free / total) * 100 : 0;

      const details = {
        path: this.storageRoot,
        totalBytes: total,
        freeBytes: free,
        freePercent: Number(freePercent.toFixed(1)),
      };

      if (freePercent >= this.minFreeSpacePercent) {
        return this.getStatus(key, true, details);
      }

      throw new HealthCheckError(
        `Low disk space: ${freePercent.toFixed(1)}% free`,
        this.getStatus(key, false, details),
      );
    } catch (error) {
      if (error instanceof HealthCheckError) {
        throw error;
      }

      throw new HealthCheckError(
        'Disk space check failed',
        this.getStatus(key, false, {
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }
  }
}
