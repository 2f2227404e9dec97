import { Inject, Injectable } from '@nestjs/common';
import { GetExportTaskCommand, GetExportTaskPort } from '../ports/input/get-export-task.port';
import { JobStateRepositoryPort } from '../ports/output/job-state-repository.port';
import { JOB_STATE_REPOSITORY_PORT } from '../ports/output/injection-tokens';
import { ExportPushNotification } from '../../domain/entities/export-notification.entity';
import { ExportJobNotFoundError } from '../../domain/errors/export.errors';

@Injectable()
export class GetExportTaskUseCase implements GetExportTaskPort {
  constructor(
    @Inject(JOB_STATE_REPOSITORY_PORT)
    private readonly jobRepository: JobStateRepositoryPort,
  ) {}

  async execute(command: GetExportTaskCommand): Promise<ExportPushNotification> {
    const job = await this.jobRepository.findById(command.jobId);
    if (!job) {
      throw new ExportJobNotFoundError(command.jobId);
    }
    return job.notification;
  }
}
