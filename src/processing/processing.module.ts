import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { ExportJobConsumer } from './consumers/export-job.consumer';

@Module({
  imports: [ApplicationModule],
  providers: [ExportJobConsumer],
})
export class ProcessingModule {}
