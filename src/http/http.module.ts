import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { ExportController } from './export.controller';
import { PermissionsGuard } from './guards/permissions.guard';

@Module({
  imports: [ApplicationModule],
  controllers: [ExportController],
  providers: [PermissionsGuard],
})
export class HttpModule {}
