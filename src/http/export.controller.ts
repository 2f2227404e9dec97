import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  StreamableFile,
  UseGuards,
} from '@nestjs/common';
import { Principal } from '../domain/model/principal';
import { ExportPushNotification } from '../domain/entities/export-notification.entity';
import { ExportedTypeDescriptor } from '../domain/model/exported-type-definition';
import { ExportProviderDescriptor } from '../domain/model/export-provider';
import { ExportableSearchResult } from '../application/ports/input/preview-export-data.port';
import { ListKnownExportTypesUseCase } from '../application/use-cases/list-known-export-types.use-case';
import { ListExportProvidersUseCase } from '../application/use-cases/list-export-providers.use-case';
import { PreviewExportDataUseCase } from '../application/use-cases/preview-export-data.use-case';
import { RunExportUseCase } from '../application/use-cases/run-export.use-case';
import { CancelExportUseCase } from '../application/use-cases/cancel-export.use-case';
import { GetExportTaskUseCase } from '../application/use-cases/get-export-task.use-case';
import { DownloadExportFileUseCase } from '../application/use-cases/download-export-file.use-case';
import { CurrentPrincipal } from './principal';
import { PermissionsGuard, RequireAnyPermission } from './guards/permissions.guard';
import { ExportPermissions } from './permissions';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';
import {
  ExportCancellationRequestDto,
  ExportDataRequestDto,
  exportCancellationRequestSchema,
  exportDataRequestSchema,
} from './dto/export-request.dto';

@Controller('api/export')
@UseGuards(PermissionsGuard)
@RequireAnyPermission(ExportPermissions.Access)
export class ExportController {
  constructor(
    private readonly listKnownTypes: ListKnownExportTypesUseCase,
    private readonly listProviders: ListExportProvidersUseCase,
    private readonly previewData: PreviewExportDataUseCase,
    private readonly runExport: RunExportUseCase,
    private readonly cancelExport: CancelExportUseCase,
    private readonly getExportTask: GetExportTaskUseCase,
    private readonly downloadFile: DownloadExportFileUseCase,
  ) {}

  @Get('knowntypes')
  knownTypes(): ExportedTypeDescriptor[] {
    return this.listKnownTypes.execute();
  }

  @Get('providers')
  providers(): ExportProviderDescriptor[] {
    return this.listProviders.execute();
  }

  @Post('data')
  @HttpCode(HttpStatus.OK)
  data(
    @Body(new ZodValidationPipe(exportDataRequestSchema)) request: ExportDataRequestDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<ExportableSearchResult> {
    return this.previewData.execute({ request, principal });
  }

  @Post('run')
  @HttpCode(HttpStatus.OK)
  run(
    @Body(new ZodValidationPipe(exportDataRequestSchema)) request: ExportDataRequestDto,
    @CurrentPrincipal() principal: Principal,
  ): Promise<ExportPushNotification> {
    return this.runExport.execute({ request, principal });
  }

  @Post('task/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(
    @Body(new ZodValidationPipe(exportCancellationRequestSchema))
    request: ExportCancellationRequestDto,
  ): Promise<void> {
    await this.cancelExport.execute({ jobId: request.jobId });
  }

  @Get('task/:jobId')
  task(@Param('jobId') jobId: string): Promise<ExportPushNotification> {
    return this.getExportTask.execute({ jobId });
  }

  @Get('download/:fileName')
  @RequireAnyPermission(ExportPermissions.PlatformExport, ExportPermissions.Download)
  async download(@Param('fileName') fileName: string): Promise<StreamableFile> {
    const file = await this.downloadFile.execute({ fileName });

    return new StreamableFile(file.stream, {
      type: file.contentType,
      disposition: `attachment; filename="${file.fileName}"`,
      ...(file.contentLength !== undefined && { length: file.contentLength }),
    });
  }
}
