import { ExportDataRequest } from '../../../domain/model/export-data-request';
import { ExportPushNotification } from '../../../domain/entities/export-notification.entity';
import { Principal } from '../../../domain/model/principal';

export interface RunExportCommand {
  request: ExportDataRequest;
  principal: Principal;
}

/**
 * Run Export Port (Driving Port / Use Case Interface)
 * Accepts an export and returns its notification without waiting for execution
 */
export interface RunExportPort {
  execute(command: RunExportCommand): Promise<ExportPushNotification>;
}
