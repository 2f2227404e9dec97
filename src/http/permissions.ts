/**
 * Permission names checked by the export endpoints
 */
export const ExportPermissions = {
  Access: 'export:access',
  Download: 'export:download',
  PlatformExport: 'platform:export',
} as const;

export type ExportPermission = (typeof ExportPermissions)[keyof typeof ExportPermissions];
