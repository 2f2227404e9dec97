import { Injectable, Logger } from '@nestjs/common';
import { KnownExportTypesRegistry } from '../registry/known-export-types.registry';
import { ExportDataRequest } from '../../domain/model/export-data-request';
import { ExportedTypeDefinition } from '../../domain/model/exported-type-definition';
import { Principal, hasPermission } from '../../domain/model/principal';
import { AuthorizationDeniedError } from '../../domain/errors/export.errors';

/**
 * Export Authorization Gate
 *
 * Each export type carries its own policy. Types registered without one
 * fall back to "the principal holds the type's required permission".
 * Policies are evaluated before any data source or job exists.
 */
@Injectable()
export class ExportAuthorizationService {
  private readonly logger = new Logger(ExportAuthorizationService.name);

  constructor(private readonly registry: KnownExportTypesRegistry) {}

  static policyNameFor(exportTypeName: string): string {
    return `${exportTypeName}ExportDataPolicy`;
  }

  /**
   * @throws UnknownExportTypeError when the requested type is not registered
   */
  async authorize(principal: Principal, request: ExportDataRequest): Promise<boolean> {
    const definition = this.registry.resolve(request.exportTypeName);
    return this.evaluate(definition, principal, request);
  }

  /**
   * Resolves the type and throws unless its policy allows the request
   */
  async ensureAuthorized(
    principal: Principal,
    request: ExportDataRequest,
  ): Promise<ExportedTypeDefinition> {
    if (!(await this.authorize(principal, request))) {
      const policyName = ExportAuthorizationService.policyNameFor(request.exportTypeName);
      this.logger.warn(`${policyName} denied export request from ${principal.userName}`);
      throw new AuthorizationDeniedError(policyName);
    }

    return this.registry.resolve(request.exportTypeName);
  }

  private async evaluate(
    definition: ExportedTypeDefinition,
    principal: Principal,
    request: ExportDataRequest,
  ): Promise<boolean> {
    if (definition.authorizationPolicy) {
      return definition.authorizationPolicy(principal, request.dataQuery);
    }
    return hasPermission(principal, definition.requiredPermission);
  }
}
