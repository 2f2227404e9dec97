import { describe, it, expect, vi } from 'vitest';
import { ExportAuthorizationService } from '../../../src/application/authorization/export-authorization.service';
import {
  AuthorizationDeniedError,
  UnknownExportTypeError,
} from '../../../src/domain/errors/export.errors';
import {
  createPrincipal,
  createProductDefinition,
  createRegistries,
  createRequest,
} from '../helpers/export-fixtures';

describe('ExportAuthorizationService', () => {
  it('should allow a principal holding the required permission', async () => {
    const { authorization } = createRegistries([createProductDefinition([])]);

    await expect(authorization.authorize(createPrincipal(), createRequest())).resolves.toBe(true);
  });

  it('should deny a principal without the required permission', async () => {
    const { authorization } = createRegistries([createProductDefinition([])]);

    await expect(
      authorization.authorize(createPrincipal({ permissions: ['orders:export'] }), createRequest()),
    ).resolves.toBe(false);
  });

  it('should allow administrators regardless of permissions', async () => {
    const { authorization } = createRegistries([createProductDefinition([])]);
    const admin = createPrincipal({ permissions: [], isAdministrator: true });

    await expect(authorization.authorize(admin, createRequest())).resolves.toBe(true);
  });

  it('should evaluate a custom policy with the principal and data query', async () => {
    const policy = vi.fn(async () => false);
    const { authorization } = createRegistries([
      createProductDefinition([], { authorizationPolicy: policy }),
    ]);
    const principal = createPrincipal();
    const request = createRequest({ dataQuery: { keyword: 'shoes' } });

    await expect(authorization.authorize(principal, request)).resolves.toBe(false);
    expect(policy).toHaveBeenCalledWith(principal, { keyword: 'shoes' });
  });

  it('should return the definition when ensureAuthorized passes', async () => {
    const definition = createProductDefinition([]);
    const { authorization } = createRegistries([definition]);

    const resolved = await authorization.ensureAuthorized(createPrincipal(), createRequest());

    expect(resolved.typeName).toBe('Catalog.Product');
  });

  it('should deny in ensureAuthorized whenever authorize does', async () => {
    const { authorization } = createRegistries([createProductDefinition([])]);
    const authorize = vi.spyOn(authorization, 'authorize').mockResolvedValue(false);
    const principal = createPrincipal();
    const request = createRequest();

    await expect(authorization.ensureAuthorized(principal, request)).rejects.toThrow(
      AuthorizationDeniedError,
    );
    expect(authorize).toHaveBeenCalledWith(principal, request);
  });

  it('should name the denying policy in AuthorizationDeniedError', async () => {
    const { authorization } = createRegistries([createProductDefinition([])]);
    const principal = createPrincipal({ permissions: [] });

    const error = await authorization
      .ensureAuthorized(principal, createRequest())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthorizationDeniedError);
    expect(error).toMatchObject({
      policyName: 'Catalog.ProductExportDataPolicy',
      statusCode: 401,
      message: 'Policy Catalog.ProductExportDataPolicy denied the request',
    });
  });

  it('should reject unknown export types', async () => {
    const { authorization } = createRegistries();

    await expect(
      authorization.ensureAuthorized(createPrincipal(), createRequest({ exportTypeName: 'Nope' })),
    ).rejects.toThrow(UnknownExportTypeError);
  });

  it('should build policy names from the type name', () => {
    expect(ExportAuthorizationService.policyNameFor('Orders.Order')).toBe(
      'Orders.OrderExportDataPolicy',
    );
  });
});
