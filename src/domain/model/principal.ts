/**
 * The caller an export request is evaluated against.
 * Authentication happens upstream; the core only reads the resolved identity.
 */
export interface Principal {
  readonly userName: string;
  readonly permissions: ReadonlyArray<string>;
  readonly isAdministrator: boolean;
}

export const ANONYMOUS_PRINCIPAL: Principal = Object.freeze({
  userName: 'anonymous',
  permissions: Object.freeze([]),
  isAdministrator: false,
});

export function hasPermission(principal: Principal, permission: string): boolean {
  return principal.isAdministrator || principal.permissions.includes(permission);
}

export function hasAnyPermission(
  principal: Principal,
  permissions: ReadonlyArray<string>,
): boolean {
  return permissions.some((permission) => hasPermission(principal, permission));
}
