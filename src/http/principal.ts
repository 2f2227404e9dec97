import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { ANONYMOUS_PRINCIPAL, Principal } from '../domain/model/principal';

export const USER_NAME_HEADER = 'x-user-name';
export const USER_PERMISSIONS_HEADER = 'x-user-permissions';
export const USER_ADMIN_HEADER = 'x-user-admin';

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value.join(',') : value;
}

/**
 * Identity forwarded by the upstream auth gateway
 */
export function principalFromHeaders(headers: IncomingHttpHeaders): Principal {
  const userName = headerValue(headers, USER_NAME_HEADER)?.trim();
  if (!userName) {
    return ANONYMOUS_PRINCIPAL;
  }

  const permissions = (headerValue(headers, USER_PERMISSIONS_HEADER) ?? '')
    .split(',')
    .map((permission) => permission.trim())
    .filter((permission) => permission.length > 0);

  return {
    userName,
    permissions,
    isAdministrator: headerValue(headers, USER_ADMIN_HEADER)?.trim().toLowerCase() === 'true',
  };
}

export function isAnonymous(principal: Principal): boolean {
  return principal === ANONYMOUS_PRINCIPAL;
}

export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Principal => {
    const request = context.switchToHttp().getRequest<{ headers: IncomingHttpHeaders }>();
    return principalFromHeaders(request.headers);
  },
);
