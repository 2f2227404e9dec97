import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  SetMetadata,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { IncomingHttpHeaders } from 'http';
import { hasAnyPermission } from '../../domain/model/principal';
import { isAnonymous, principalFromHeaders } from '../principal';

export const REQUIRED_PERMISSIONS_KEY = 'export:required-permissions';

/**
 * Route is allowed when the caller holds at least one of the permissions
 */
export const RequireAnyPermission = (...permissions: string[]) =>
  SetMetadata(REQUIRED_PERMISSIONS_KEY, permissions);

@Injectable()
export class PermissionsGuard implements CanActivate {
  private readonly logger = new Logger(PermissionsGuard.name);

  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required = this.reflector.getAllAndOverride<string[] | undefined>(
      REQUIRED_PERMISSIONS_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!required || required.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<{ headers: IncomingHttpHeaders }>();
    const principal = principalFromHeaders(request.headers);

    if (isAnonymous(principal)) {
      throw new UnauthorizedException();
    }
    if (!hasAnyPermission(principal, required)) {
      this.logger.warn(`${principal.userName} lacks any of [${required.join(', ')}]`);
      throw new ForbiddenException();
    }
    return true;
  }
}
