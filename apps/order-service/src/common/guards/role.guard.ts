import { CanActivate, ExecutionContext, Inject, Injectable, SetMetadata, createParamDecorator } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { ActorRole } from '@marketplace/shared';
import { CallerIdentity, IDENTITY_CLIENT, IdentityClient } from '../../collaborators/identity.client';
import { EngineException, ErrorCode, ErrorKind } from '../errors/engine.exception';

export const ROLES_KEY = 'roles';

export type AuthenticatedRequest = Request & { caller?: CallerIdentity };

/** Restricts a handler to the listed roles. No metadata means any authenticated caller. */
export const Roles = (...roles: ActorRole[]) => SetMetadata(ROLES_KEY, roles);

export const Caller = createParamDecorator((_data: unknown, context: ExecutionContext): CallerIdentity => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.caller) {
    throw new EngineException(ErrorKind.AUTHORIZATION, ErrorCode.UNAUTHENTICATED, 'Caller identity was not resolved');
  }
  return request.caller;
});

/**
 * Resolves the bearer token through the identity collaborator and keeps only the
 * resulting user id and role on the request; the raw token goes no further.
 */
@Injectable()
export class RoleGuard implements CanActivate {
  constructor(
    @Inject(IDENTITY_CLIENT) private readonly identityClient: IdentityClient,
    private readonly reflector: Reflector,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new EngineException(
        ErrorKind.AUTHORIZATION,
        ErrorCode.UNAUTHENTICATED,
        'Missing or invalid authorization header',
      );
    }

    const identity = await this.identityClient.resolve(authHeader.substring(7));
    if (!identity) {
      throw new EngineException(ErrorKind.AUTHORIZATION, ErrorCode.UNAUTHENTICATED, 'Invalid token');
    }
    request.caller = identity;

    const roles = this.reflector.getAllAndOverride<ActorRole[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (roles && roles.length > 0 && !roles.includes(identity.role)) {
      throw new EngineException(
        ErrorKind.AUTHORIZATION,
        ErrorCode.ROLE_NOT_PERMITTED,
        `Role ${identity.role} may not call this endpoint`,
        { role: identity.role },
      );
    }
    return true;
  }
}
