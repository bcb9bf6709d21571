import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';

/** Shape JwtStrategy.validate puts on request.user. */
export interface AuthUser {
  userId: string;
  username: string;
}

function isAuthUser(value: unknown): value is AuthUser {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'string' &&
    'username' in value &&
    typeof value.username === 'string'
  );
}

/**
 * Extracts the authenticated user set by JwtAuthGuard.
 * Used on every owner-scoped route.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthUser => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!isAuthUser(request.user)) throw new UnauthorizedException();
    return request.user;
  },
);
