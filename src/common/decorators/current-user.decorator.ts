import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';

/** Subject of the bearer token, as set by JwtStrategy. */
export const CurrentUserId = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const user: unknown = request.user;

  if (typeof user === 'object' && user !== null && 'userId' in user && typeof user.userId === 'string') {
    return user.userId;
  }
  throw new UnauthorizedException();
});
