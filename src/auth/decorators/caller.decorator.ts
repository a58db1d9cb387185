import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';

export interface AuthenticatedCaller {
  address: string;
}

/**
 * Checksummed address of the authenticated caller
 */
export const Caller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<Request & { user?: AuthenticatedCaller }>();
  if (!request.user) {
    throw new UnauthorizedException('Missing caller identity');
  }
  return request.user.address;
});
