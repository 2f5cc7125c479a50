import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import { AuthenticatedRequest } from '../authenticated-request';

/**
 * Injects the principal authenticated by SignedRequestGuard
 */
export const Caller = createParamDecorator((_data: unknown, context: ExecutionContext): string => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.principal) {
    throw new UnauthorizedException('Request is not signed');
  }
  return request.principal;
});
