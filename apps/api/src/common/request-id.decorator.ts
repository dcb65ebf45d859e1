import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ensureRequestId } from '@fmops/common';
import type { AuthenticatedRequest } from '../types.js';
import { REQUEST_ID_HEADER, headerValue } from './request-id.middleware.js';

export const RequestId = createParamDecorator((_: unknown, context: ExecutionContext): string => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  return ensureRequestId(headerValue(request.headers[REQUEST_ID_HEADER]));
});
