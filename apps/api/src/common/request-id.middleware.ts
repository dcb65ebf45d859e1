import type { NestMiddleware } from '@nestjs/common';
import { Inject, Injectable } from '@nestjs/common';
import type { ServerResponse } from 'node:http';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ensureRequestId, type Logger } from '@fmops/common';

export const REQUEST_ID_HEADER = 'x-request-id';

export const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  constructor(@Inject('APP_LOGGER') private readonly logger: Logger) {}

  use(req: FastifyRequest & { requestId?: string }, res: FastifyReply | ServerResponse, next: () => void) {
    const requestId = ensureRequestId(headerValue(req.headers[REQUEST_ID_HEADER]));
    const response = 'raw' in res ? res.raw : res;

    // Fastify hands middleware the raw request; handlers read the id back from the header.
    req.headers[REQUEST_ID_HEADER] = requestId;
    req.requestId = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);

    this.logger.info('request_received', {
      request_id: requestId,
      method: req.method,
      path: req.url
    });

    response.on('finish', () => {
      this.logger.info('request_completed', {
        request_id: requestId,
        method: req.method,
        path: req.url,
        status_code: response.statusCode
      });
    });

    next();
  }
}
