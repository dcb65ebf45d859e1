import type { FastifyRequest } from 'fastify';
import type { JwtClaims } from '@fmops/auth';

export interface AuthenticatedRequest extends FastifyRequest {
  claims: JwtClaims;
}
