import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
  UnauthorizedException
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { parseBearerToken, verifyJwt, type Audience, type JwtClaims } from '@fmops/auth';
import { IS_PUBLIC_KEY, REQUIRED_AUDIENCE_KEY, REQUIRED_CAPABILITIES_KEY } from './public.decorator.js';
import { expandCapabilitiesFromRoles } from './rbac.js';
import type { AuthenticatedRequest } from '../types.js';

const grantedCapabilities = (claims: JwtClaims): Set<string> =>
  new Set([...claims.capabilities, ...expandCapabilitiesFromRoles(claims.roles)]);

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    @Inject(Reflector) private readonly reflector: Reflector,
    @Inject('JWT_SECRET_VALUE') private readonly jwtSecret: string
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = parseBearerToken(request.headers.authorization);

    if (!token) {
      throw new UnauthorizedException('missing bearer token');
    }

    let claims: JwtClaims;
    try {
      claims = verifyJwt(token, this.jwtSecret);
    } catch {
      throw new UnauthorizedException('invalid bearer token');
    }

    const requiredAudience = this.reflector.getAllAndOverride<Audience | undefined>(REQUIRED_AUDIENCE_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (requiredAudience && claims.aud !== requiredAudience) {
      throw new UnauthorizedException('audience mismatch');
    }

    const requiredCapabilities = this.reflector.getAllAndOverride<string[] | undefined>(REQUIRED_CAPABILITIES_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    if (requiredCapabilities && requiredCapabilities.length > 0) {
      const capabilitySet = grantedCapabilities(claims);
      if (!capabilitySet.has('*')) {
        const missing = requiredCapabilities.filter((capability) => !capabilitySet.has(capability));
        if (missing.length > 0) {
          throw new ForbiddenException(`missing capabilities: ${missing.join(', ')}`);
        }
      }
    }

    request.claims = claims;
    return true;
  }
}
