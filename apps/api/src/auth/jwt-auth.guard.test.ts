import 'reflect-metadata';
import { ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host.js';
import { describe, expect, it } from 'vitest';
import { signJwt, type JwtClaims } from '@fmops/auth';
import { JwtAuthGuard } from './jwt-auth.guard.js';
import { Public, RequireAudience, RequireCapabilities } from './public.decorator.js';
import { Capabilities } from './rbac.js';

const secret = 'test-secret';
const tenantId = '11111111-1111-1111-1111-111111111111';

class TestController {
  @Public()
  health() {}

  @RequireCapabilities(Capabilities.workOrdersVerify)
  verify() {}

  @RequireAudience('worker')
  schedule() {}
}

const tokenFor = (overrides: Partial<JwtClaims> = {}): string =>
  signJwt({
    secret,
    claims: {
      sub: '22222222-2222-2222-2222-222222222222',
      tenant_id: tenantId,
      user_id: '22222222-2222-2222-2222-222222222222',
      aud: 'web',
      roles: [],
      capabilities: [],
      ...overrides
    }
  });

const contextFor = (handler: () => void, authorization?: string) => {
  const request: { headers: { authorization?: string }; claims?: JwtClaims } = {
    headers: authorization ? { authorization } : {}
  };
  return { request, context: new ExecutionContextHost([request, {}, () => undefined], TestController, handler) };
};

const guard = new JwtAuthGuard(new Reflector(), secret);

describe('JwtAuthGuard', () => {
  it('lets public routes through without a token', () => {
    const { context } = contextFor(TestController.prototype.health);
    expect(guard.canActivate(context)).toBe(true);
  });

  it('rejects a missing token', () => {
    const { context } = contextFor(TestController.prototype.verify);
    expect(() => guard.canActivate(context)).toThrowError(UnauthorizedException);
  });

  it('rejects a token signed with another secret', () => {
    const forged = signJwt({
      secret: 'other-secret',
      claims: { sub: 'x', tenant_id: tenantId, user_id: null, aud: 'web', roles: [], capabilities: [] }
    });
    const { context } = contextFor(TestController.prototype.verify, `Bearer ${forged}`);
    expect(() => guard.canActivate(context)).toThrowError(UnauthorizedException);
  });

  it('denies verification to a technician', () => {
    const { context } = contextFor(TestController.prototype.verify, `Bearer ${tokenFor({ roles: ['technician'] })}`);
    expect(() => guard.canActivate(context)).toThrowError(ForbiddenException);
  });

  it('grants verification through the supervisor role and attaches claims', () => {
    const { context, request } = contextFor(
      TestController.prototype.verify,
      `Bearer ${tokenFor({ roles: ['supervisor'] })}`
    );

    expect(guard.canActivate(context)).toBe(true);
    expect(request.claims?.tenant_id).toBe(tenantId);
  });

  it('grants verification through an explicit capability', () => {
    const { context } = contextFor(
      TestController.prototype.verify,
      `Bearer ${tokenFor({ capabilities: ['work_orders.verify'] })}`
    );
    expect(guard.canActivate(context)).toBe(true);
  });

  it('enforces the required audience', () => {
    const { context } = contextFor(TestController.prototype.schedule, `Bearer ${tokenFor({ aud: 'web' })}`);
    expect(() => guard.canActivate(context)).toThrowError(UnauthorizedException);
  });
});
