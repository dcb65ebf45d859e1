import { describe, expect, it } from 'vitest';
import { actorFromClaims, parseBearerToken, signJwt, verifyJwt, type JwtClaims } from './index.js';

const claims: JwtClaims = {
  sub: '33333333-3333-3333-3333-333333333333',
  tenant_id: '11111111-1111-1111-1111-111111111111',
  user_id: '33333333-3333-3333-3333-333333333333',
  aud: 'mobile',
  roles: ['technician'],
  capabilities: ['work_orders.read', 'work_orders.execute']
};

describe('jwt helpers', () => {
  it('round-trips claims', () => {
    const token = signJwt({ claims, secret: 'test-secret' });
    expect(verifyJwt(token, 'test-secret')).toMatchObject(claims);
  });

  it('rejects a token signed with another secret', () => {
    const token = signJwt({ claims, secret: 'test-secret' });
    expect(() => verifyJwt(token, 'other-secret')).toThrow();
  });

  it('parses bearer headers only', () => {
    expect(parseBearerToken('Bearer abc')).toBe('abc');
    expect(parseBearerToken('bearer abc')).toBe('abc');
    expect(parseBearerToken('Basic abc')).toBeNull();
    expect(parseBearerToken(undefined)).toBeNull();
  });
});

describe('actorFromClaims', () => {
  it('normalises empty ids to null', () => {
    expect(actorFromClaims({ ...claims, tenant_id: '', user_id: null })).toEqual({ tenantId: null, userId: null });
    expect(actorFromClaims(claims)).toEqual({
      tenantId: '11111111-1111-1111-1111-111111111111',
      userId: '33333333-3333-3333-3333-333333333333'
    });
  });
});
