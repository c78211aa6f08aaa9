import { describe, it, expect } from 'vitest';
import { agentIdFromToken, decodeJwtClaims, secondsUntilExpiry } from './jwt.js';

function jwt(claims: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none', typ: 'JWT' })}.${encode(claims)}.signature`;
}

describe('decodeJwtClaims', () => {
  it('should return the payload claims', () => {
    expect(decodeJwtClaims(jwt({ sub: 'user-1', agent_id: 'agent-7' }))).toEqual({
      sub: 'user-1',
      agent_id: 'agent-7',
    });
  });

  it('should return null for opaque tokens', () => {
    expect(decodeJwtClaims('opaque-access-token')).toBeNull();
    expect(decodeJwtClaims('a.b.c')).toBeNull();
  });

  it('should return null for encrypted tokens', () => {
    expect(decodeJwtClaims('a.b.c.d.e')).toBeNull();
  });

  it('should return null when the payload is not an object', () => {
    const payload = Buffer.from('[1,2]').toString('base64url');
    expect(decodeJwtClaims(`x.${payload}.y`)).toBeNull();
  });
});

describe('secondsUntilExpiry', () => {
  it('should count down to the exp claim', () => {
    expect(secondsUntilExpiry(jwt({ exp: 1_000 }), 400_000)).toBe(600);
  });

  it('should not go below zero', () => {
    expect(secondsUntilExpiry(jwt({ exp: 1_000 }), 2_000_000)).toBe(0);
  });

  it('should return null without exp', () => {
    expect(secondsUntilExpiry(jwt({ sub: 'x' }))).toBeNull();
  });
});

describe('agentIdFromToken', () => {
  it('should read string and numeric agent ids', () => {
    expect(agentIdFromToken(jwt({ agent_id: 'agent-7' }))).toBe('agent-7');
    expect(agentIdFromToken(jwt({ agent_id: 42 }))).toBe('42');
  });

  it('should return null when absent', () => {
    expect(agentIdFromToken(jwt({ sub: 'x' }))).toBeNull();
    expect(agentIdFromToken('opaque')).toBeNull();
  });
});
