import { describe, it, expect, vi } from 'vitest';
import type { Request, Response } from 'express';
import type { JwtPayload } from './jwt.js';
import { auditContextMiddleware, getAuditContext } from './audit-context.js';

// ─── Helpers ────────────────────────────────────────────────────────

function createMockReq(overrides?: {
  user?: JwtPayload;
  headers?: Record<string, string | string[]>;
  remoteAddress?: string;
}): Request {
  const req = {
    user: overrides?.user,
    headers: overrides?.headers ?? {},
    socket: { remoteAddress: overrides?.remoteAddress ?? '127.0.0.1' },
  };
  return req as unknown as Request;
}

function run(req: Request) {
  const next = vi.fn();
  auditContextMiddleware(req, {} as Response, next);
  return { context: getAuditContext(req), next };
}

// ─── Tests ──────────────────────────────────────────────────────────

describe('auditContextMiddleware', () => {
  it('attaches user id, user agent and socket address', () => {
    const { context, next } = run(
      createMockReq({
        user: { sub: 'user-123', username: 'bodega1', role: 'approver' },
        headers: { 'user-agent': 'TestBrowser/1.0' },
        remoteAddress: '10.0.0.1',
      }),
    );

    expect(context).toEqual({ userId: 'user-123', ipAddress: '10.0.0.1', userAgent: 'TestBrowser/1.0' });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('prefers the first X-Forwarded-For entry', () => {
    const { context } = run(createMockReq({ headers: { 'x-forwarded-for': '203.0.113.50, 70.41.3.18' } }));
    expect(context.ipAddress).toBe('203.0.113.50');
  });

  it('handles an array X-Forwarded-For header', () => {
    const { context } = run(createMockReq({ headers: { 'x-forwarded-for': ['198.51.100.1', '70.41.3.18'] } }));
    expect(context.ipAddress).toBe('198.51.100.1');
  });

  it('truncates the address to 45 and the user agent to 500 characters', () => {
    const { context } = run(
      createMockReq({ headers: { 'x-forwarded-for': 'a'.repeat(50), 'user-agent': 'b'.repeat(600) } }),
    );
    expect(context.ipAddress).toHaveLength(45);
    expect(context.userAgent).toHaveLength(500);
  });

  it('leaves userId undefined without an authenticated user', () => {
    const { context } = run(createMockReq({ headers: { 'user-agent': ['Agent1', 'Agent2'] } }));
    expect(context.userId).toBeUndefined();
    expect(context.userAgent).toBe('Agent1');
  });
});

describe('getAuditContext', () => {
  it('returns an empty context when the middleware did not run', () => {
    expect(getAuditContext(createMockReq())).toEqual({});
  });
});
