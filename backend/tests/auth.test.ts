import express, { type Request, type Response } from 'express';
import jwt from 'jsonwebtoken';
import { describe, expect, it, vi } from 'vitest';
import { HttpError } from '../src/errors.js';
import { requireAuth, requirePermission } from '../src/middleware/auth.js';

const SECRET = 'test-secret';

function buildRequest(authorization?: string): Request {
  const req: Request = Object.create(express.request);
  req.headers = authorization ? { authorization } : {};
  return req;
}

const res: Response = Object.create(express.response);

function authenticate(authorization: string | undefined) {
  const req = buildRequest(authorization);
  const next = vi.fn();
  requireAuth(SECRET)(req, res, next);
  return { req, next };
}

describe('requireAuth', () => {
  it('attaches the caller from a valid token', () => {
    const token = jwt.sign({ sub: 'ops', permissions: ['etl:run'] }, SECRET);

    const { req, next } = authenticate(`Bearer ${token}`);

    expect(next).toHaveBeenCalledWith();
    expect(req.user).toEqual({ id: 'ops', permissions: ['etl:run'] });
  });

  it('defaults missing permissions to none', () => {
    const { req } = authenticate(`Bearer ${jwt.sign({ sub: 'viewer' }, SECRET)}`);

    expect(req.user).toEqual({ id: 'viewer', permissions: [] });
  });

  it.each([
    ['no header', undefined, 'unauthorized'],
    ['a non-bearer scheme', 'Basic dGVzdDp0ZXN0', 'unauthorized'],
    ['a token signed with another secret', `Bearer ${jwt.sign({ sub: 'ops' }, 'other-secret')}`, 'invalid token'],
    ['a token without a subject', `Bearer ${jwt.sign({ permissions: ['*'] }, SECRET)}`, 'invalid token'],
    [
      'an expired token',
      `Bearer ${jwt.sign({ sub: 'ops', exp: Math.floor(Date.now() / 1000) - 60 }, SECRET)}`,
      'token expired',
    ],
  ])('rejects %s', (_label, authorization, message) => {
    const { req, next } = authenticate(authorization);

    const error: unknown = next.mock.calls[0][0];
    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ statusCode: 401, message });
    expect(req.user).toBeUndefined();
  });

  it('refuses every token when no secret is configured', () => {
    const req = buildRequest(`Bearer ${jwt.sign({ sub: 'ops' }, SECRET)}`);
    const next = vi.fn();

    requireAuth(undefined)(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 401, message: 'server misconfiguration' });
    expect(req.user).toBeUndefined();
  });
});

describe('requirePermission', () => {
  function check(permissions: string[] | null, ...required: string[]) {
    const req = buildRequest();
    if (permissions) {
      req.user = { id: 'ops', permissions };
    }
    const next = vi.fn();
    requirePermission(...required)(req, res, next);
    return next;
  }

  it('passes when the caller holds one of the permissions', () => {
    expect(check(['etl:read'], 'etl:read', 'etl:run')).toHaveBeenCalledWith();
  });

  it('treats * as every permission', () => {
    expect(check(['*'], 'etl:run')).toHaveBeenCalledWith();
  });

  it('forbids callers without the permission', () => {
    const next = check(['etl:read'], 'etl:run');

    expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 403, message: 'forbidden' });
  });

  it('requires authentication first', () => {
    const next = check(null, 'etl:run');

    expect(next.mock.calls[0][0]).toMatchObject({ statusCode: 401, message: 'unauthorized' });
  });
});
