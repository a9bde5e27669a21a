import { describe, it, expect, vi } from 'vitest';
import type { Request, Response } from 'express';
import asyncHandler from './asyncHandler';

const req = {} as Request;
const res = {} as Response;

describe('utils/asyncHandler', () => {
  it('passes thrown errors to next', async () => {
    const handler = asyncHandler(async () => {
      throw new Error('boom');
    });

    const next = vi.fn();
    await handler(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect((next.mock.calls[0][0] as Error).message).toBe('boom');
  });

  it('passes rejected promises to next', async () => {
    const handler = asyncHandler(async () => {
      return Promise.reject(new Error('nope'));
    });

    const next = vi.fn();
    await handler(req, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect((next.mock.calls[0][0] as Error).message).toBe('nope');
  });

  it('does not call next after a successful handler', async () => {
    const fn = vi.fn(async () => 'done');
    const handler = asyncHandler(fn);

    const next = vi.fn();
    await handler(req, res, next);

    expect(fn).toHaveBeenCalledWith(req, res, next);
    expect(next).not.toHaveBeenCalled();
  });
});
