/**
 * validation.test.ts
 * Tests for request body validation
 */

import type { NextFunction, Request, Response } from 'express';
import { describe, it, expect, vi } from 'vitest';

import { generateRequestSchema, validateBody } from '../../src/middleware/validation.js';

function run(body: unknown) {
  const req = { body } as Request;
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  const next: NextFunction = vi.fn();

  validateBody(generateRequestSchema)(req, res as unknown as Response, next);
  return { req, res, next };
}

describe('validateBody', () => {
  it('passes a valid body through', () => {
    const { req, res, next } = run({ prompt: 'hi', modelType: 'alpha', maxTokens: 10 });

    expect(next).toHaveBeenCalledOnce();
    expect(res.status).not.toHaveBeenCalled();
    expect(req.body).toEqual({ prompt: 'hi', modelType: 'alpha', maxTokens: 10 });
  });

  it('strips unknown fields', () => {
    const { req } = run({ prompt: 'hi', modelType: 'alpha', stream: true });

    expect(req.body).toEqual({ prompt: 'hi', modelType: 'alpha' });
  });

  it('answers 400 with field details', () => {
    const { res, next } = run({ prompt: 'hi', modelType: 'alpha', temperature: 5 });

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Validation failed',
      details: [
        { field: 'temperature', message: 'Number must be less than or equal to 2' },
      ],
    });
  });

  it('rejects a missing body', () => {
    const { res } = run(undefined);

    expect(res.status).toHaveBeenCalledWith(400);
  });
});
