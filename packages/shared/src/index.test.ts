import { describe, expect, it } from 'vitest';
import { AppError, ERR, describeError } from './index';

describe('AppError', () => {
  it('carries code, message and a default exit status of 1', () => {
    const err = new AppError(ERR.OUT_OF_BOUNDS, 'off the board');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('AppError');
    expect(err.code).toBe(1003);
    expect(err.message).toBe('off the board');
    expect(err.status).toBe(1);
  });

  it('accepts an explicit exit status', () => {
    expect(new AppError(ERR.INVALID_PARAM, 'bad flag', 2).status).toBe(2);
  });
});

describe('describeError', () => {
  it('uses the message of Error values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
