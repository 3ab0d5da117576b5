import { describe, it, expect } from 'vitest';
import { AppError, ErrorCode } from '../errors';

describe('AppError', () => {
  it('creates an error with correct properties', () => {
    const err = new AppError(ErrorCode.NOT_FOUND, 'Access point not found', { accessPointId: '12' });

    expect(err.code).toBe(ErrorCode.NOT_FOUND);
    expect(err.message).toBe('Access point not found');
    expect(err.httpStatus).toBe(404);
    expect(err.safeMeta).toEqual({ accessPointId: '12' });
    expect(err.name).toBe('AppError');
  });

  it('maps all error codes to HTTP statuses', () => {
    const mappings: [ErrorCode, number][] = [
      [ErrorCode.INTERNAL, 500],
      [ErrorCode.NOT_FOUND, 404],
      [ErrorCode.UNAUTHORIZED, 401],
      [ErrorCode.FORBIDDEN, 403],
      [ErrorCode.VALIDATION, 422],
      [ErrorCode.RATE_LIMITED, 429],
      [ErrorCode.BAD_REQUEST, 400],
    ];

    for (const [code, expectedStatus] of mappings) {
      expect(new AppError(code, 'test').httpStatus).toBe(expectedStatus);
    }
  });

  it('serializes to JSON without internal details', () => {
    const json = new AppError(ErrorCode.FORBIDDEN, 'Not allowed.', { buildingId: '7' }).toJSON();

    expect(json).toEqual({ code: 'FORBIDDEN', message: 'Not allowed.', buildingId: '7' });
    expect(json).not.toHaveProperty('stack');
    expect(json).not.toHaveProperty('httpStatus');
  });

  it('is an instance of Error', () => {
    const err = new AppError(ErrorCode.BAD_REQUEST, 'bad');
    expect(err).toBeInstanceOf(Error);
    expect(err.safeMeta).toEqual({});
  });
});
