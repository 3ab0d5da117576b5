import { describe, it, expect } from 'vitest';
import {
  CreateAccessCodeRequestSchema,
  UpdateAccessCodeRequestSchema,
  ListAccessCodesQuerySchema,
} from '../api/access-code';
import { accessLogQuerySchema } from '../api/access-log';
import { EnrollFaceRequestSchema } from '../api/face-biometric';

describe('CreateAccessCodeRequestSchema', () => {
  it('defaults to a reusable code and parses dates', () => {
    const parsed = CreateAccessCodeRequestSchema.parse({
      buildingId: '7',
      code: '1234',
      expiresAt: '2026-12-01T00:00:00+02:00',
    });
    expect(parsed.isSingleUse).toBe(false);
    expect(parsed.expiresAt).toEqual(new Date('2026-11-30T22:00:00Z'));
    expect(parsed.validFrom).toBeUndefined();
  });

  it('rejects malformed dates', () => {
    expect(CreateAccessCodeRequestSchema.safeParse({ code: '1234', expiresAt: 'tomorrow' }).success).toBe(false);
  });
});

describe('UpdateAccessCodeRequestSchema', () => {
  it('requires at least one field', () => {
    expect(UpdateAccessCodeRequestSchema.safeParse({}).success).toBe(false);
    expect(UpdateAccessCodeRequestSchema.parse({ isSingleUse: true })).toEqual({ isSingleUse: true });
  });
});

describe('ListAccessCodesQuerySchema', () => {
  it('coerces pagination from the query string', () => {
    expect(ListAccessCodesQuerySchema.parse({ page: '2', pageSize: '5' })).toEqual({ page: 2, pageSize: 5 });
    expect(ListAccessCodesQuerySchema.parse({})).toEqual({ page: 1, pageSize: 20 });
    expect(ListAccessCodesQuerySchema.safeParse({ pageSize: '500' }).success).toBe(false);
  });
});

describe('accessLogQuerySchema', () => {
  it('parses filters and honours the configured page cap', () => {
    const schema = accessLogQuerySchema(50);
    expect(schema.parse({ success: 'false', credentialType: 'Face', codeId: '9' })).toEqual({
      page: 1,
      pageSize: 20,
      success: false,
      credentialType: 'Face',
      codeId: '9',
    });
    expect(schema.safeParse({ pageSize: '51' }).success).toBe(false);
    expect(schema.safeParse({ credentialType: 'Badge' }).success).toBe(false);
  });
});

describe('EnrollFaceRequestSchema', () => {
  it('requires device info', () => {
    const images = { frontImageBase64: 'a', leftImageBase64: 'b', rightImageBase64: 'c' };
    expect(EnrollFaceRequestSchema.safeParse(images).success).toBe(false);
    expect(EnrollFaceRequestSchema.parse({ ...images, deviceInfo: { platform: 'ios' } }).deviceInfo).toEqual({
      platform: 'ios',
    });
  });
});
