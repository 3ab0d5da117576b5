import { z } from 'zod';
import { IdSchema } from './common';
import { FaceImagesSchema } from './intercom-access';

export const EnrollFaceRequestSchema = FaceImagesSchema.extend({
  deviceInfo: z.object({
    platform: z.string().min(1, 'Device platform is required'),
    model: z.string().max(100).optional(),
    appVersion: z.string().max(50).optional(),
  }),
});

export const RemoveFaceQuerySchema = z.object({
  userId: IdSchema.optional(),
});

export const FaceBiometricResponseSchema = z.object({
  id: z.string(),
  userId: z.string(),
  device: z
    .object({
      platform: z.enum(['android', 'ios']),
      model: z.string().nullable(),
      appVersion: z.string().nullable(),
    })
    .nullable(),
  enrolledAt: z.string().datetime(),
});

export type EnrollFaceRequest = z.infer<typeof EnrollFaceRequestSchema>;
export type FaceBiometricResponse = z.infer<typeof FaceBiometricResponseSchema>;
