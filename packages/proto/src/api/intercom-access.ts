import { z } from 'zod';
import { IdSchema } from './common';

export const AccessPointParamsSchema = z.object({
  accessPointId: IdSchema,
});

export const AccessPointUserParamsSchema = AccessPointParamsSchema.extend({
  userId: IdSchema,
});

export const FaceImagesSchema = z.object({
  frontImageBase64: z.string(),
  leftImageBase64: z.string(),
  rightImageBase64: z.string(),
});

export const VerifyAccessRequestSchema = z
  .object({
    pin: z.string().max(200, 'Pin must be at most 200 characters').nullish(),
    face: FaceImagesSchema.nullish(),
    device: z.string().trim().max(255).optional(),
  })
  .strict();

export const VerifyAccessResponseSchema = z.object({
  granted: z.boolean(),
  reason: z.string(),
  credentialType: z.enum(['AccessCode', 'Master', 'TemporaryPin', 'User', 'Face', 'None']),
  credentialRefId: z.string().nullable(),
  timestamp: z.string().datetime(),
});

export const SetMasterPinRequestSchema = z.object({
  pin: z.string().min(1, 'Pin is required'),
});

export const SetOwnPinRequestSchema = z.object({
  newPin: z.string().min(1, 'New pin is required'),
  oldPin: z.string().optional(),
});

export const SetUserPinRequestSchema = z.object({
  pin: z.string().min(1, 'Pin is required'),
  masterPin: z.string().optional(),
});

export const CreateTemporaryPinRequestSchema = z.object({
  pin: z.string().min(1, 'Pin is required'),
  expiresAt: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
  maxUses: z.number().int().min(1).max(1000).default(1),
});

export const PinChangeResponseSchema = z.object({
  created: z.boolean(),
});

export type VerifyAccessRequest = z.infer<typeof VerifyAccessRequestSchema>;
export type VerifyAccessResponse = z.infer<typeof VerifyAccessResponseSchema>;
export type SetMasterPinRequest = z.infer<typeof SetMasterPinRequestSchema>;
export type SetOwnPinRequest = z.infer<typeof SetOwnPinRequestSchema>;
export type SetUserPinRequest = z.infer<typeof SetUserPinRequestSchema>;
export type CreateTemporaryPinRequest = z.infer<typeof CreateTemporaryPinRequestSchema>;
