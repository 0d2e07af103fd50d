import { z } from 'zod';

export const RefreshTokenResponseSchema = z.object({
  token: z.string().min(1),
  tier: z.string().optional(),
  expires_at: z.number().int().min(0).nullable().optional(),
});

export type RefreshTokenResponse = z.infer<typeof RefreshTokenResponseSchema>;

export const ApiErrorBodySchema = z.object({
  detail: z.string().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
});

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
