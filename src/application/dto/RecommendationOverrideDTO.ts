import { z } from 'zod';

export const RecommendationOverrideSchema = z.object({
  reason: z.string().trim().min(1),
  operatorId: z.string().trim().min(1),
});

export const ToneCheckRequestSchema = z.object({
  text: z.string(),
});

export const OperatorActionQuerySchema = z.object({
  userId: z.string().min(1).optional(),
});
