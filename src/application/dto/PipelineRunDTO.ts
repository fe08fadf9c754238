import { z } from 'zod';
import { TIME_WINDOWS } from '../../domain/entities/Signal.js';
import { IsoDateSchema } from './LedgerDTO.js';

export const TimeWindowSchema = z.enum(TIME_WINDOWS);

export const PipelineRunRequestSchema = z.object({
  timeWindows: z.array(TimeWindowSchema).min(1).optional(),
  userIds: z.array(z.string().min(1)).min(1).optional(),
  asOf: IsoDateSchema.optional(),
});

export const WindowQuerySchema = z.object({
  window: TimeWindowSchema.default('30d'),
});

export type PipelineRunRequestDTO = z.infer<typeof PipelineRunRequestSchema>;
