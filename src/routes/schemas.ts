import { z } from 'zod';

export const DEFAULT_LOG_LINES = 50;

export const logsQuerySchema = z.object({
  lines: z.coerce
    .number({ invalid_type_error: 'lines must be a number' })
    .int('lines must be an integer')
    .min(0, 'lines must not be negative')
    .default(DEFAULT_LOG_LINES),
});

export const startParamsSchema = z.object({
  modelId: z.string().min(1, 'Model id is required'),
});

export type LogsQuery = z.infer<typeof logsQuerySchema>;
export type StartParams = z.infer<typeof startParamsSchema>;
