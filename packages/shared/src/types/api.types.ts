import type { z } from 'zod';
import type { apiErrorSchema, healthResponseSchema } from '../schemas/common.schema.js';

export type ApiErrorResponse = z.infer<typeof apiErrorSchema>;
export type HealthResponse = z.infer<typeof healthResponseSchema>;
