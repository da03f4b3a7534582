/**
 * Step result types: outcome of one external command.
 */

import { z } from 'zod';
import { PipelineStageSchema } from './enums.js';

// ─── Step Result ─────────────────────────────────────────

export const StepResultSchema = z.object({
  step: PipelineStageSchema,
  status: z.enum(['pass', 'fail', 'skip']),
  command: z.string(),
  exit_code: z.number().int(),
  stderr_summary: z.string().optional(),
  duration_ms: z.number(),
  timestamp: z.string(),
});
export type StepResult = z.infer<typeof StepResultSchema>;
