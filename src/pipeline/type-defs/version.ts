/**
 * Version gate types: decision emitted by comparing two revisions.
 */

import { z } from 'zod';

// ─── Release Decision ────────────────────────────────────

export const ReleaseDecisionSchema = z.object({
  shouldRelease: z.boolean(),
  /** Marker at the tip revision ('' when absent) */
  version: z.string(),
  /** Marker at the immediate parent revision ('' when absent) */
  previousVersion: z.string(),
  tipRevision: z.string(),
  parentRevision: z.string().optional(),
  /** Why no release is cut, when shouldRelease is false */
  reason: z.string().optional(),
});
export type ReleaseDecision = z.infer<typeof ReleaseDecisionSchema>;
