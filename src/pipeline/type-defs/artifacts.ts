/**
 * Build and artifact types: per-target results and the run report.
 */

import { z } from 'zod';
import { BranchStageSchema } from './enums.js';
import { StepResultSchema } from './checks.js';
import { TargetSpecSchema } from './targets.js';
import { ReleaseRecordSchema, UploadResultSchema } from './release.js';
import { ReleaseDecisionSchema } from './version.js';

// ─── Build Result ────────────────────────────────────────

export const BuildResultSchema = z.object({
  target: TargetSpecSchema,
  binaryPath: z.string(),
  success: z.boolean(),
  failedStep: BranchStageSchema.optional(),
  error: z.string().optional(),
  /** Candidate binaries found when the expected output is missing */
  diagnostics: z.array(z.string()),
  steps: z.array(StepResultSchema),
});
export type BuildResult = z.infer<typeof BuildResultSchema>;

// ─── Artifact ────────────────────────────────────────────

/** A packaged binary and its digest file */
export const ArtifactSchema = z.object({
  binaryPath: z.string(),
  fingerprintPath: z.string(),
  assetName: z.string(),
  fingerprintAssetName: z.string(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
});
export type Artifact = z.infer<typeof ArtifactSchema>;

// ─── Branch Result ───────────────────────────────────────

export const BranchResultSchema = z.object({
  triple: z.string(),
  assetName: z.string(),
  status: z.enum(['published', 'failed']),
  failedStage: BranchStageSchema.optional(),
  error: z.string().optional(),
  build: BuildResultSchema,
  artifact: ArtifactSchema.optional(),
  uploads: z.array(UploadResultSchema),
});
export type BranchResult = z.infer<typeof BranchResultSchema>;

// ─── Run Report ──────────────────────────────────────────

export const RunReportSchema = z.object({
  decision: ReleaseDecisionSchema,
  release: ReleaseRecordSchema.optional(),
  branches: z.array(BranchResultSchema),
  artifacts: z.array(ArtifactSchema),
  /** True when every scheduled branch published */
  success: z.boolean(),
  startedAt: z.string(),
  finishedAt: z.string(),
});
export type RunReport = z.infer<typeof RunReportSchema>;
