/**
 * Pipeline core enums: build strategies, runner hosts, stages.
 */

import { z } from 'zod';

// ─── Build Strategies ────────────────────────────────────

export const BuildStrategySchema = z.enum([
  'native',
  'emulated-cross',
  'sandboxed',
]);
export type BuildStrategy = z.infer<typeof BuildStrategySchema>;

// ─── Runner Hosts ────────────────────────────────────────

/** Operating system of the runner a target is built on */
export const HostOsSchema = z.enum(['linux', 'macos', 'windows']);
export type HostOs = z.infer<typeof HostOsSchema>;

// ─── Pipeline Stages ─────────────────────────────────────

export const PipelineStageSchema = z.enum([
  'version-gate',
  'release-ledger',
  'toolchain',
  'provision',
  'build',
  'verify',
  'package',
  'publish',
]);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

/** Stages at which a single target branch can fail */
export const BranchStageSchema = z.enum([
  'toolchain',
  'provision',
  'build',
  'verify',
  'package',
  'publish',
]);
export type BranchStage = z.infer<typeof BranchStageSchema>;
