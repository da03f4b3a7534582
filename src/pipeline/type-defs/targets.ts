/**
 * Target catalog types: build targets and their auxiliary dependencies.
 */

import { z } from 'zod';
import { BuildStrategySchema, HostOsSchema } from './enums.js';

// ─── Auxiliary Dependencies ──────────────────────────────

export const AuxLibrarySchema = z.enum(['openssl']);
export type AuxLibrary = z.infer<typeof AuxLibrarySchema>;

/** A system library required before building a triple */
export const AuxDependencySchema = z.object({
  library: AuxLibrarySchema,
  /** Package architecture tag (amd64, arm64, i386, armhf) */
  architecture: z.string().min(1),
});
export type AuxDependency = z.infer<typeof AuxDependencySchema>;

// ─── Target Spec ─────────────────────────────────────────

export const TargetSpecSchema = z.object({
  triple: z.string().min(1),
  buildStrategy: BuildStrategySchema,
  host: HostOsSchema.default('linux'),
  /** Placeholders: {target_dir} {triple} {profile} {binary} {ext} */
  outputPathPattern: z.string().default('{target_dir}/{triple}/{profile}/{binary}{ext}'),
  /** Placeholders: {binary} {triple} {ext} */
  assetName: z.string().min(1),
  extension: z.string().default(''),
  auxDependencies: z.array(AuxDependencySchema).default([]),
});
export type TargetSpec = z.infer<typeof TargetSpecSchema>;
