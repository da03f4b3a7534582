/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

import { AuxLibrarySchema, BuildStrategySchema, HostOsSchema } from '../pipeline/types.js';

/**
 * Project layout: what is built and where the version is declared
 */
export const ProjectSettingsSchema = z.object({
  binary_name: z.string().min(1).default('omni'),
  version_file: z.string().min(1).default('Cargo.toml'),
  version_field: z.string().min(1).default('version'),
  target_dir: z.string().min(1).default('target'),
  profile: z.string().min(1).default('release'),
  /** Release log, cross manifests and dry-run releases live here */
  state_dir: z.string().min(1).default('.binship'),
});

/**
 * Release endpoint settings
 */
export const ReleaseSettingsSchema = z.object({
  /** Only this branch cuts releases; null turns the check off */
  branch: z.string().min(1).nullable().default('main'),
  /** owner/repo on GitHub */
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo').optional(),
  api_url: z.string().url().default('https://api.github.com'),
  /** Environment variable holding the API token */
  token_env: z.string().min(1).default('GITHUB_TOKEN'),
  tag_prefix: z.string().default('v'),
});

/**
 * Per-step timeouts in seconds
 */
export const TimeoutSettingsSchema = z.object({
  toolchain: z.number().int().positive().default(900),
  provision: z.number().int().positive().default(900),
  build: z.number().int().positive().default(3600),
});

export const BuildSettingsSchema = z.object({
  /** Target branches built at once; 0 means no limit */
  concurrency: z.number().int().min(0).default(4),
  /** Prefix host package-manager commands with sudo */
  use_sudo: z.boolean().default(true),
  cross_install_command: z.string().min(1).default('cargo install cross --git https://github.com/cross-rs/cross'),
  timeouts: TimeoutSettingsSchema.default({}),
});

/**
 * A target as written in a config file
 */
export const TargetOverrideSchema = z.object({
  triple: z.string().min(1),
  build_strategy: BuildStrategySchema,
  host: HostOsSchema.default('linux'),
  output_path_pattern: z.string().min(1).optional(),
  asset_name: z.string().min(1),
  extension: z.string().default(''),
  aux_dependencies: z.array(z.object({
    library: AuxLibrarySchema,
    architecture: z.string().min(1),
  })).default([]),
});

export const OutputSettingsSchema = z.object({
  /** Minimum level written to the release log */
  log_level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  project: ProjectSettingsSchema.default({}),
  release: ReleaseSettingsSchema.default({}),
  build: BuildSettingsSchema.default({}),
  /** Replaces the built-in target catalog when present */
  targets: z.array(TargetOverrideSchema).min(1).optional(),
  output: OutputSettingsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProjectSettings = z.infer<typeof ProjectSettingsSchema>;
export type ReleaseSettings = z.infer<typeof ReleaseSettingsSchema>;
export type BuildSettings = z.infer<typeof BuildSettingsSchema>;
export type TargetOverride = z.infer<typeof TargetOverrideSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
