/**
 * Command context
 * Turns the loaded configuration into the collaborators the pipeline needs
 */

import path from 'node:path';

import { loadConfig, resolveTargetCatalog, type Config } from '../config/index.js';
import { ConfigError } from '../pipeline/errors.js';
import {
  DirectoryReleaseEndpoint,
  GitHubReleaseEndpoint,
  type ReleaseEndpoint,
} from '../pipeline/release-endpoint.js';
import { ReleaseLogger } from '../pipeline/release-logger.js';
import { validateCatalog, type BinaryLayout } from '../pipeline/target-catalog.js';
import { CargoBuildInvoker, ShellToolchain } from '../pipeline/toolchain.js';
import type { BranchOptions } from '../pipeline/orchestrator.js';
import type { TargetSpec } from '../pipeline/types.js';
import type { VersionGateOptions } from '../pipeline/version-gate.js';

export interface CommandContext {
  projectDir: string;
  config: Config;
  stateDir: string;
  layout: BinaryLayout;
  catalog: TargetSpec[];
  logger: ReleaseLogger;
}

export async function loadCommandContext(projectDir: string = process.cwd()): Promise<CommandContext> {
  const config = await loadConfig(projectDir);
  const catalog = resolveTargetCatalog(config);

  const issues = validateCatalog(catalog, config.project.binary_name);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid target catalog:\n${issues.map((i) => `  ${i}`).join('\n')}`);
  }

  const stateDir = path.resolve(projectDir, config.project.state_dir);
  return {
    projectDir,
    config,
    stateDir,
    layout: {
      binaryName: config.project.binary_name,
      targetDir: config.project.target_dir,
      profile: config.project.profile,
    },
    catalog,
    logger: new ReleaseLogger(stateDir, { minLevel: config.output.log_level }),
  };
}

export function gateOptions(config: Config, env: NodeJS.ProcessEnv = process.env): VersionGateOptions {
  return {
    versionFile: config.project.version_file,
    versionField: config.project.version_field,
    releaseBranch: config.release.branch,
    // CI checkouts are usually detached; the runner names the branch
    detachedBranch: env.GITHUB_REF_NAME || null,
  };
}

/** Directory that --dry-run releases are written to */
export function dryRunReleaseDir(ctx: CommandContext): string {
  return path.join(ctx.stateDir, 'releases');
}

export function createReleaseEndpoint(
  ctx: CommandContext,
  options: { dryRun?: boolean; env?: NodeJS.ProcessEnv } = {},
): ReleaseEndpoint {
  if (options.dryRun) {
    return new DirectoryReleaseEndpoint(dryRunReleaseDir(ctx));
  }

  const { repository, token_env: tokenEnv, api_url: apiUrl } = ctx.config.release;
  if (!repository) {
    throw new ConfigError('release.repository is not set (or export GITHUB_REPOSITORY=owner/repo)');
  }
  const token = (options.env ?? process.env)[tokenEnv];
  if (!token) {
    throw new ConfigError(`No API token: ${tokenEnv} is not set`);
  }
  return new GitHubReleaseEndpoint({ repository, token, apiUrl });
}

/** Everything a target branch needs apart from the release endpoint */
export function createBranchOptions(ctx: CommandContext, endpoint: ReleaseEndpoint): BranchOptions {
  const { build } = ctx.config;
  return {
    toolchain: new ShellToolchain({
      cwd: ctx.projectDir,
      useSudo: build.use_sudo,
      crossInstallCommand: build.cross_install_command,
      timeouts: {
        toolchain: build.timeouts.toolchain * 1000,
        provision: build.timeouts.provision * 1000,
      },
    }),
    invoker: new CargoBuildInvoker({
      cwd: ctx.projectDir,
      profile: ctx.config.project.profile,
      timeoutMs: build.timeouts.build * 1000,
    }),
    projectDir: ctx.projectDir,
    layout: ctx.layout,
    manifestDir: path.join(ctx.stateDir, 'cross'),
    logger: ctx.logger,
    endpoint,
  };
}
