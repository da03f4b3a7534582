/**
 * Release command
 * Runs the whole pipeline: version check, release record, every target
 */

import { Command, InvalidArgumentError } from 'commander';

import { ConfigError } from '../../pipeline/errors.js';
import { runReleasePipeline } from '../../pipeline/orchestrator.js';
import { GitRepository } from '../../pipeline/repository.js';
import { hostFromPlatform, selectTargets } from '../../pipeline/target-catalog.js';
import type { BranchResult, ReleaseRecord, TargetSpec } from '../../pipeline/types.js';
import {
  createBranchOptions,
  createReleaseEndpoint,
  gateOptions,
  loadCommandContext,
  type CommandContext,
} from '../context.js';
import {
  failSpinner,
  printInfo,
  printJson,
  printRunReport,
  printWarning,
  startSpinner,
  stopSpinner,
  succeedSpinner,
  updateSpinner,
} from '../output.js';

interface ReleaseOptions {
  targets?: string[];
  allTargets?: boolean;
  dryRun?: boolean;
  concurrency?: number;
  json?: boolean;
}

export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Targets for this run: named triples, the whole catalog, or what the
 * current runner can build
 */
export function chooseTargets(
  catalog: readonly TargetSpec[],
  options: Pick<ReleaseOptions, 'targets' | 'allTargets'>,
  platform: NodeJS.Platform = process.platform,
): TargetSpec[] {
  if (options.targets && options.targets.length > 0) {
    return selectTargets(catalog, { triples: options.targets });
  }
  if (options.allTargets) {
    return [...catalog];
  }
  const host = hostFromPlatform(platform);
  if (!host) {
    throw new ConfigError(`Unsupported runner platform ${platform}; pass --targets or --all-targets`);
  }
  return selectTargets(catalog, { host });
}

/** Warning for a release record left without some of its targets; nothing is rolled back */
export function partialReleaseWarning(report: {
  release?: ReleaseRecord;
  branches: ReadonlyArray<Pick<BranchResult, 'triple' | 'status'>>;
}): string | null {
  if (!report.release) return null;
  const missing = report.branches.filter((b) => b.status !== 'published').map((b) => b.triple);
  if (missing.length === 0) return null;
  return `${report.release.tag} is published without ${missing.length} of ${report.branches.length} target(s): ${missing.join(', ')}`;
}

async function runRelease(ctx: CommandContext, options: ReleaseOptions): Promise<boolean> {
  const targets = chooseTargets(ctx.catalog, options);
  const endpoint = createReleaseEndpoint(ctx, { dryRun: options.dryRun });
  const interactive = !options.json;
  let finished = 0;

  if (interactive) startSpinner('Checking version...');

  const report = await runReleasePipeline({
    ...createBranchOptions(ctx, endpoint),
    repo: new GitRepository(ctx.projectDir),
    targets,
    gate: gateOptions(ctx.config),
    tagPrefix: ctx.config.release.tag_prefix,
    concurrency: options.concurrency ?? ctx.config.build.concurrency,
    onDecision: (decision) => {
      if (interactive && decision.shouldRelease) updateSpinner(`Creating release for ${decision.version}...`);
    },
    onRelease: (record) => {
      if (interactive) updateSpinner(`Released ${record.tag}; building ${targets.length} target(s)...`);
    },
    onBranchComplete: (branch) => {
      finished++;
      if (interactive) updateSpinner(`Built ${finished}/${targets.length} (${branch.triple} ${branch.status})`);
    },
  }).catch((error: unknown) => {
    if (interactive) failSpinner('Release aborted');
    throw error;
  });
  await ctx.logger.flush();

  if (options.json) {
    printJson(report);
    return report.success;
  }

  if (!report.decision.shouldRelease) {
    stopSpinner();
  } else if (report.success) {
    succeedSpinner('Release complete');
  } else {
    failSpinner('Release finished with failures');
  }
  printRunReport(report);
  const warning = partialReleaseWarning(report);
  if (warning) printWarning(warning);
  if (options.dryRun && report.release) {
    printInfo(`Dry-run release written to ${report.release.uploadEndpoint}`);
  }
  return report.success;
}

export function createReleaseCommand(): Command {
  return new Command('release')
    .description('Check the version, cut the release and publish every target')
    .option('--targets <triples...>', 'Only build these target triples')
    .option('--all-targets', 'Build the whole catalog regardless of the runner OS')
    .option('--dry-run', 'Write the release under the state directory instead of GitHub')
    .option('-c, --concurrency <n>', 'Target branches built at once (0 = unlimited)', parseConcurrency)
    .option('--json', 'Output the run report as JSON')
    .action(async (options: ReleaseOptions) => {
      const ctx = await loadCommandContext();
      const success = await runRelease(ctx, options);
      if (!success) {
        process.exitCode = 1;
      }
    });
}
