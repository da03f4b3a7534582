/**
 * Build command
 * Runs one target branch (build, package, publish) against a saved release record
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';

import { ConfigError, errorMessage } from '../../pipeline/errors.js';
import { runTargetBranch } from '../../pipeline/orchestrator.js';
import { findTarget } from '../../pipeline/target-catalog.js';
import { ReleaseRecordSchema, type ReleaseRecord } from '../../pipeline/types.js';
import { createBranchOptions, createReleaseEndpoint, loadCommandContext } from '../context.js';
import {
  failSpinner,
  printBranchResult,
  printJson,
  startSpinner,
  succeedSpinner,
} from '../output.js';

interface BuildOptions {
  target: string;
  record: string;
  dryRun?: boolean;
  json?: boolean;
}

/**
 * Read a release record written by `create-release --out`
 */
export async function readReleaseRecord(recordPath: string): Promise<ReleaseRecord> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(recordPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read release record ${recordPath}: ${errorMessage(error)}`);
  }
  const parsed = ReleaseRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${recordPath} is not a release record: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function createBuildCommand(): Command {
  return new Command('build')
    .description('Build, fingerprint and publish a single target')
    .requiredOption('-t, --target <triple>', 'Target triple from the catalog')
    .requiredOption('-r, --record <file>', 'Release record written by create-release --out')
    .option('--dry-run', 'Upload into the local release directory instead of GitHub')
    .option('--json', 'Output as JSON')
    .action(async (options: BuildOptions) => {
      const ctx = await loadCommandContext();
      const target = findTarget(options.target, ctx.catalog);
      if (!target) {
        throw new ConfigError(`Unknown target: ${options.target}`);
      }

      const record = await readReleaseRecord(options.record);
      const endpoint = createReleaseEndpoint(ctx, { dryRun: options.dryRun });

      if (!options.json) startSpinner(`Building ${target.triple}...`);
      const result = await runTargetBranch(target, record, createBranchOptions(ctx, endpoint));
      await ctx.logger.flush();

      if (options.json) {
        printJson(result);
      } else if (result.status === 'published') {
        succeedSpinner(`Published ${result.assetName} to ${record.tag}`);
      } else {
        failSpinner(`${target.triple} failed`);
        printBranchResult(result);
      }

      if (result.status !== 'published') {
        process.exitCode = 1;
      }
    });
}
