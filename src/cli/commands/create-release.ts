/**
 * Create-release command
 * Creates the release record for a version and optionally saves it for
 * later `build` invocations
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createVersionRelease } from '../../pipeline/release-ledger.js';
import { createReleaseEndpoint, loadCommandContext } from '../context.js';
import { printJson, printReleaseRecord, printSuccess } from '../output.js';

interface CreateReleaseOptions {
  out?: string;
  dryRun?: boolean;
  json?: boolean;
}

export function createCreateReleaseCommand(): Command {
  return new Command('create-release')
    .description('Create the release record for a version')
    .argument('<version>', 'Version to release (tagged with the configured prefix)')
    .option('-o, --out <file>', 'Write the release record as JSON to this file')
    .option('--dry-run', 'Create the release under the state directory instead of on GitHub')
    .option('--json', 'Output as JSON')
    .action(async (version: string, options: CreateReleaseOptions) => {
      const ctx = await loadCommandContext();
      const endpoint = createReleaseEndpoint(ctx, { dryRun: options.dryRun });

      const record = await createVersionRelease(version, endpoint, ctx.config.release.tag_prefix);
      await ctx.logger.stageComplete('release-ledger', `release ${record.tag}`, { tag: record.tag, url: record.htmlUrl });

      if (options.out) {
        const outPath = path.resolve(options.out);
        await fs.mkdir(path.dirname(outPath), { recursive: true });
        await fs.writeFile(outPath, JSON.stringify(record, null, 2) + '\n', 'utf-8');
      }

      if (options.json) {
        printJson(record);
        return;
      }

      printReleaseRecord(record);
      printSuccess(`Created release ${record.tag}`);
      if (options.out) {
        printSuccess(`Saved release record to ${options.out}`);
      }
    });
}
