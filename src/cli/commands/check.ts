/**
 * Check command
 * Runs the version gate on its own
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';

import { GitRepository } from '../../pipeline/repository.js';
import type { ReleaseDecision } from '../../pipeline/types.js';
import { evaluateVersionGate } from '../../pipeline/version-gate.js';
import { gateOptions, loadCommandContext } from '../context.js';
import { printDecision, printJson, printSuccess } from '../output.js';

interface CheckOptions {
  githubOutput?: string;
  json?: boolean;
}

/**
 * Step outputs in the KEY=value form GitHub Actions reads
 */
export function formatGithubOutput(decision: ReleaseDecision): string {
  return `should_release=${decision.shouldRelease}\nversion=${decision.version}\n`;
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Decide whether the current commit cuts a release')
    .option('--github-output <file>', 'Append should_release and version to this step-output file')
    .option('--json', 'Output as JSON')
    .action(async (options: CheckOptions) => {
      const ctx = await loadCommandContext();
      const decision = await evaluateVersionGate(new GitRepository(ctx.projectDir), gateOptions(ctx.config));

      await ctx.logger.info('version-gate', 'decision', decision.shouldRelease
        ? `Version changed to ${decision.version}`
        : `No release: ${decision.reason ?? 'version unchanged'}`, { ...decision });

      if (options.githubOutput) {
        await fs.appendFile(options.githubOutput, formatGithubOutput(decision), 'utf-8');
      }

      if (options.json) {
        printJson(decision);
        return;
      }

      printDecision(decision);
      if (options.githubOutput) {
        printSuccess(`Wrote step outputs to ${options.githubOutput}`);
      }
    });
}
