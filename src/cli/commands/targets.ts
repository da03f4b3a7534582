/**
 * Targets and manifest commands
 * Inspect the target catalog in effect
 */

import { Command, InvalidArgumentError } from 'commander';

import { renderCrossManifest } from '../../pipeline/cross-manifest.js';
import { ConfigError } from '../../pipeline/errors.js';
import {
  findTarget,
  resolveAssetName,
  resolveBinaryPath,
  selectTargets,
} from '../../pipeline/target-catalog.js';
import { HostOsSchema, type HostOs } from '../../pipeline/types.js';
import { loadCommandContext } from '../context.js';
import { printHeader, printInfo, printJson, printTargets } from '../output.js';

interface TargetsOptions {
  json?: boolean;
  host?: HostOs;
}

function parseHost(value: string): HostOs {
  const parsed = HostOsSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${HostOsSchema.options.join(', ')}.`);
  }
  return parsed.data;
}

export function createTargetsCommand(): Command {
  return new Command('targets')
    .description('List the build targets')
    .option('--host <os>', 'Only targets a runner of this OS can build (linux, macos, windows)', parseHost)
    .option('--json', 'Output as JSON')
    .action(async (options: TargetsOptions) => {
      const ctx = await loadCommandContext();
      const targets = selectTargets(ctx.catalog, { host: options.host });

      if (options.json) {
        printJson(targets.map((t) => ({
          ...t,
          assetName: resolveAssetName(t, ctx.layout.binaryName),
          binaryPath: resolveBinaryPath(t, ctx.layout),
        })));
        return;
      }

      printHeader(`Targets${options.host ? ` for ${options.host} runners` : ''}`);
      printTargets(targets, (t) => resolveAssetName(t, ctx.layout.binaryName));
    });
}

export function createManifestCommand(): Command {
  return new Command('manifest')
    .description('Print the cross manifest generated for a target')
    .argument('<triple>', 'Target triple')
    .action(async (triple: string) => {
      const ctx = await loadCommandContext();
      const target = findTarget(triple, ctx.catalog);
      if (!target) {
        throw new ConfigError(`Unknown target: ${triple}`);
      }

      const manifest = renderCrossManifest(target);
      if (target.buildStrategy !== 'emulated-cross' || manifest === null) {
        printInfo(`${triple} needs no cross manifest`);
        return;
      }
      process.stdout.write(manifest);
    });
}
