/**
 * Cross manifest: per-target Cross.toml listing the pre-build commands that
 * install architecture-qualified system libraries inside the emulation image.
 *
 * Each target gets its own file (handed to cross through CROSS_CONFIG) so
 * concurrent branches never share one manifest.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { AUX_LIBRARIES } from './target-catalog.js';
import type { TargetSpec } from './types.js';

/** Commands run inside the cross image before the build */
export function crossPreBuildCommands(target: TargetSpec): string[] {
  if (target.auxDependencies.length === 0) return [];

  const architectures = [...new Set(target.auxDependencies.map((d) => d.architecture))];
  const packages = [...new Set(
    target.auxDependencies.map((d) => `${AUX_LIBRARIES[d.library].crossPackage}:${d.architecture}`),
  )];

  return [
    ...architectures.map((arch) => `dpkg --add-architecture ${arch}`),
    'apt-get update',
    `apt-get install -y ${packages.join(' ')}`,
  ];
}

function tomlKey(key: string): string {
  return /^[A-Za-z0-9_-]+$/.test(key) ? key : JSON.stringify(key);
}

/** Render the manifest; null when the target has nothing to pre-install */
export function renderCrossManifest(target: TargetSpec): string | null {
  const commands = crossPreBuildCommands(target);
  if (commands.length === 0) return null;

  const lines = [
    `[target.${tomlKey(target.triple)}]`,
    'pre-build = [',
    ...commands.map((c) => `    ${JSON.stringify(c)},`),
    ']',
    '',
  ];
  return lines.join('\n');
}

/** Write the manifest under dir; resolves to its path, or null if none is needed */
export async function writeCrossManifest(target: TargetSpec, dir: string): Promise<string | null> {
  const content = renderCrossManifest(target);
  if (content === null) return null;

  await fs.mkdir(dir, { recursive: true });
  const manifestPath = path.join(dir, `${target.triple}.toml`);
  await fs.writeFile(manifestPath, content, 'utf-8');
  return manifestPath;
}
