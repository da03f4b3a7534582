/**
 * Target Catalog: static table of build targets.
 *
 * Behaviour that depends on the build strategy lives in STRATEGY_PROFILES
 * and per-library packaging lives in AUX_LIBRARIES, so adding a target is a
 * data change. Targets carry no ordering between them.
 */

import { ConfigError } from './errors.js';
import { TargetSpecSchema } from './types.js';
import type {
  AuxLibrary,
  BuildStrategy,
  HostOs,
  TargetSpec,
} from './types.js';
import type { z } from 'zod';

// ─── Strategy Profiles ───────────────────────────────────

export interface StrategyProfile {
  /** How auxiliary dependencies are provisioned */
  provisioning: 'host-package-manager' | 'cross-manifest' | 'none';
  /** How the build is invoked */
  execution: 'direct' | 'emulation-wrapper';
  /** Runner operating systems the strategy can build on */
  hosts: readonly HostOs[];
  allowsAuxDependencies: boolean;
}

export const STRATEGY_PROFILES: Record<BuildStrategy, StrategyProfile> = {
  native: {
    provisioning: 'host-package-manager',
    execution: 'direct',
    hosts: ['linux', 'macos', 'windows'],
    allowsAuxDependencies: true,
  },
  'emulated-cross': {
    provisioning: 'cross-manifest',
    execution: 'emulation-wrapper',
    hosts: ['linux'],
    allowsAuxDependencies: true,
  },
  sandboxed: {
    provisioning: 'none',
    execution: 'direct',
    hosts: ['linux', 'macos', 'windows'],
    allowsAuxDependencies: false,
  },
};

// ─── Auxiliary Libraries ─────────────────────────────────

export interface AuxLibraryPackages {
  /** Debian packages installed on a native Linux runner */
  apt: readonly string[];
  /** Homebrew formula installed on a native macOS runner */
  brew: string;
  /** Environment variable pointing the build at the formula's prefix */
  brewPrefixEnv?: string;
  /** Debian package installed per architecture inside the cross image */
  crossPackage: string;
}

export const AUX_LIBRARIES: Record<AuxLibrary, AuxLibraryPackages> = {
  openssl: {
    apt: ['pkg-config', 'libssl-dev'],
    brew: 'openssl@1.1',
    brewPrefixEnv: 'OPENSSL_DIR',
    crossPackage: 'libssl-dev',
  },
};

// ─── Default Catalog ─────────────────────────────────────

function defineTarget(input: z.input<typeof TargetSpecSchema>): TargetSpec {
  return TargetSpecSchema.parse(input);
}

const openssl = (architecture: string) => [{ library: 'openssl' as const, architecture }];

export const DEFAULT_TARGETS: readonly TargetSpec[] = [
  // Native Linux (dynamically linked)
  defineTarget({
    triple: 'x86_64-unknown-linux-gnu',
    buildStrategy: 'native',
    host: 'linux',
    assetName: '{binary}-linux-x86_64',
    auxDependencies: openssl('amd64'),
  }),

  // Native Windows
  defineTarget({
    triple: 'x86_64-pc-windows-msvc',
    buildStrategy: 'native',
    host: 'windows',
    assetName: '{binary}-windows-x86_64.exe',
    extension: '.exe',
  }),
  defineTarget({
    triple: 'i686-pc-windows-msvc',
    buildStrategy: 'native',
    host: 'windows',
    assetName: '{binary}-windows-i686.exe',
    extension: '.exe',
  }),
  defineTarget({
    triple: 'aarch64-pc-windows-msvc',
    buildStrategy: 'native',
    host: 'windows',
    assetName: '{binary}-windows-arm64.exe',
    extension: '.exe',
  }),

  // Native macOS
  defineTarget({
    triple: 'x86_64-apple-darwin',
    buildStrategy: 'native',
    host: 'macos',
    assetName: '{binary}-macos-x86_64',
    auxDependencies: openssl('x86_64'),
  }),
  defineTarget({
    triple: 'aarch64-apple-darwin',
    buildStrategy: 'native',
    host: 'macos',
    assetName: '{binary}-macos-arm64',
    auxDependencies: openssl('arm64'),
  }),

  // Cross-built Linux
  defineTarget({
    triple: 'x86_64-unknown-linux-musl',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-x86_64-static',
    auxDependencies: openssl('amd64'),
  }),
  defineTarget({
    triple: 'aarch64-unknown-linux-gnu',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-arm64',
    auxDependencies: openssl('arm64'),
  }),
  defineTarget({
    triple: 'aarch64-unknown-linux-musl',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-arm64-static',
    auxDependencies: openssl('arm64'),
  }),
  defineTarget({
    triple: 'i686-unknown-linux-gnu',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-i686',
    auxDependencies: openssl('i386'),
  }),
  defineTarget({
    triple: 'i686-unknown-linux-musl',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-i686-static',
    auxDependencies: openssl('i386'),
  }),
  defineTarget({
    triple: 'armv7-unknown-linux-gnueabihf',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-armv7',
    auxDependencies: openssl('armhf'),
  }),
  defineTarget({
    triple: 'armv7-unknown-linux-musleabihf',
    buildStrategy: 'emulated-cross',
    assetName: '{binary}-linux-armv7-static',
    auxDependencies: openssl('armhf'),
  }),

  // WebAssembly
  defineTarget({
    triple: 'wasm32-unknown-unknown',
    buildStrategy: 'sandboxed',
    assetName: '{binary}.wasm',
    extension: '.wasm',
  }),
];

// ─── Lookup ──────────────────────────────────────────────

export interface BinaryLayout {
  binaryName: string;
  targetDir: string;
  profile: string;
}

export function listTargets(catalog: readonly TargetSpec[] = DEFAULT_TARGETS): TargetSpec[] {
  return [...catalog];
}

export function findTarget(
  triple: string,
  catalog: readonly TargetSpec[] = DEFAULT_TARGETS,
): TargetSpec | undefined {
  return catalog.find((t) => t.triple === triple);
}

function fillPattern(pattern: string, values: Record<string, string>): string {
  return pattern.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/** Upload name of a target's binary */
export function resolveAssetName(target: TargetSpec, binaryName: string): string {
  return fillPattern(target.assetName, {
    binary: binaryName,
    triple: target.triple,
    ext: target.extension,
  });
}

/** Path of the built binary, relative to the project root */
export function resolveBinaryPath(target: TargetSpec, layout: BinaryLayout): string {
  return fillPattern(target.outputPathPattern, {
    target_dir: layout.targetDir,
    triple: target.triple,
    profile: layout.profile,
    binary: layout.binaryName,
    ext: target.extension,
  });
}

export function isRunnableOn(target: TargetSpec, host: HostOs): boolean {
  const profile = STRATEGY_PROFILES[target.buildStrategy];
  if (!profile.hosts.includes(host)) return false;
  return target.buildStrategy === 'native' ? target.host === host : true;
}

export function hostFromPlatform(platform: NodeJS.Platform): HostOs | null {
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'macos';
    case 'win32':
      return 'windows';
    default:
      return null;
  }
}

/**
 * Pick the targets a run builds: the named triples when given (unknown
 * names are a configuration error), otherwise every target runnable on
 * the host.
 */
export function selectTargets(
  catalog: readonly TargetSpec[],
  selection: { triples?: string[]; host?: HostOs },
): TargetSpec[] {
  if (selection.triples && selection.triples.length > 0) {
    const unknown = selection.triples.filter((t) => !findTarget(t, catalog));
    if (unknown.length > 0) {
      throw new ConfigError(`Unknown target(s): ${unknown.join(', ')}`);
    }
    return catalog.filter((t) => selection.triples?.includes(t.triple));
  }
  const host = selection.host;
  if (!host) return [...catalog];
  return catalog.filter((t) => isRunnableOn(t, host));
}

// ─── Validation ──────────────────────────────────────────

/** Return every problem found in a catalog; empty when it is usable */
export function validateCatalog(catalog: readonly TargetSpec[], binaryName: string): string[] {
  const issues: string[] = [];
  const triples = new Set<string>();
  const assetNames = new Map<string, string>();

  for (const target of catalog) {
    if (triples.has(target.triple)) {
      issues.push(`Duplicate target triple: ${target.triple}`);
    }
    triples.add(target.triple);

    const assetName = resolveAssetName(target, binaryName);
    for (const name of [assetName, `${assetName}.sha256`]) {
      const owner = assetNames.get(name);
      if (owner !== undefined) {
        issues.push(`Asset name ${name} is used by both ${owner} and ${target.triple}`);
      }
      assetNames.set(name, target.triple);
    }

    const profile = STRATEGY_PROFILES[target.buildStrategy];
    if (!profile.allowsAuxDependencies && target.auxDependencies.length > 0) {
      issues.push(`${target.triple}: ${target.buildStrategy} targets take no auxiliary dependencies`);
    }
    if (!profile.hosts.includes(target.host)) {
      issues.push(`${target.triple}: ${target.buildStrategy} targets cannot build on ${target.host}`);
    }
  }

  return issues;
}
