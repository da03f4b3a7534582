/**
 * CLI helper tests: option parsing, target choice, step outputs, records.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { parse as parseYaml } from 'yaml';

import { formatGithubOutput } from '../../src/cli/commands/check.js';
import { readReleaseRecord } from '../../src/cli/commands/build.js';
import { chooseTargets, parseConcurrency, partialReleaseWarning } from '../../src/cli/commands/release.js';
import { generateYamlConfig } from '../../src/cli/commands/config.js';
import {
  createReleaseEndpoint,
  dryRunReleaseDir,
  gateOptions,
  loadCommandContext,
  type CommandContext,
} from '../../src/cli/context.js';
import { createProgram } from '../../src/cli/index.js';
import { DEFAULT_CONFIG, ConfigSchema } from '../../src/config/index.js';
import { ConfigError } from '../../src/pipeline/errors.js';
import { DirectoryReleaseEndpoint, GitHubReleaseEndpoint } from '../../src/pipeline/release-endpoint.js';
import { ReleaseLogger } from '../../src/pipeline/release-logger.js';
import { DEFAULT_TARGETS } from '../../src/pipeline/target-catalog.js';

const TEST_DIR = join(process.cwd(), '.test-cli-commands');

function context(overrides: Partial<typeof DEFAULT_CONFIG.release> = {}): CommandContext {
  const stateDir = join(TEST_DIR, '.binship');
  return {
    projectDir: TEST_DIR,
    config: { ...DEFAULT_CONFIG, release: { ...DEFAULT_CONFIG.release, ...overrides } },
    stateDir,
    layout: { binaryName: 'omni', targetDir: 'target', profile: 'release' },
    catalog: [...DEFAULT_TARGETS],
    logger: new ReleaseLogger(stateDir),
  };
}

describe('createProgram', () => {
  it('should register every command', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual([
      'check',
      'create-release',
      'build',
      'release',
      'targets',
      'manifest',
      'config',
    ]);
  });
});

describe('formatGithubOutput', () => {
  it('should write KEY=value lines', () => {
    expect(formatGithubOutput({
      shouldRelease: true,
      version: '1.2.0',
      previousVersion: '1.1.0',
      tipRevision: 'b2',
      parentRevision: 'a1',
    })).toBe('should_release=true\nversion=1.2.0\n');
  });
});

describe('parseConcurrency', () => {
  it('should accept non-negative integers', () => {
    expect(parseConcurrency('0')).toBe(0);
    expect(parseConcurrency('3')).toBe(3);
  });

  it('should reject anything else', () => {
    expect(() => parseConcurrency('-1')).toThrow(InvalidArgumentError);
    expect(() => parseConcurrency('two')).toThrow(InvalidArgumentError);
    expect(() => parseConcurrency('1.5')).toThrow(InvalidArgumentError);
  });
});

describe('chooseTargets', () => {
  it('should prefer named triples', () => {
    const chosen = chooseTargets(DEFAULT_TARGETS, { targets: ['x86_64-apple-darwin'], allTargets: true }, 'linux');
    expect(chosen.map((t) => t.triple)).toEqual(['x86_64-apple-darwin']);
  });

  it('should take the whole catalog with allTargets', () => {
    expect(chooseTargets(DEFAULT_TARGETS, { allTargets: true }, 'linux')).toHaveLength(14);
  });

  it('should default to what the runner can build', () => {
    expect(chooseTargets(DEFAULT_TARGETS, {}, 'darwin').map((t) => t.triple)).toEqual([
      'x86_64-apple-darwin',
      'aarch64-apple-darwin',
      'wasm32-unknown-unknown',
    ]);
    expect(chooseTargets(DEFAULT_TARGETS, {}, 'win32').map((t) => t.triple)).toEqual([
      'x86_64-pc-windows-msvc',
      'i686-pc-windows-msvc',
      'aarch64-pc-windows-msvc',
      'wasm32-unknown-unknown',
    ]);
  });

  it('should refuse an unsupported platform', () => {
    expect(() => chooseTargets(DEFAULT_TARGETS, {}, 'aix')).toThrow(ConfigError);
  });
});

describe('partialReleaseWarning', () => {
  const release = {
    tag: 'v1.1.0',
    title: 'Release v1.1.0',
    draft: false,
    prerelease: false,
    uploadEndpoint: 'memory://v1.1.0',
  };

  it('should name the targets missing from a published release', () => {
    expect(partialReleaseWarning({
      release,
      branches: [
        { triple: 'x86_64-unknown-linux-gnu', status: 'published' },
        { triple: 'armv7-unknown-linux-gnueabihf', status: 'failed' },
        { triple: 'wasm32-unknown-unknown', status: 'failed' },
      ],
    })).toBe('v1.1.0 is published without 2 of 3 target(s): armv7-unknown-linux-gnueabihf, wasm32-unknown-unknown');
  });

  it('should stay quiet when every target published', () => {
    expect(partialReleaseWarning({ release, branches: [{ triple: 'wasm32-unknown-unknown', status: 'published' }] })).toBeNull();
  });

  it('should stay quiet when no release was cut', () => {
    expect(partialReleaseWarning({ branches: [] })).toBeNull();
  });
});

describe('generateYamlConfig', () => {
  it('should round-trip to the defaults', () => {
    const yaml = generateYamlConfig();
    expect(yaml.startsWith('# binship configuration\n')).toBe(true);
    expect(ConfigSchema.parse(parseYaml(yaml))).toEqual(DEFAULT_CONFIG);
  });
});

describe('command context', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  });

  it('should derive gate options from config', () => {
    expect(gateOptions(DEFAULT_CONFIG, {})).toEqual({
      versionFile: 'Cargo.toml',
      versionField: 'version',
      releaseBranch: 'main',
      detachedBranch: null,
    });
  });

  it('should take the detached branch name from the CI runner', () => {
    expect(gateOptions(DEFAULT_CONFIG, { GITHUB_REF_NAME: '42/merge' }).detachedBranch).toBe('42/merge');
  });

  it('should use a local directory for dry runs', () => {
    const ctx = context();
    const endpoint = createReleaseEndpoint(ctx, { dryRun: true });
    expect(endpoint).toBeInstanceOf(DirectoryReleaseEndpoint);
    expect(dryRunReleaseDir(ctx)).toBe(join(TEST_DIR, '.binship', 'releases'));
  });

  it('should require a repository and a token', () => {
    expect(() => createReleaseEndpoint(context(), { env: { GITHUB_TOKEN: 'test-secret' } }))
      .toThrow('release.repository is not set');
    expect(() => createReleaseEndpoint(context({ repository: 'acme/omni' }), { env: {} }))
      .toThrow('No API token: GITHUB_TOKEN is not set');
  });

  it('should talk to GitHub when configured', () => {
    const endpoint = createReleaseEndpoint(context({ repository: 'acme/omni' }), { env: { GITHUB_TOKEN: 'test-secret' } });
    expect(endpoint).toBeInstanceOf(GitHubReleaseEndpoint);
  });

  it('should reject a catalog with clashing asset names', async () => {
    const target = '  - triple: x86_64-unknown-linux-gnu\n    build_strategy: native\n    asset_name: "{binary}"\n';
    writeFileSync(join(TEST_DIR, 'binship.config.yaml'), `targets:\n${target}${target.replace('x86_64-unknown-linux-gnu', 'x86_64-unknown-linux-musl')}`);

    await expect(loadCommandContext(TEST_DIR)).rejects.toThrow('Invalid target catalog');
  });

  it('should read a saved release record', async () => {
    const recordPath = join(TEST_DIR, 'release.json');
    writeFileSync(recordPath, JSON.stringify({
      tag: 'v1.0.0',
      title: 'Release v1.0.0',
      draft: false,
      prerelease: false,
      uploadEndpoint: 'https://uploads.github.com/repos/acme/omni/releases/1/assets{?name,label}',
      id: 1,
    }));

    const record = await readReleaseRecord(recordPath);

    expect(record.tag).toBe('v1.0.0');
    expect(record.id).toBe(1);
  });

  it('should reject a missing or malformed record', async () => {
    await expect(readReleaseRecord(join(TEST_DIR, 'missing.json'))).rejects.toThrow(ConfigError);

    const bad = join(TEST_DIR, 'bad.json');
    writeFileSync(bad, JSON.stringify({ tag: 'v1.0.0' }));
    await expect(readReleaseRecord(bad)).rejects.toThrow(`${bad} is not a release record`);
  });
});
