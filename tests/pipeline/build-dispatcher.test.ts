/**
 * Build Dispatcher tests: stage order, per-strategy provisioning,
 * output verification.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

import { dispatchBuild, findCandidateBinaries, type DispatchOptions } from '../../src/pipeline/build-dispatcher.js';
import { ReleaseLogger } from '../../src/pipeline/release-logger.js';
import { DEFAULT_TARGETS, findTarget } from '../../src/pipeline/target-catalog.js';
import type { BuildInvoker } from '../../src/pipeline/toolchain.js';
import { FakeBuildInvoker, FakeToolchain, type FakeBuildBehavior } from '../helpers/fakes.js';

const TEST_DIR = join(process.cwd(), '.test-build-dispatcher');
const LAYOUT = { binaryName: 'omni', targetDir: 'target', profile: 'release' };

function target(triple: string) {
  const found = findTarget(triple);
  if (!found) throw new Error(`missing ${triple}`);
  return found;
}

function setup(
  behavior: Record<string, FakeBuildBehavior> = {},
  toolchainOptions: ConstructorParameters<typeof FakeToolchain>[0] = {},
) {
  const toolchain = new FakeToolchain(toolchainOptions);
  const invoker = new FakeBuildInvoker(TEST_DIR, LAYOUT, DEFAULT_TARGETS, behavior);
  const options: DispatchOptions = {
    toolchain,
    invoker,
    projectDir: TEST_DIR,
    layout: LAYOUT,
    manifestDir: join(TEST_DIR, '.binship', 'cross'),
  };
  return { toolchain, invoker, options };
}

describe('dispatchBuild', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  });

  it('should build a native target end to end', async () => {
    const { toolchain, options } = setup();

    const result = await dispatchBuild(target('x86_64-unknown-linux-gnu'), options);

    expect(result.success).toBe(true);
    expect(result.binaryPath).toBe(join(TEST_DIR, 'target', 'x86_64-unknown-linux-gnu', 'release', 'omni'));
    expect(result.steps.map((s) => `${s.step}:${s.status}`)).toEqual(['toolchain:pass', 'provision:pass', 'build:pass']);
    expect(toolchain.libraryCalls).toEqual([{ library: 'openssl', architecture: 'amd64', host: 'linux' }]);
    expect(readFileSync(result.binaryPath, 'utf-8')).toBe('binary:x86_64-unknown-linux-gnu');
  });

  it('should hand provisioned environment to the build on macOS', async () => {
    const { invoker, options } = setup();

    const result = await dispatchBuild(target('aarch64-apple-darwin'), options);

    expect(result.success).toBe(true);
    expect(invoker.requests[0]).toEqual({
      triple: 'aarch64-apple-darwin',
      strategy: 'native',
      env: { OPENSSL_DIR: '/opt/openssl' },
      manifestPath: null,
    });
  });

  it('should write a per-target manifest for cross builds', async () => {
    const { toolchain, invoker, options } = setup();

    const result = await dispatchBuild(target('aarch64-unknown-linux-gnu'), options);

    const manifest = join(TEST_DIR, '.binship', 'cross', 'aarch64-unknown-linux-gnu.toml');
    expect(result.success).toBe(true);
    expect(invoker.requests[0].manifestPath).toBe(manifest);
    expect(existsSync(manifest)).toBe(true);
    expect(toolchain.libraryCalls).toEqual([]);
  });

  it('should skip provisioning for the sandboxed target', async () => {
    const { invoker, options } = setup();

    const result = await dispatchBuild(target('wasm32-unknown-unknown'), options);

    expect(result.success).toBe(true);
    expect(result.steps[1]).toMatchObject({ step: 'provision', status: 'skip' });
    expect(invoker.requests[0].manifestPath).toBeNull();
    expect(result.binaryPath).toBe(join(TEST_DIR, 'target', 'wasm32-unknown-unknown', 'release', 'omni.wasm'));
  });

  it('should stop at a toolchain failure', async () => {
    const { invoker, toolchain, options } = setup({}, { failToolchain: ['x86_64-unknown-linux-gnu'] });

    const result = await dispatchBuild(target('x86_64-unknown-linux-gnu'), options);

    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('toolchain');
    expect(result.error).toBe(
      'rustup target add x86_64-unknown-linux-gnu exited with 1: rustup target add x86_64-unknown-linux-gnu: failed',
    );
    expect(toolchain.libraryCalls).toEqual([]);
    expect(invoker.requests).toEqual([]);
  });

  it('should stop at a provisioning failure', async () => {
    const { invoker, options } = setup({}, { failLibraryOn: ['linux'] });

    const result = await dispatchBuild(target('x86_64-unknown-linux-gnu'), options);

    expect(result.failedStep).toBe('provision');
    expect(result.error).toBe('install openssl:amd64 exited with 1: install openssl:amd64: failed');
    expect(invoker.requests).toEqual([]);
  });

  it('should fail provisioning when the cross manifest cannot be written', async () => {
    const { invoker, options } = setup();
    mkdirSync(join(TEST_DIR, '.binship', 'cross', 'armv7-unknown-linux-gnueabihf.toml'), { recursive: true });

    const result = await dispatchBuild(target('armv7-unknown-linux-gnueabihf'), options);

    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('provision');
    expect(result.error).toMatch(/^write cross manifest for armv7-unknown-linux-gnueabihf exited with 1: /);
    expect(result.steps.map((s) => `${s.step}:${s.status}`)).toEqual(['toolchain:pass', 'provision:fail']);
    expect(invoker.requests).toEqual([]);
  });

  it('should report a failed build', async () => {
    const { options } = setup({ 'x86_64-pc-windows-msvc': 'fail' });

    const result = await dispatchBuild(target('x86_64-pc-windows-msvc'), options);

    expect(result.failedStep).toBe('build');
    expect(result.error).toBe(
      'cargo build --release --target x86_64-pc-windows-msvc exited with 1: cargo build --release --target x86_64-pc-windows-msvc: failed',
    );
  });

  it('should list candidate binaries when the output is missing', async () => {
    const { options } = setup({ 'x86_64-unknown-linux-musl': 'misplaced' });

    const result = await dispatchBuild(target('x86_64-unknown-linux-musl'), options);

    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('verify');
    expect(result.error).toBe('Binary not found at target/x86_64-unknown-linux-musl/release/omni');
    expect(result.diagnostics).toEqual(['target/release/omni']);
  });

  it('should map a thrown invoker error to the build stage', async () => {
    const { options } = setup();
    const throwing: BuildInvoker = {
      build: async () => {
        throw new Error('spawn cargo ENOENT');
      },
    };

    const result = await dispatchBuild(target('x86_64-unknown-linux-gnu'), { ...options, invoker: throwing });

    expect(result.failedStep).toBe('build');
    expect(result.error).toBe('spawn cargo ENOENT');
  });

  it('should keep one target failure from affecting another', async () => {
    const { options } = setup({ 'i686-unknown-linux-gnu': 'fail' });

    const [failed, built] = await Promise.all([
      dispatchBuild(target('i686-unknown-linux-gnu'), options),
      dispatchBuild(target('i686-unknown-linux-musl'), options),
    ]);

    expect(failed.success).toBe(false);
    expect(built.success).toBe(true);
  });

  it('should log stage failures', async () => {
    const { options } = setup({ 'x86_64-pc-windows-msvc': 'fail' });
    const logger = new ReleaseLogger(join(TEST_DIR, '.binship'));

    await dispatchBuild(target('x86_64-pc-windows-msvc'), { ...options, logger });

    const errors = logger.getErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0].stage).toBe('build');
    expect(errors[0].message).toBe(
      'Failed: x86_64-pc-windows-msvc - cargo build --release --target x86_64-pc-windows-msvc exited with 1: cargo build --release --target x86_64-pc-windows-msvc: failed',
    );
  });
});

describe('findCandidateBinaries', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  });

  it('should return nothing when the target dir is absent', async () => {
    expect(await findCandidateBinaries(TEST_DIR, LAYOUT)).toEqual([]);
  });
});
