/**
 * Artifact Packager tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import {
  computeFingerprint,
  formatFingerprintLine,
  packageArtifact,
} from '../../src/pipeline/artifact-packager.js';
import { PipelineError } from '../../src/pipeline/errors.js';
import { findTarget } from '../../src/pipeline/target-catalog.js';
import type { BuildResult } from '../../src/pipeline/types.js';

const TEST_DIR = join(process.cwd(), '.test-artifact-packager');
const HELLO_SHA = '5891b5b522d5df086d0ff0b110fbd9d21bb4fc7163af34d08286a2e846f6be03';

function buildResult(binaryPath: string, success = true): BuildResult {
  const target = findTarget('x86_64-unknown-linux-gnu');
  if (!target) throw new Error('missing target');
  return { target, binaryPath, success, diagnostics: [], steps: [] };
}

describe('artifact packager', () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) rmSync(TEST_DIR, { recursive: true });
  });

  it('should compute the SHA-256 of a file', async () => {
    const file = join(TEST_DIR, 'hello');
    writeFileSync(file, 'hello\n');

    expect(await computeFingerprint(file)).toBe(HELLO_SHA);
  });

  it('should format lines the way sha256sum reads them', () => {
    expect(formatFingerprintLine('abc', 'omni')).toBe('abc  omni\n');
  });

  it('should write the digest beside the binary', async () => {
    const binary = join(TEST_DIR, 'omni');
    writeFileSync(binary, 'hello\n');

    const artifact = await packageArtifact(buildResult(binary), 'omni-linux-x86_64');

    expect(artifact).toEqual({
      binaryPath: binary,
      fingerprintPath: `${binary}.sha256`,
      assetName: 'omni-linux-x86_64',
      fingerprintAssetName: 'omni-linux-x86_64.sha256',
      sha256: HELLO_SHA,
    });
    expect(readFileSync(`${binary}.sha256`, 'utf-8')).toBe(`${HELLO_SHA}  omni\n`);
  });

  it('should give identical digests for identical bytes', async () => {
    writeFileSync(join(TEST_DIR, 'a'), 'same');
    writeFileSync(join(TEST_DIR, 'b'), 'same');

    const [a, b] = await Promise.all([
      computeFingerprint(join(TEST_DIR, 'a')),
      computeFingerprint(join(TEST_DIR, 'b')),
    ]);

    expect(a).toBe(b);
  });

  it('should fail packaging when the binary cannot be read', async () => {
    const missing = join(TEST_DIR, 'gone');

    const error = await packageArtifact(buildResult(missing), 'omni').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({ stage: 'package' });
    expect(existsSync(`${missing}.sha256`)).toBe(false);
  });

  it('should refuse a build that did not succeed', async () => {
    await expect(packageArtifact(buildResult(join(TEST_DIR, 'omni'), false), 'omni'))
      .rejects.toThrow('Cannot package x86_64-unknown-linux-gnu: build did not succeed');
  });
});
