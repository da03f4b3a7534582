/**
 * Artifact Packager: fingerprints a built binary and writes its digest file.
 */

import { createHash } from 'node:crypto';
import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';

import { PipelineError, errorMessage } from './errors.js';
import type { Artifact, BuildResult } from './types.js';

export const FINGERPRINT_EXTENSION = '.sha256';

/** Hex SHA-256 of a file, streamed */
export function computeFingerprint(filePath: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(filePath)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/** One digest line in the layout sha256sum reads back */
export function formatFingerprintLine(sha256: string, fileName: string): string {
  return `${sha256}  ${fileName}\n`;
}

/**
 * Write `<binaryPath>.sha256` beside the binary and describe the pair.
 * Throws a packaging PipelineError when the binary cannot be read.
 */
export async function packageArtifact(build: BuildResult, assetName: string): Promise<Artifact> {
  if (!build.success) {
    throw new PipelineError('package', `Cannot package ${build.target.triple}: build did not succeed`);
  }

  const fingerprintPath = `${build.binaryPath}${FINGERPRINT_EXTENSION}`;
  try {
    const sha256 = await computeFingerprint(build.binaryPath);
    await fs.writeFile(fingerprintPath, formatFingerprintLine(sha256, path.basename(build.binaryPath)), 'utf-8');

    return {
      binaryPath: build.binaryPath,
      fingerprintPath,
      assetName,
      fingerprintAssetName: `${assetName}${FINGERPRINT_EXTENSION}`,
      sha256,
    };
  } catch (error) {
    throw new PipelineError(
      'package',
      `Fingerprinting ${build.binaryPath} failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
