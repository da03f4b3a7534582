/**
 * Publisher: attaches a packaged artifact to the release record.
 */

import { errorMessage } from './errors.js';
import type { ReleaseEndpoint } from './release-endpoint.js';
import type {
  Artifact,
  AssetUpload,
  ReleaseRecord,
  UploadResult,
} from './types.js';

export const BINARY_CONTENT_TYPE = 'application/octet-stream';
export const FINGERPRINT_CONTENT_TYPE = 'text/plain';

/** The two uploads for an artifact, binary first */
export function artifactUploads(artifact: Artifact): AssetUpload[] {
  return [
    { path: artifact.binaryPath, name: artifact.assetName, contentType: BINARY_CONTENT_TYPE },
    { path: artifact.fingerprintPath, name: artifact.fingerprintAssetName, contentType: FINGERPRINT_CONTENT_TYPE },
  ];
}

/**
 * Upload the binary, then its digest file. Stops at the first failed
 * upload; never rejects. Existing assets are not replaced.
 */
export async function publishArtifact(
  artifact: Artifact,
  record: ReleaseRecord,
  endpoint: ReleaseEndpoint,
): Promise<UploadResult[]> {
  const results: UploadResult[] = [];

  for (const upload of artifactUploads(artifact)) {
    try {
      await endpoint.uploadAsset(record.uploadEndpoint, upload);
      results.push({ name: upload.name, path: upload.path, status: 'uploaded' });
    } catch (error) {
      results.push({ name: upload.name, path: upload.path, status: 'failed', error: errorMessage(error) });
      break;
    }
  }

  return results;
}

export function uploadsSucceeded(results: UploadResult[]): boolean {
  return results.length === 2 && results.every((r) => r.status === 'uploaded');
}
