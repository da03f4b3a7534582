/**
 * Release Ledger: creates the one release record of a run.
 *
 * Creation is attempted exactly once. A duplicate tag is fatal: the tag is
 * never mutated and an existing release is never overwritten. The record is
 * public as soon as it exists, so a run that later fails leaves a release
 * with only some of its assets.
 */

import { LedgerError, ReleaseConflictError, errorMessage } from './errors.js';
import type { ReleaseEndpoint } from './release-endpoint.js';
import type { ReleaseDecision, ReleaseRecord, ReleaseRequest } from './types.js';

export const DEFAULT_TAG_PREFIX = 'v';

/** Build the release request for a version */
export function buildReleaseRequest(version: string, tagPrefix = DEFAULT_TAG_PREFIX): ReleaseRequest {
  const tag = `${tagPrefix}${version}`;
  return {
    tag,
    title: `Release ${tag}`,
    draft: false,
    prerelease: false,
  };
}

/** Create the release record for a positive decision */
export async function createReleaseRecord(
  decision: ReleaseDecision,
  endpoint: ReleaseEndpoint,
  tagPrefix = DEFAULT_TAG_PREFIX,
): Promise<ReleaseRecord> {
  if (!decision.shouldRelease) {
    throw new LedgerError('Release ledger invoked for a decision that does not release');
  }
  return createVersionRelease(decision.version, endpoint, tagPrefix);
}

/** Create the release record for an explicit version, once */
export async function createVersionRelease(
  version: string,
  endpoint: ReleaseEndpoint,
  tagPrefix = DEFAULT_TAG_PREFIX,
): Promise<ReleaseRecord> {
  if (!version) {
    throw new LedgerError('Cannot tag a release with an empty version');
  }

  const request = buildReleaseRequest(version, tagPrefix);

  try {
    return await endpoint.createRelease(request);
  } catch (error) {
    if (error instanceof ReleaseConflictError) {
      throw new LedgerError(`Release tag ${request.tag} already exists; refusing to overwrite`, { cause: error });
    }
    throw new LedgerError(`Creating release ${request.tag} failed: ${errorMessage(error)}`, { cause: error });
  }
}
