/**
 * Version Gate: decides whether the tip commit cuts a release.
 *
 * Reads the version marker at the tip, checks out the immediate parent,
 * reads it again and compares the two as strings. Only the tip and its
 * first parent are consulted. A missing file or field reads as '' and
 * simply takes part in the comparison; repository failures are fatal.
 */

import { GateError, errorMessage } from './errors.js';
import type { RepositoryAccess } from './repository.js';
import type { ReleaseDecision } from './types.js';

export interface VersionGateOptions {
  versionFile: string;
  /** Field name looked for on the declaration line */
  versionField?: string;
  /** Only release from this branch; null or undefined disables the check */
  releaseBranch?: string | null;
  /**
   * Branch the CI runner reports for a detached checkout. Only the
   * release-branch check uses it; the checkout is restored by revision.
   */
  detachedBranch?: string | null;
}

/**
 * Extract the version marker from a declaration file's contents.
 *
 * The first line mentioning the field wins; its value is the text between
 * the first pair of double quotes. Returns '' when there is no such line
 * or the line has no quoted value.
 */
export function extractVersionMarker(content: string | null, field = 'version'): string {
  if (content === null) return '';

  const line = content.split(/\r?\n/).find((l) => l.includes(field));
  if (line === undefined) return '';

  const parts = line.split('"');
  return parts.length >= 3 ? parts[1] : '';
}

/** Compare the version marker at HEAD and HEAD^1 */
export async function evaluateVersionGate(
  repo: RepositoryAccess,
  options: VersionGateOptions,
): Promise<ReleaseDecision> {
  const field = options.versionField ?? 'version';

  let tipRevision: string;
  let checkedOutBranch: string | null;
  try {
    tipRevision = await repo.resolveRevision('HEAD');
    checkedOutBranch = await repo.currentBranch();
  } catch (error) {
    throw new GateError(`Cannot resolve the tip revision: ${errorMessage(error)}`, { cause: error });
  }
  const branch = checkedOutBranch ?? options.detachedBranch ?? null;

  if (options.releaseBranch && branch !== options.releaseBranch) {
    return {
      shouldRelease: false,
      version: '',
      previousVersion: '',
      tipRevision,
      reason: `branch ${branch ?? '(detached)'} is not the release branch ${options.releaseBranch}`,
    };
  }

  const version = await readMarker(repo, options.versionFile, field, 'tip');

  let parentRevision: string;
  try {
    parentRevision = await repo.resolveRevision(`${tipRevision}^1`);
  } catch (error) {
    throw new GateError(`Tip ${tipRevision} has no parent revision: ${errorMessage(error)}`, { cause: error });
  }

  let previousVersion: string;
  try {
    await repo.checkout(parentRevision);
    previousVersion = await readMarker(repo, options.versionFile, field, 'parent');
  } catch (error) {
    if (error instanceof GateError) throw error;
    throw new GateError(`Cannot check out parent ${parentRevision}: ${errorMessage(error)}`, { cause: error });
  } finally {
    await restore(repo, checkedOutBranch ?? tipRevision);
  }

  const shouldRelease = version !== previousVersion;
  return {
    shouldRelease,
    version,
    previousVersion,
    tipRevision,
    parentRevision,
    reason: shouldRelease ? undefined : `version unchanged (${version || 'empty'})`,
  };
}

async function readMarker(
  repo: RepositoryAccess,
  versionFile: string,
  field: string,
  which: 'tip' | 'parent',
): Promise<string> {
  try {
    return extractVersionMarker(await repo.readFile(versionFile), field);
  } catch (error) {
    throw new GateError(`Cannot read ${versionFile} at the ${which} revision: ${errorMessage(error)}`, { cause: error });
  }
}

async function restore(repo: RepositoryAccess, ref: string): Promise<void> {
  try {
    await repo.checkout(ref);
  } catch (error) {
    throw new GateError(`Cannot restore checkout of ${ref}: ${errorMessage(error)}`, { cause: error });
  }
}
