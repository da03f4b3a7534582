/**
 * Pipeline Orchestrator: wires the stages into one job graph:
 *
 *   check-version → create-release → build:<triple> (one per target)
 *
 * Each build job runs its target branch (dispatch → package → publish)
 * strictly in order. Gate and ledger failures are fatal and re-thrown once
 * the graph has settled; a failed branch only fails its own job.
 */

import { dispatchBuild, type DispatchOptions } from './build-dispatcher.js';
import { packageArtifact } from './artifact-packager.js';
import { PipelineError, errorMessage } from './errors.js';
import { runJobGraph, type Job, type JobOutcome } from './job-graph.js';
import { publishArtifact, uploadsSucceeded } from './publisher.js';
import type { ReleaseEndpoint } from './release-endpoint.js';
import { DEFAULT_TAG_PREFIX, createReleaseRecord } from './release-ledger.js';
import type { RepositoryAccess } from './repository.js';
import { resolveAssetName } from './target-catalog.js';
import type {
  Artifact,
  BranchResult,
  ReleaseDecision,
  ReleaseRecord,
  RunReport,
  TargetSpec,
} from './types.js';
import { evaluateVersionGate, type VersionGateOptions } from './version-gate.js';

// ─── Types ───────────────────────────────────────────────

export interface BranchOptions extends DispatchOptions {
  endpoint: ReleaseEndpoint;
}

export interface PipelineOptions extends BranchOptions {
  repo: RepositoryAccess;
  targets: readonly TargetSpec[];
  gate: VersionGateOptions;
  tagPrefix?: string;
  /** Max target branches in flight */
  concurrency?: number;
  onDecision?: (decision: ReleaseDecision) => void;
  onRelease?: (record: ReleaseRecord) => void;
  onBranchStart?: (target: TargetSpec) => void;
  onBranchComplete?: (result: BranchResult) => void;
}

export const CHECK_VERSION_JOB = 'check-version';
export const CREATE_RELEASE_JOB = 'create-release';

export function buildJobId(triple: string): string {
  return `build:${triple}`;
}

// ─── Target Branch ───────────────────────────────────────

/**
 * Build, package and publish one target against an existing record.
 * Never rejects; every failure is reported in the BranchResult.
 */
export async function runTargetBranch(
  target: TargetSpec,
  record: ReleaseRecord,
  options: BranchOptions,
): Promise<BranchResult> {
  const { logger } = options;
  const assetName = resolveAssetName(target, options.layout.binaryName);

  const build = await dispatchBuild(target, options);
  if (!build.success) {
    return {
      triple: target.triple,
      assetName,
      status: 'failed',
      failedStage: build.failedStep,
      error: build.error,
      build,
      uploads: [],
    };
  }

  let artifact: Artifact;
  try {
    artifact = await packageArtifact(build, assetName);
    await logger?.stageComplete('package', target.triple, { sha256: artifact.sha256 });
  } catch (error) {
    await logger?.stageFailed('package', target.triple, errorMessage(error));
    return {
      triple: target.triple,
      assetName,
      status: 'failed',
      failedStage: 'package',
      error: errorMessage(error),
      build,
      uploads: [],
    };
  }

  const uploads = await publishArtifact(artifact, record, options.endpoint);
  if (!uploadsSucceeded(uploads)) {
    const error = uploads.find((u) => u.status === 'failed')?.error ?? 'Upload incomplete';
    await logger?.stageFailed('publish', target.triple, error);
    return {
      triple: target.triple,
      assetName,
      status: 'failed',
      failedStage: 'publish',
      error,
      build,
      artifact,
      uploads,
    };
  }

  await logger?.stageComplete('publish', target.triple, {
    assets: uploads.map((u) => u.name),
  });
  return {
    triple: target.triple,
    assetName,
    status: 'published',
    build,
    artifact,
    uploads,
  };
}

// ─── Orchestrator ────────────────────────────────────────

interface RunState {
  decision?: ReleaseDecision;
  record?: ReleaseRecord;
  fatal?: unknown;
  branches: Map<string, BranchResult>;
}

/** Run the whole release pipeline and report per-target outcomes */
export async function runReleasePipeline(options: PipelineOptions): Promise<RunReport> {
  const { repo, endpoint, targets, logger } = options;
  const tagPrefix = options.tagPrefix ?? DEFAULT_TAG_PREFIX;
  const startedAt = new Date().toISOString();
  const state: RunState = { branches: new Map() };

  await logger?.stageStart('run', `release pipeline for ${targets.length} target(s)`);

  const checkVersion: Job = {
    id: CHECK_VERSION_JOB,
    needs: [],
    run: async () => {
      try {
        state.decision = await evaluateVersionGate(repo, options.gate);
      } catch (error) {
        state.fatal = error;
        await logger?.stageFailed('version-gate', 'version check', errorMessage(error));
        throw error;
      }
      options.onDecision?.(state.decision);
      await logger?.info('version-gate', 'decision', state.decision.shouldRelease
        ? `Version changed ${state.decision.previousVersion || '(none)'} -> ${state.decision.version}`
        : `No release: ${state.decision.reason ?? 'version unchanged'}`, { ...state.decision });
      return { status: 'success' };
    },
  };

  const createRelease: Job = {
    id: CREATE_RELEASE_JOB,
    needs: [CHECK_VERSION_JOB],
    run: async () => {
      const decision = state.decision;
      if (!decision?.shouldRelease) {
        return { status: 'skipped', reason: decision?.reason ?? 'No release needed' };
      }
      try {
        state.record = await createReleaseRecord(decision, endpoint, tagPrefix);
      } catch (error) {
        state.fatal = error;
        await logger?.stageFailed('release-ledger', 'create release', errorMessage(error));
        throw error;
      }
      options.onRelease?.(state.record);
      await logger?.stageComplete('release-ledger', `release ${state.record.tag}`, {
        tag: state.record.tag,
        url: state.record.htmlUrl,
      });
      return { status: 'success' };
    },
  };

  const buildJobs: Job[] = targets.map((target): Job => ({
    id: buildJobId(target.triple),
    needs: [CREATE_RELEASE_JOB],
    run: async () => {
      const record = state.record;
      if (!record) {
        throw new PipelineError('build', `No release record for ${target.triple}`);
      }
      options.onBranchStart?.(target);
      const result = await runTargetBranch(target, record, options);
      state.branches.set(target.triple, result);
      options.onBranchComplete?.(result);
      return result.status === 'published'
        ? { status: 'success' }
        : { status: 'failed', reason: result.error };
    },
  }));

  const outcomes = await runJobGraph([checkVersion, createRelease, ...buildJobs], {
    concurrency: options.concurrency,
  });

  if (state.fatal !== undefined) {
    await logger?.stageFailed('completion', 'release pipeline', errorMessage(state.fatal));
    throw state.fatal;
  }

  const decision = state.decision;
  if (!decision) {
    throw new PipelineError('version-gate', describeMissing(outcomes.get(CHECK_VERSION_JOB)));
  }

  const branches = targets.flatMap((t) => {
    const branch = state.branches.get(t.triple);
    return branch ? [branch] : [];
  });
  const artifacts = branches.flatMap((b) => (b.status === 'published' && b.artifact ? [b.artifact] : []));
  const success = branches.every((b) => b.status === 'published')
    && (!decision.shouldRelease || branches.length === targets.length);

  const report: RunReport = {
    decision,
    release: state.record,
    branches,
    artifacts,
    success,
    startedAt,
    finishedAt: new Date().toISOString(),
  };

  const failed = branches.filter((b) => b.status === 'failed').map((b) => b.triple);
  if (failed.length > 0) {
    await logger?.warn('completion', 'branches_failed', `${failed.length} target(s) failed`, { failed });
  }
  await logger?.stageComplete('completion', 'release pipeline', {
    released: decision.shouldRelease,
    published: artifacts.length,
    failed: failed.length,
  });

  return report;
}

function describeMissing(outcome: JobOutcome | undefined): string {
  if (!outcome) return 'Version check never ran';
  return `Version check ended ${outcome.status}${outcome.reason ? `: ${outcome.reason}` : ''}`;
}
