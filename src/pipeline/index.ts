/**
 * Pipeline module: re-exports all public APIs.
 */

// Core types
export type {
  BuildStrategy,
  HostOs,
  PipelineStage,
  BranchStage,
  ReleaseDecision,
  ReleaseRecord,
  ReleaseRequest,
  AssetUpload,
  UploadResult,
  AuxDependency,
  AuxLibrary,
  TargetSpec,
  StepResult,
  BuildResult,
  Artifact,
  BranchResult,
  RunReport,
} from './types.js';

export {
  ReleaseDecisionSchema,
  ReleaseRecordSchema,
  TargetSpecSchema,
  RunReportSchema,
} from './types.js';

// Errors
export {
  PipelineError,
  GateError,
  LedgerError,
  EndpointError,
  ReleaseConflictError,
  AssetConflictError,
  JobGraphError,
  ConfigError,
  errorMessage,
} from './errors.js';

// Orchestrator
export { runReleasePipeline, runTargetBranch, buildJobId } from './orchestrator.js';
export type { PipelineOptions, BranchOptions } from './orchestrator.js';

// Job Graph
export { planJobGraph, runJobGraph } from './job-graph.js';
export type { Job, JobOutcome, JobStatus, JobVerdict } from './job-graph.js';

// Version Gate
export { evaluateVersionGate, extractVersionMarker } from './version-gate.js';
export type { VersionGateOptions } from './version-gate.js';
export { GitRepository } from './repository.js';
export type { RepositoryAccess } from './repository.js';

// Release Ledger
export { createReleaseRecord, createVersionRelease, buildReleaseRequest, DEFAULT_TAG_PREFIX } from './release-ledger.js';
export { GitHubReleaseEndpoint, DirectoryReleaseEndpoint, expandUploadUrl } from './release-endpoint.js';
export type { ReleaseEndpoint } from './release-endpoint.js';

// Target Catalog
export {
  DEFAULT_TARGETS,
  STRATEGY_PROFILES,
  AUX_LIBRARIES,
  listTargets,
  findTarget,
  selectTargets,
  validateCatalog,
  resolveAssetName,
  resolveBinaryPath,
  isRunnableOn,
  hostFromPlatform,
} from './target-catalog.js';
export type { BinaryLayout, StrategyProfile } from './target-catalog.js';
export { renderCrossManifest, writeCrossManifest, crossPreBuildCommands } from './cross-manifest.js';

// Build Dispatcher
export { dispatchBuild, findCandidateBinaries } from './build-dispatcher.js';
export type { DispatchOptions } from './build-dispatcher.js';
export { ShellToolchain, CargoBuildInvoker, buildCommand } from './toolchain.js';
export type { Toolchain, BuildInvoker, BuildRequest, SystemLibraryRequest } from './toolchain.js';
export { runCommand, runCommandSequence, sanitizeCommand } from './command-runner.js';

// Artifact Packager & Publisher
export { packageArtifact, computeFingerprint, formatFingerprintLine } from './artifact-packager.js';
export { publishArtifact, artifactUploads } from './publisher.js';

// Release Log
export { ReleaseLogger } from './release-logger.js';
export type { LogEntry, LogLevel, LogStage } from './release-logger.js';
