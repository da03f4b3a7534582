/**
 * Pipeline type definitions: barrel re-export from type-defs/ sub-modules.
 *
 * All types are defined in src/pipeline/type-defs/ for modularity:
 *   enums.ts     BuildStrategy, HostOs, PipelineStage, BranchStage
 *   version.ts   ReleaseDecision
 *   release.ts   ReleaseRecord, ReleaseRequest, AssetUpload, UploadResult
 *   targets.ts   TargetSpec, AuxDependency, AuxLibrary
 *   checks.ts    StepResult
 *   artifacts.ts BuildResult, Artifact, BranchResult, RunReport
 */

export * from './type-defs/index.js';
