/**
 * Build Dispatcher: turns a TargetSpec into a BuildResult.
 *
 * Per target, strictly in order:
 *   (a) install the toolchain for the triple
 *   (b) provision auxiliary dependencies the way the strategy prescribes
 *   (c) invoke the build through the strategy's execution path
 *   (d) verify the expected binary exists
 *
 * Failures are returned, never thrown, and only fail their own target.
 * A missing binary comes back with a listing of candidate binaries.
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';

import { failedStep, skippedStep } from './command-runner.js';
import { writeCrossManifest } from './cross-manifest.js';
import { errorMessage } from './errors.js';
import type { ReleaseLogger } from './release-logger.js';
import {
  STRATEGY_PROFILES,
  resolveBinaryPath,
  type BinaryLayout,
} from './target-catalog.js';
import type { BuildInvoker, Toolchain } from './toolchain.js';
import type {
  BranchStage,
  BuildResult,
  StepResult,
  TargetSpec,
} from './types.js';

// ─── Types ───────────────────────────────────────────────

export interface DispatchOptions {
  toolchain: Toolchain;
  invoker: BuildInvoker;
  projectDir: string;
  layout: BinaryLayout;
  /** Where per-target cross manifests are written */
  manifestDir: string;
  logger?: ReleaseLogger;
}

interface ProvisionResult {
  steps: StepResult[];
  env: Record<string, string>;
  manifestPath: string | null;
}

// ─── Dispatch ────────────────────────────────────────────

/** Build one target; never rejects */
export async function dispatchBuild(target: TargetSpec, options: DispatchOptions): Promise<BuildResult> {
  const { toolchain, invoker, projectDir, layout, logger } = options;
  const binaryPath = path.resolve(projectDir, resolveBinaryPath(target, layout));
  const steps: StepResult[] = [];
  let stage: BranchStage = 'toolchain';

  const fail = (failedStep: BranchStage, error: string, diagnostics: string[] = []): BuildResult => ({
    target,
    binaryPath,
    success: false,
    failedStep,
    error,
    diagnostics,
    steps,
  });

  await logger?.stageStart('build', `${target.triple} (${target.buildStrategy})`);

  try {
    // (a) toolchain
    steps.push(...(await toolchain.installToolchain(target.triple, target.buildStrategy)));
    const toolchainFailure = firstFailure(steps);
    if (toolchainFailure) {
      await logger?.stageFailed('toolchain', target.triple, describeFailure(toolchainFailure));
      return fail('toolchain', describeFailure(toolchainFailure));
    }

    // (b) auxiliary dependencies
    stage = 'provision';
    const provision = await provisionAuxDependencies(target, options);
    steps.push(...provision.steps);
    const provisionFailure = firstFailure(provision.steps);
    if (provisionFailure) {
      await logger?.stageFailed('provision', target.triple, describeFailure(provisionFailure));
      return fail('provision', describeFailure(provisionFailure));
    }

    // (c) build
    stage = 'build';
    const build = await invoker.build({
      triple: target.triple,
      strategy: target.buildStrategy,
      env: provision.env,
      manifestPath: provision.manifestPath,
    });
    steps.push(build);
    if (build.status === 'fail') {
      await logger?.stageFailed('build', target.triple, describeFailure(build));
      return fail('build', describeFailure(build));
    }

    // (d) verify output
    stage = 'verify';
    if (!(await fileExists(binaryPath))) {
      const diagnostics = await findCandidateBinaries(projectDir, layout);
      const error = `Binary not found at ${path.relative(projectDir, binaryPath)}`;
      await logger?.stageFailed('verify', target.triple, error, { candidates: diagnostics });
      return fail('verify', error, diagnostics);
    }
  } catch (error) {
    await logger?.stageFailed(stage, target.triple, errorMessage(error));
    return fail(stage, errorMessage(error));
  }

  await logger?.stageComplete('build', target.triple, { binaryPath });
  return { target, binaryPath, success: true, diagnostics: [], steps };
}

// ─── Provisioning ────────────────────────────────────────

async function provisionAuxDependencies(target: TargetSpec, options: DispatchOptions): Promise<ProvisionResult> {
  const profile = STRATEGY_PROFILES[target.buildStrategy];

  if (target.auxDependencies.length === 0 || profile.provisioning === 'none') {
    return {
      steps: [skippedStep('provision', 'No auxiliary dependencies')],
      env: {},
      manifestPath: null,
    };
  }

  if (profile.provisioning === 'cross-manifest') {
    let manifestPath: string | null;
    try {
      manifestPath = await writeCrossManifest(target, options.manifestDir);
    } catch (error) {
      return {
        steps: [failedStep('provision', `write cross manifest for ${target.triple}`, errorMessage(error))],
        env: {},
        manifestPath: null,
      };
    }
    return {
      steps: [{
        step: 'provision',
        status: 'pass',
        command: `write cross manifest ${manifestPath ?? ''}`.trim(),
        exit_code: 0,
        duration_ms: 0,
        timestamp: new Date().toISOString(),
      }],
      env: {},
      manifestPath,
    };
  }

  const steps: StepResult[] = [];
  const env: Record<string, string> = {};
  for (const dep of target.auxDependencies) {
    const outcome = await options.toolchain.installSystemLibrary({
      library: dep.library,
      architecture: dep.architecture,
      host: target.host,
    });
    steps.push(...outcome.steps);
    Object.assign(env, outcome.env);
    if (firstFailure(outcome.steps)) break;
  }
  return { steps, env, manifestPath: null };
}

// ─── Helpers ─────────────────────────────────────────────

function firstFailure(steps: StepResult[]): StepResult | undefined {
  return steps.find((s) => s.status === 'fail');
}

function describeFailure(step: StepResult): string {
  const head = step.command ? `${step.command} exited with ${step.exit_code}` : `${step.step} failed`;
  return step.stderr_summary ? `${head}: ${step.stderr_summary}` : head;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * List files under the target dir that look like build outputs: the binary
 * name, its .exe form, or any .wasm module. Paths are relative to the
 * project and sorted.
 */
export async function findCandidateBinaries(projectDir: string, layout: BinaryLayout): Promise<string[]> {
  const root = path.resolve(projectDir, layout.targetDir);
  const names = new Set([layout.binaryName, `${layout.binaryName}.exe`]);
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return; // target dir may not exist at all
    }
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (names.has(entry.name) || entry.name.endsWith('.wasm')) {
        found.push(path.relative(projectDir, full));
      }
    }
  }

  await walk(root);
  return found.sort();
}
