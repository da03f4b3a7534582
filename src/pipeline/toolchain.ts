/**
 * Toolchain provisioning and build invocation.
 *
 * The dispatcher only sees the Toolchain and BuildInvoker interfaces; the
 * shell implementations below drive rustup, apt-get, brew, cargo and cross.
 */

import {
  failedStep,
  runCommand,
  runSequence,
  shellExecutor,
  type CommandExecutor,
} from './command-runner.js';
import { AUX_LIBRARIES, STRATEGY_PROFILES } from './target-catalog.js';
import type {
  AuxLibrary,
  BuildStrategy,
  HostOs,
  StepResult,
} from './types.js';

// ─── Interfaces ──────────────────────────────────────────

export interface SystemLibraryRequest {
  library: AuxLibrary;
  architecture: string;
  host: HostOs;
}

export interface ProvisionOutcome {
  steps: StepResult[];
  /** Variables the build needs to find what was installed */
  env: Record<string, string>;
}

export interface Toolchain {
  installToolchain(triple: string, strategy: BuildStrategy): Promise<StepResult[]>;
  installSystemLibrary(request: SystemLibraryRequest): Promise<ProvisionOutcome>;
}

export interface BuildRequest {
  triple: string;
  strategy: BuildStrategy;
  env: Record<string, string>;
  /** Cross manifest for emulated builds */
  manifestPath?: string | null;
}

export interface BuildInvoker {
  build(request: BuildRequest): Promise<StepResult>;
}

// ─── Shell Toolchain ─────────────────────────────────────

export const DEFAULT_CROSS_INSTALL_COMMAND = 'cargo install cross --git https://github.com/cross-rs/cross';

export interface ShellToolchainOptions {
  cwd: string;
  useSudo?: boolean;
  crossInstallCommand?: string;
  /** Per-stage overrides in milliseconds */
  timeouts?: { toolchain?: number; provision?: number };
  /** Defaults to running commands in a shell at cwd */
  executor?: CommandExecutor;
}

/**
 * Provisions the runner for every branch of a run.
 *
 * rustup, apt and brew all lock host-wide state, so their commands run one
 * at a time across branches. A library install and the cross install happen
 * at most once per toolchain; later branches share the first outcome.
 */
export class ShellToolchain implements Toolchain {
  private readonly executor: CommandExecutor;
  private hostQueue: Promise<void> = Promise.resolve();
  private crossReady: Promise<StepResult[]> | null = null;
  private readonly libraries = new Map<string, Promise<ProvisionOutcome>>();

  constructor(private readonly options: ShellToolchainOptions) {
    this.executor = options.executor ?? shellExecutor(options.cwd);
  }

  async installToolchain(triple: string, strategy: BuildStrategy): Promise<StepResult[]> {
    const steps = [
      await this.exclusive(() => this.executor.run('toolchain', `rustup target add ${triple}`, {
        timeoutMs: this.options.timeouts?.toolchain,
      })),
    ];
    if (steps[0].status === 'fail') return steps;

    if (STRATEGY_PROFILES[strategy].execution === 'emulation-wrapper') {
      steps.push(...(await this.ensureCross()));
    }
    return steps;
  }

  installSystemLibrary(request: SystemLibraryRequest): Promise<ProvisionOutcome> {
    const key = `${request.host}:${request.library}`;
    let outcome = this.libraries.get(key);
    if (!outcome) {
      outcome = this.exclusive(() => this.provision(request));
      this.libraries.set(key, outcome);
    }
    return outcome;
  }

  private async provision(request: SystemLibraryRequest): Promise<ProvisionOutcome> {
    const packages = AUX_LIBRARIES[request.library];
    const sudo = this.options.useSudo ? 'sudo ' : '';
    const runOpts = { timeoutMs: this.options.timeouts?.provision };

    switch (request.host) {
      case 'linux': {
        const steps = await runSequence(this.executor, 'provision', [
          `${sudo}apt-get update`,
          `${sudo}apt-get install -y ${packages.apt.join(' ')}`,
        ], runOpts);
        return { steps, env: {} };
      }
      case 'macos': {
        const steps = await runSequence(this.executor, 'provision', [
          'brew update',
          `brew install ${packages.brew}`,
        ], runOpts);
        const env: Record<string, string> = {};
        if (steps.every((s) => s.status === 'pass') && packages.brewPrefixEnv) {
          const prefix = await this.executor.capture(`brew --prefix ${packages.brew}`);
          if (prefix) env[packages.brewPrefixEnv] = prefix;
        }
        return { steps, env };
      }
      case 'windows':
        return {
          steps: [failedStep('provision', `install ${request.library}`, 'No system package manager is configured for windows runners')],
          env: {},
        };
    }
  }

  // One install per process, shared by every emulated branch
  private ensureCross(): Promise<StepResult[]> {
    if (!this.crossReady) {
      this.crossReady = this.exclusive(async () => {
        const probe = await this.executor.run('toolchain', 'cross --version');
        if (probe.status === 'pass') return [probe];
        const install = this.options.crossInstallCommand ?? DEFAULT_CROSS_INSTALL_COMMAND;
        return [await this.executor.run('toolchain', install, { timeoutMs: this.options.timeouts?.toolchain })];
      });
    }
    return this.crossReady;
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.hostQueue.then(work);
    this.hostQueue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

// ─── Cargo / Cross Build ─────────────────────────────────

export interface CargoBuildInvokerOptions {
  cwd: string;
  profile?: string;
  timeoutMs?: number;
}

export function buildCommand(triple: string, strategy: BuildStrategy, profile = 'release'): string {
  const tool = STRATEGY_PROFILES[strategy].execution === 'emulation-wrapper' ? 'cross' : 'cargo';
  const profileFlag = profile === 'release' ? '--release' : `--profile ${profile}`;
  return `${tool} build ${profileFlag} --target ${triple}`;
}

export class CargoBuildInvoker implements BuildInvoker {
  constructor(private readonly options: CargoBuildInvokerOptions) {}

  async build(request: BuildRequest): Promise<StepResult> {
    const env = { ...request.env };
    if (request.manifestPath) env.CROSS_CONFIG = request.manifestPath;

    return runCommand(
      'build',
      buildCommand(request.triple, request.strategy, this.options.profile),
      this.options.cwd,
      { env, timeoutMs: this.options.timeoutMs },
    );
  }
}
