/**
 * Command Runner: executes toolchain, provisioning and build commands
 * and produces StepResult records.
 *
 * Safety: command sanitization, cwd enforcement, stream caps,
 * configurable timeouts.
 */

import { exec } from 'node:child_process';

import type { PipelineStage, StepResult } from './types.js';

// ─── Constants ───────────────────────────────────────────

/** Default timeout per stage in milliseconds */
export const DEFAULT_STEP_TIMEOUTS: Record<PipelineStage, number> = {
  'version-gate': 30 * 1000,
  'release-ledger': 60 * 1000,
  toolchain: 15 * 60 * 1000, // 15 minutes
  provision: 15 * 60 * 1000, // 15 minutes
  build: 60 * 60 * 1000,     // 60 minutes
  verify: 60 * 1000,
  package: 5 * 60 * 1000,
  publish: 10 * 60 * 1000,
};

/** Max stdout/stderr capture in bytes */
const MAX_OUTPUT_SIZE = 16 * 1024 * 1024; // 16 MB, cargo is chatty

/** Length of the stderr tail kept in a StepResult */
const STDERR_SUMMARY_LENGTH = 2000;

/** Dangerous command patterns to reject */
const DANGEROUS_PATTERNS = [
  /rm\s+-rf\s+\/(\s|$)/,
  />\s*\/dev\/sd/,
  />\s*\/etc\//,
  />\s*\/usr\//,
  /;\s*rm\s/,
  /&&\s*rm\s/,
  /\|\s*sh$/,
  /\|\s*bash$/,
];

// ─── Command Sanitization ────────────────────────────────

export function sanitizeCommand(command: string): { safe: boolean; reason?: string } {
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(command)) {
      return { safe: false, reason: `Matches dangerous pattern: ${pattern.source}` };
    }
  }
  return { safe: true };
}

// ─── Command Execution ───────────────────────────────────

export interface RunCommandOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
  /** Cap on each of stdout and stderr; the command is killed past it */
  maxOutputBytes?: number;
}

/** Execute a single command; never rejects */
export async function runCommand(
  step: PipelineStage,
  command: string,
  cwd: string,
  options: RunCommandOptions = {},
): Promise<StepResult> {
  const startTime = Date.now();

  const { safe, reason } = sanitizeCommand(command);
  if (!safe) {
    return {
      step,
      status: 'fail',
      command,
      exit_code: -1,
      stderr_summary: `Command rejected: ${reason}`,
      duration_ms: 0,
      timestamp: new Date().toISOString(),
    };
  }

  const timeout = options.timeoutMs ?? DEFAULT_STEP_TIMEOUTS[step];
  const maxBuffer = options.maxOutputBytes ?? MAX_OUTPUT_SIZE;

  return new Promise<StepResult>((resolve) => {
    exec(command, {
      cwd,
      timeout,
      maxBuffer,
      env: {
        ...process.env,
        ...options.env,
        CI: 'true',
      },
    }, (error, _stdout, stderr) => {
      const exitCode = error ? (typeof error.code === 'number' ? error.code : 1) : 0;
      // Node marks an overflowing child as killed too
      const overflowed = error !== null && isOutputOverflow(error);
      const timedOut = error?.killed === true && !overflowed;
      const tail = stderr ? `\n${summarize(stderr)}` : '';

      resolve({
        step,
        status: exitCode === 0 ? 'pass' : 'fail',
        command,
        exit_code: exitCode,
        stderr_summary: overflowed
          ? `Output exceeded ${maxBuffer} bytes${tail}`
          : timedOut
            ? `Timed out after ${timeout}ms${tail}`
            : summarize(stderr),
        duration_ms: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });
    });
  });
}

/** Run commands in order, stopping at the first failure */
export async function runCommandSequence(
  step: PipelineStage,
  commands: string[],
  cwd: string,
  options: RunCommandOptions = {},
): Promise<StepResult[]> {
  return runSequence(shellExecutor(cwd), step, commands, options);
}

/** Run a short query command and return its trimmed stdout, or null on failure */
export async function captureCommand(
  command: string,
  cwd: string,
  timeoutMs = 30 * 1000,
): Promise<string | null> {
  return new Promise<string | null>((resolve) => {
    exec(command, { cwd, timeout: timeoutMs }, (error, stdout) => {
      resolve(error ? null : stdout.trim());
    });
  });
}

// ─── Executor ────────────────────────────────────────────

/** The command runner bound to a working directory */
export interface CommandExecutor {
  run(step: PipelineStage, command: string, options?: RunCommandOptions): Promise<StepResult>;
  capture(command: string): Promise<string | null>;
}

export function shellExecutor(cwd: string): CommandExecutor {
  return {
    run: (step, command, options) => runCommand(step, command, cwd, options),
    capture: (command) => captureCommand(command, cwd),
  };
}

/** Run commands through an executor in order, stopping at the first failure */
export async function runSequence(
  executor: CommandExecutor,
  step: PipelineStage,
  commands: string[],
  options: RunCommandOptions = {},
): Promise<StepResult[]> {
  const results: StepResult[] = [];
  for (const command of commands) {
    const result = await executor.run(step, command, options);
    results.push(result);
    if (result.status === 'fail') break;
  }
  return results;
}

// ─── Step Records ────────────────────────────────────────

/** A StepResult for a step that had nothing to do */
export function skippedStep(step: PipelineStage, note: string): StepResult {
  return {
    step,
    status: 'skip',
    command: '',
    exit_code: 0,
    stderr_summary: note,
    duration_ms: 0,
    timestamp: new Date().toISOString(),
  };
}

/** A failed StepResult for work done in-process rather than by a command */
export function failedStep(step: PipelineStage, command: string, message: string): StepResult {
  return {
    step,
    status: 'fail',
    command,
    exit_code: 1,
    stderr_summary: message,
    duration_ms: 0,
    timestamp: new Date().toISOString(),
  };
}

function isOutputOverflow(error: object): boolean {
  return 'code' in error && error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
}

// Keep the tail: the actual error is usually at the end of a build log
function summarize(stderr: string | undefined): string | undefined {
  if (!stderr) return undefined;
  if (stderr.length <= STDERR_SUMMARY_LENGTH) return stderr;
  return '... (truncated)\n' + stderr.slice(-STDERR_SUMMARY_LENGTH);
}
