/**
 * Pipeline error classes.
 *
 * Gate and ledger errors abort the whole run. Branch-level failures
 * (provision, build, package, publish) are reported as values and never
 * surface as these exceptions outside the branch that produced them.
 */

import type { PipelineStage } from './types.js';

export class PipelineError extends Error {
  readonly stage: PipelineStage | 'graph' | 'config';

  constructor(stage: PipelineStage | 'graph' | 'config', message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.stage = stage;
  }
}

/** Repository could not be read at the tip or parent revision */
export class GateError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('version-gate', message, options);
    this.name = 'GateError';
  }
}

/** Release record could not be created */
export class LedgerError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('release-ledger', message, options);
    this.name = 'LedgerError';
  }
}

/** Non-success response from a release endpoint */
export class EndpointError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'EndpointError';
    this.status = status;
  }
}

/** A release with the same tag already exists */
export class ReleaseConflictError extends EndpointError {
  readonly tag: string;

  constructor(tag: string, status?: number) {
    super(`Release ${tag} already exists`, status);
    this.name = 'ReleaseConflictError';
    this.tag = tag;
  }
}

/** An asset with the same name is already attached to the release */
export class AssetConflictError extends EndpointError {
  readonly assetName: string;

  constructor(assetName: string, status?: number) {
    super(`Asset ${assetName} already exists on the release`, status);
    this.name = 'AssetConflictError';
    this.assetName = assetName;
  }
}

/** Job graph is malformed (cycle, unknown dependency, duplicate id) */
export class JobGraphError extends PipelineError {
  constructor(message: string) {
    super('graph', message);
    this.name = 'JobGraphError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

/** Render an unknown thrown value as a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
