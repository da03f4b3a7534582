/**
 * CLI commands index
 * Exports all command creators
 */

export { createCheckCommand, formatGithubOutput } from './check.js';
export { createCreateReleaseCommand } from './create-release.js';
export { createBuildCommand, readReleaseRecord } from './build.js';
export { createReleaseCommand, chooseTargets, parseConcurrency } from './release.js';
export { createTargetsCommand, createManifestCommand } from './targets.js';
export { createConfigCommand, generateYamlConfig } from './config.js';
