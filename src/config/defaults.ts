/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  project: {
    binary_name: 'omni',
    version_file: 'Cargo.toml',
    version_field: 'version',
    target_dir: 'target',
    profile: 'release',
    state_dir: '.binship',
  },
  release: {
    branch: 'main',
    api_url: 'https://api.github.com',
    token_env: 'GITHUB_TOKEN',
    tag_prefix: 'v',
  },
  build: {
    concurrency: 4,
    use_sudo: true,
    cross_install_command: 'cargo install cross --git https://github.com/cross-rs/cross',
    timeouts: {
      toolchain: 900,
      provision: 900,
      build: 3600,
    },
  },
  output: {
    log_level: 'info',
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'binship.config.yaml',
  'binship.config.yml',
  '.binshiprc.yaml',
  '.binshiprc.yml',
  '.binshiprc',
  '.binship/config.yaml',
];

/**
 * Global config directory, under the home directory
 */
export const GLOBAL_CONFIG_DIR = '.binship';

export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  CONCURRENCY: 'BINSHIP_CONCURRENCY',
  VERSION_FILE: 'BINSHIP_VERSION_FILE',
  BINARY_NAME: 'BINSHIP_BINARY_NAME',
  RELEASE_BRANCH: 'BINSHIP_RELEASE_BRANCH',
  LOG_LEVEL: 'BINSHIP_LOG_LEVEL',
  REPOSITORY: 'GITHUB_REPOSITORY',
} as const;
