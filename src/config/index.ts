/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';

import { ConfigError, errorMessage } from '../pipeline/errors.js';
import { DEFAULT_TARGETS } from '../pipeline/target-catalog.js';
import { TargetSpecSchema, type TargetSpec } from '../pipeline/types.js';
import { ConfigSchema, type Config, type TargetOverride } from './schema.js';
import {
  CONFIG_FILE_NAME,
  CONFIG_FILE_NAMES,
  ENV_VARS,
  GLOBAL_CONFIG_DIR,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type RawConfig = Record<string, unknown>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('binship', {
  searchPlaces: CONFIG_FILE_NAMES,
  searchStrategy: 'none',
  cache: false,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Defaults to ~/.binship/config.yaml */
  globalConfigPath?: string;
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRawConfig(value: unknown, source: string): RawConfig {
  if (value === null || value === undefined) return {};
  if (!isPlainObject(value)) {
    throw new ConfigError(`${source} must contain a mapping at the top level`);
  }
  return value;
}

export function getGlobalConfigPath(): string {
  return path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);
}

/**
 * Load global configuration from ~/.binship/config.yaml
 */
async function loadGlobalConfig(configPath: string): Promise<RawConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch {
    return {}; // no global config
  }
  try {
    return asRawConfig(parseYaml(content), configPath);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Cannot parse ${configPath}: ${errorMessage(error)}`);
  }
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<RawConfig> {
  let result: Awaited<ReturnType<typeof explorer.search>>;
  try {
    result = await explorer.search(cwd);
  } catch (error) {
    throw new ConfigError(`Cannot parse project config: ${errorMessage(error)}`);
  }
  if (!result || result.isEmpty) return {};
  const config: unknown = result.config;
  return asRawConfig(config, result.filepath);
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const project: RawConfig = {};
  const release: RawConfig = {};
  const build: RawConfig = {};
  const output: RawConfig = {};

  const concurrency = env[ENV_VARS.CONCURRENCY];
  if (concurrency) {
    const parsed = parseInt(concurrency, 10);
    if (!isNaN(parsed) && parsed >= 0) {
      build.concurrency = parsed;
    }
  }

  const versionFile = env[ENV_VARS.VERSION_FILE];
  if (versionFile) project.version_file = versionFile;

  const binaryName = env[ENV_VARS.BINARY_NAME];
  if (binaryName) project.binary_name = binaryName;

  // "none" turns the branch check off
  const branch = env[ENV_VARS.RELEASE_BRANCH];
  if (branch) release.branch = branch === 'none' ? null : branch;

  const repository = env[ENV_VARS.REPOSITORY];
  if (repository) release.repository = repository;

  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error') {
    output.log_level = logLevel;
  }

  const config: RawConfig = {};
  if (Object.keys(project).length > 0) config.project = project;
  if (Object.keys(release).length > 0) config.release = release;
  if (Object.keys(build).length > 0) config.build = build;
  if (Object.keys(output).length > 0) config.output = output;
  return config;
}

/**
 * Deep merge configuration objects; arrays and scalars from source replace
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a merged configuration, filling in defaults
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid configuration:\n${issues.join('\n')}`);
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(cwd?: string, options: LoadConfigOptions = {}): Promise<Config> {
  const globalConfig = await loadGlobalConfig(options.globalConfigPath ?? getGlobalConfigPath());
  const projectConfig = await loadProjectConfig(cwd);
  const envConfig = loadEnvConfig(options.env);

  let merged = deepMerge({}, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  return parseConfig(merged);
}

/**
 * Get a specific config value by dotted path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * Search for the project config file
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  try {
    const result = await explorer.search(cwd);
    return result?.filepath ?? null;
  } catch {
    // unparsable files still count as present for `config path`
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(cwd ?? process.cwd(), name);
      try {
        await fs.access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    return null;
  }
}

// ─── Derived Settings ────────────────────────────────────

function targetFromOverride(override: TargetOverride): TargetSpec {
  return TargetSpecSchema.parse({
    triple: override.triple,
    buildStrategy: override.build_strategy,
    host: override.host,
    outputPathPattern: override.output_path_pattern,
    assetName: override.asset_name,
    extension: override.extension,
    auxDependencies: override.aux_dependencies,
  });
}

/**
 * The target catalog in effect: the config's targets, or the built-in table
 */
export function resolveTargetCatalog(config: Config): TargetSpec[] {
  return config.targets ? config.targets.map(targetFromOverride) : [...DEFAULT_TARGETS];
}
