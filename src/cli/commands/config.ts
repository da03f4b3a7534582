/**
 * Config command
 * Manage CLI configuration
 */

import { Command } from 'commander';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { stringify as stringifyYaml } from 'yaml';

import {
  findConfigPath,
  getConfigValue,
  getGlobalConfigPath,
  loadConfig,
  type Config,
} from '../../config/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { ConfigError } from '../../pipeline/errors.js';
import {
  printHeader,
  printSection,
  printSuccess,
  printInfo,
  printKeyValue,
  printJson,
} from '../output.js';

interface JsonOption {
  json?: boolean;
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Manage CLI configuration');

  // Show current config
  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      const loadedConfig = await loadConfig();
      const configPath = await findConfigPath();

      if (options.json) {
        printJson(loadedConfig);
        return;
      }

      printHeader('Current Configuration');

      if (configPath) {
        printInfo(`Config file: ${configPath}`);
      } else {
        printInfo('Using default configuration');
      }

      printConfig(loadedConfig);
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      if (options.json) {
        printJson(DEFAULT_CONFIG);
        return;
      }

      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  // Get a specific config value
  config
    .command('get')
    .description('Get a specific configuration value')
    .argument('<key>', 'Configuration key (e.g., build.concurrency)')
    .action(async (key: string) => {
      const loadedConfig = await loadConfig();
      const value = getConfigValue(loadedConfig, key);

      if (value === undefined) {
        throw new ConfigError(`Configuration key not found: ${key}`);
      }

      if (typeof value === 'object' && value !== null) {
        printJson(value);
      } else {
        console.log(String(value));
      }
    });

  // Show config file path
  config
    .command('path')
    .description('Show configuration file path')
    .action(async () => {
      const configPath = await findConfigPath();

      if (configPath) {
        console.log(configPath);
      } else {
        printInfo('No configuration file found');
        printInfo('Create one at: binship.config.yaml, .binshiprc.yaml, or .binship/config.yaml');
      }
      printInfo(`Global config: ${getGlobalConfigPath()}`);
    });

  // Init config file
  config
    .command('init')
    .description('Create binship.config.yaml with the default values')
    .action(async () => {
      const filepath = path.join(process.cwd(), 'binship.config.yaml');

      try {
        await fs.access(filepath);
        throw new ConfigError(`Configuration file already exists: ${filepath}`);
      } catch (error) {
        if (error instanceof ConfigError) throw error;
        // File doesn't exist, good to create
      }

      await fs.writeFile(filepath, generateYamlConfig(), 'utf-8');
      printSuccess(`Created configuration file: ${filepath}`);
    });

  return config;
}

function printConfig(config: Config): void {
  printConfigSection('Project', config.project);
  printConfigSection('Release', config.release);
  printConfigSection('Build', config.build);
  printConfigSection('Output', config.output);
  if (config.targets) {
    printSection('Targets');
    printKeyValue('  override', `${config.targets.length} target(s)`);
  }
  console.log();
}

/**
 * Print a configuration section
 */
function printConfigSection(name: string, section: object): void {
  printSection(name);

  for (const [key, value] of Object.entries(section)) {
    if (typeof value === 'object' && value !== null) {
      console.log(`  ${key}:`);
      for (const [subKey, subValue] of Object.entries(value)) {
        printKeyValue(`    ${subKey}`, String(subValue));
      }
    } else {
      printKeyValue(`  ${key}`, String(value));
    }
  }
}

/**
 * Generate YAML configuration content
 */
export function generateYamlConfig(): string {
  return [
    '# binship configuration',
    '# Environment variables (BINSHIP_*, GITHUB_REPOSITORY) override these values.',
    '# Set release.branch to null to release from any branch.',
    '',
    stringifyYaml(DEFAULT_CONFIG),
  ].join('\n');
}
