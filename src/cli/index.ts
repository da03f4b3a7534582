/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';

import {
  createCheckCommand,
  createCreateReleaseCommand,
  createBuildCommand,
  createReleaseCommand,
  createTargetsCommand,
  createManifestCommand,
  createConfigCommand,
} from './commands/index.js';
import { printError } from './output.js';
import { errorMessage } from '../pipeline/errors.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson = z.object({ version: z.string() }).parse(require('../../package.json'));
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('binship')
    .description('Cut a release when the version changes and publish a binary for every target')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createCheckCommand());
  program.addCommand(createCreateReleaseCommand());
  program.addCommand(createBuildCommand());
  program.addCommand(createReleaseCommand());
  program.addCommand(createTargetsCommand());
  program.addCommand(createManifestCommand());
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(errorMessage(error));
    process.exit(1);
  }
}
