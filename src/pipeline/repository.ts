/**
 * Repository access: checkout-by-revision and read-file for the version gate.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { promises as fs } from 'node:fs';
import path from 'node:path';

const execFileAsync = promisify(execFile);

/**
 * What the version gate needs from a repository.
 * readFile resolves to null when the file does not exist at the
 * checked-out revision.
 */
export interface RepositoryAccess {
  resolveRevision(ref: string): Promise<string>;
  checkout(revision: string): Promise<void>;
  readFile(relativePath: string): Promise<string | null>;
  /** Branch currently checked out, or null on a detached HEAD */
  currentBranch(): Promise<string | null>;
}

/**
 * Git working tree driven through the git CLI
 */
export class GitRepository implements RepositoryAccess {
  constructor(private readonly workDir: string) {}

  async resolveRevision(ref: string): Promise<string> {
    const out = await this.git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    return out.trim();
  }

  async checkout(revision: string): Promise<void> {
    await this.git(['checkout', '--quiet', revision]);
  }

  async readFile(relativePath: string): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.workDir, relativePath), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async currentBranch(): Promise<string | null> {
    const out = (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
    return out && out !== 'HEAD' ? out : null;
  }

  private async git(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, { cwd: this.workDir });
      return stdout;
    } catch (error) {
      const stderr = hasStderr(error) ? error.stderr.trim() : '';
      throw new Error(`git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`, { cause: error });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function hasStderr(error: unknown): error is { stderr: string } {
  return typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string';
}
