/**
 * Release endpoints: where release records are created and assets uploaded.
 *
 * GitHubReleaseEndpoint talks to the GitHub REST API. DirectoryReleaseEndpoint
 * lays a release out on the local filesystem and backs `--dry-run`.
 */

import { promises as fs, constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import {
  AssetConflictError,
  EndpointError,
  ReleaseConflictError,
} from './errors.js';
import type { AssetUpload, ReleaseRecord, ReleaseRequest } from './types.js';

export interface ReleaseEndpoint {
  /** Create a release; rejects with ReleaseConflictError when the tag exists */
  createRelease(request: ReleaseRequest): Promise<ReleaseRecord>;
  /** Attach one file; rejects with AssetConflictError when the name is taken */
  uploadAsset(uploadEndpoint: string, asset: AssetUpload): Promise<void>;
}

// ─── GitHub ──────────────────────────────────────────────

const GitHubReleaseResponseSchema = z.object({
  id: z.number(),
  html_url: z.string(),
  upload_url: z.string(),
});

const GitHubErrorResponseSchema = z.object({
  message: z.string().optional(),
  errors: z.array(z.object({ code: z.string().optional() }).passthrough()).optional(),
});

export interface GitHubReleaseEndpointOptions {
  /** owner/repo */
  repository: string;
  token: string;
  apiUrl?: string;
  fetch?: typeof fetch;
}

export class GitHubReleaseEndpoint implements ReleaseEndpoint {
  private readonly repository: string;
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitHubReleaseEndpointOptions) {
    if (!/^[^/\s]+\/[^/\s]+$/.test(options.repository)) {
      throw new EndpointError(`Repository must be owner/repo, got "${options.repository}"`);
    }
    this.repository = options.repository;
    this.token = options.token;
    this.apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async createRelease(request: ReleaseRequest): Promise<ReleaseRecord> {
    const response = await this.fetchImpl(`${this.apiUrl}/repos/${this.repository}/releases`, {
      method: 'POST',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify({
        tag_name: request.tag,
        name: request.title,
        draft: request.draft,
        prerelease: request.prerelease,
      }),
    });

    if (response.status === 422 && (await isAlreadyExists(response))) {
      throw new ReleaseConflictError(request.tag, response.status);
    }
    if (!response.ok) {
      throw new EndpointError(
        `Creating release ${request.tag} failed: HTTP ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    const body = GitHubReleaseResponseSchema.parse(await response.json());
    return {
      tag: request.tag,
      title: request.title,
      draft: request.draft,
      prerelease: request.prerelease,
      uploadEndpoint: body.upload_url,
      id: body.id,
      htmlUrl: body.html_url,
    };
  }

  async uploadAsset(uploadEndpoint: string, asset: AssetUpload): Promise<void> {
    const data = await fs.readFile(asset.path);
    const response = await this.fetchImpl(expandUploadUrl(uploadEndpoint, asset.name), {
      method: 'POST',
      headers: {
        ...this.headers(),
        'Content-Type': asset.contentType,
        'Content-Length': String(data.byteLength),
      },
      body: data,
    });

    if (response.status === 422) {
      throw new AssetConflictError(asset.name, response.status);
    }
    if (!response.ok) {
      throw new EndpointError(
        `Uploading ${asset.name} failed: HTTP ${response.status} ${response.statusText}`,
        response.status,
      );
    }
  }

  private headers(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      Authorization: `Bearer ${this.token}`,
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'binship',
    };
  }
}

/**
 * Turn an upload_url template such as
 * `https://uploads.github.com/repos/o/r/releases/1/assets{?name,label}`
 * into a concrete URL for one asset.
 */
export function expandUploadUrl(template: string, name: string): string {
  const base = template.replace(/\{[^}]*\}$/, '');
  return `${base}?name=${encodeURIComponent(name)}`;
}

async function isAlreadyExists(response: Response): Promise<boolean> {
  const parsed = GitHubErrorResponseSchema.safeParse(await response.json().catch(() => ({})));
  if (!parsed.success) return false;
  return (parsed.data.errors ?? []).some((e) => e.code === 'already_exists');
}

// ─── Local Directory ─────────────────────────────────────

const RELEASE_FILE = 'release.json';

/**
 * Each release is a directory named after its tag holding release.json and
 * the uploaded assets. Existing tags and asset names conflict, matching the
 * hosted endpoint.
 */
export class DirectoryReleaseEndpoint implements ReleaseEndpoint {
  constructor(private readonly rootDir: string) {}

  async createRelease(request: ReleaseRequest): Promise<ReleaseRecord> {
    const releaseDir = path.resolve(this.rootDir, request.tag);
    await fs.mkdir(this.rootDir, { recursive: true });

    try {
      await fs.mkdir(releaseDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new ReleaseConflictError(request.tag);
      }
      throw error;
    }

    const record: ReleaseRecord = {
      ...request,
      uploadEndpoint: releaseDir,
      id: request.tag,
    };
    await fs.writeFile(path.join(releaseDir, RELEASE_FILE), JSON.stringify(record, null, 2), 'utf-8');
    return record;
  }

  async uploadAsset(uploadEndpoint: string, asset: AssetUpload): Promise<void> {
    if (asset.name === RELEASE_FILE || asset.name.includes('/') || asset.name.includes('\\')) {
      throw new EndpointError(`Invalid asset name: ${asset.name}`);
    }
    try {
      await fs.copyFile(asset.path, path.join(uploadEndpoint, asset.name), fsConstants.COPYFILE_EXCL);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new AssetConflictError(asset.name);
      }
      throw error;
    }
  }
}
