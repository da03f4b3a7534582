/**
 * Release record types: the externally visible release and its uploads.
 */

import { z } from 'zod';

// ─── Release Record ──────────────────────────────────────

export const ReleaseRecordSchema = z.object({
  tag: z.string().min(1),
  title: z.string(),
  draft: z.boolean(),
  prerelease: z.boolean(),
  /** Where assets are uploaded; a URL or URL template for HTTP endpoints */
  uploadEndpoint: z.string().min(1),
  id: z.union([z.string(), z.number()]).optional(),
  htmlUrl: z.string().optional(),
});
export type ReleaseRecord = z.infer<typeof ReleaseRecordSchema>;

/** Parameters for creating a release record */
export interface ReleaseRequest {
  tag: string;
  title: string;
  draft: boolean;
  prerelease: boolean;
}

// ─── Asset Uploads ───────────────────────────────────────

export interface AssetUpload {
  path: string;
  name: string;
  contentType: string;
}

export const UploadResultSchema = z.object({
  name: z.string(),
  path: z.string(),
  status: z.enum(['uploaded', 'failed']),
  error: z.string().optional(),
});
export type UploadResult = z.infer<typeof UploadResultSchema>;
