/**
 * Release host abstraction
 */

import type { TagRef } from '../models/index.js';

export interface ReleaseTarget {
  readonly tagRef: TagRef;
}

export interface UploadRequest {
  tagRef: TagRef;
  assetName: string;
  data: Buffer;
  token?: string;
  signal?: AbortSignal;
}

export interface UploadedAsset {
  assetName: string;
  size: number;
  url?: string;
  /** An asset of the same name existed and was overwritten */
  replaced: boolean;
}

/**
 * Upload must be idempotent per (tagRef, assetName): a second upload
 * replaces the first instead of adding a duplicate.
 */
export interface ReleaseClient {
  readonly name: string;
  uploadAsset(request: UploadRequest): Promise<UploadedAsset>;
  listAssets(tagRef: TagRef, token?: string): Promise<string[]>;
}

export class ReleaseApiError extends Error {
  constructor(
    message: string,
    readonly status: number | undefined,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = 'ReleaseApiError';
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
