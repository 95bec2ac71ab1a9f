/**
 * GitHub Releases client
 * Finds (or creates) the release of a tag and replaces a named asset on it
 */

import { z } from 'zod';
import { tagName, type TagRef } from '../models/index.js';
import {
  ReleaseApiError,
  isTransientStatus,
  type ReleaseClient,
  type UploadRequest,
  type UploadedAsset,
} from './release-client.js';

const ReleaseSchema = z.object({
  id: z.number().int(),
  tag_name: z.string(),
});

const AssetSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  size: z.number().int().optional(),
  browser_download_url: z.string().optional(),
});

type Release = z.infer<typeof ReleaseSchema>;
type Asset = z.infer<typeof AssetSchema>;

export interface GitHubReleaseClientOptions {
  repository: string;
  apiUrl?: string;
  uploadUrl?: string;
  token?: string;
  fetch?: typeof fetch;
}

const API_VERSION = '2022-11-28';
const ASSET_PAGE_SIZE = 100;

export class GitHubReleaseClient implements ReleaseClient {
  readonly name = 'github';

  private readonly apiUrl: string;
  private readonly uploadUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitHubReleaseClientOptions) {
    this.apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.uploadUrl = (options.uploadUrl ?? 'https://uploads.github.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async uploadAsset(request: UploadRequest): Promise<UploadedAsset> {
    const token = request.token ?? this.options.token;
    const release = await this.ensureRelease(request.tagRef, token, request.signal);

    const existing = (await this.listReleaseAssets(release.id, token, request.signal)).filter(
      (asset) => asset.name === request.assetName
    );
    for (const asset of existing) {
      await this.deleteAsset(asset.id, token, request.signal);
    }

    const url = `${this.uploadUrl}/repos/${this.options.repository}/releases/${release.id}/assets?name=${encodeURIComponent(request.assetName)}`;
    const response = await this.send(url, {
      method: 'POST',
      headers: {
        ...this.headers(token),
        'Content-Type': 'application/octet-stream',
        'Content-Length': String(request.data.byteLength),
      },
      body: request.data,
      signal: request.signal,
    });

    if (response.status !== 201) {
      // 422 here means a same-named asset appeared between delete and upload
      throw await this.failure(response, `upload ${request.assetName}`, response.status === 422);
    }

    const uploaded = AssetSchema.parse(await response.json());
    return {
      assetName: uploaded.name,
      size: uploaded.size ?? request.data.byteLength,
      ...(uploaded.browser_download_url ? { url: uploaded.browser_download_url } : {}),
      replaced: existing.length > 0,
    };
  }

  async listAssets(tagRef: TagRef, token?: string): Promise<string[]> {
    const release = await this.getRelease(tagRef, token ?? this.options.token);
    if (!release) {
      return [];
    }
    const assets = await this.listReleaseAssets(release.id, token ?? this.options.token);
    return assets.map((asset) => asset.name).sort();
  }

  private headers(token: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': API_VERSION,
      'User-Agent': 'release-matrix',
    };
    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }
    return headers;
  }

  private repoUrl(path: string): string {
    return `${this.apiUrl}/repos/${this.options.repository}${path}`;
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (error) {
      // Network errors and per-attempt timeouts are worth another try
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      throw new ReleaseApiError(`Request to ${new URL(url).pathname} failed: ${reason}`, undefined, true);
    }
  }

  private async failure(response: Response, action: string, forceRetry = false): Promise<ReleaseApiError> {
    let detail = '';
    try {
      detail = (await response.text()).slice(0, 500);
    } catch {
      detail = response.statusText;
    }

    const rateLimited = response.status === 403 && response.headers.get('x-ratelimit-remaining') === '0';
    const retryable = forceRetry || rateLimited || isTransientStatus(response.status);
    return new ReleaseApiError(
      `GitHub ${action} failed with HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
      response.status,
      retryable
    );
  }

  private async getRelease(tagRef: TagRef, token: string | undefined, signal?: AbortSignal): Promise<Release | null> {
    const response = await this.send(this.repoUrl(`/releases/tags/${encodeURIComponent(tagName(tagRef))}`), {
      headers: this.headers(token),
      signal,
    });
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw await this.failure(response, `lookup of release ${tagName(tagRef)}`);
    }
    return ReleaseSchema.parse(await response.json());
  }

  private async ensureRelease(tagRef: TagRef, token: string | undefined, signal?: AbortSignal): Promise<Release> {
    const found = await this.getRelease(tagRef, token, signal);
    if (found) {
      return found;
    }

    const tag = tagName(tagRef);
    const response = await this.send(this.repoUrl('/releases'), {
      method: 'POST',
      headers: { ...this.headers(token), 'Content-Type': 'application/json' },
      body: JSON.stringify({ tag_name: tag, name: tag }),
      signal,
    });

    if (response.status === 201) {
      return ReleaseSchema.parse(await response.json());
    }

    // A sibling target may have created the release first
    if (response.status === 422) {
      const raced = await this.getRelease(tagRef, token, signal);
      if (raced) {
        return raced;
      }
    }
    throw await this.failure(response, `creation of release ${tag}`);
  }

  private async listReleaseAssets(releaseId: number, token: string | undefined, signal?: AbortSignal): Promise<Asset[]> {
    const assets: Asset[] = [];
    for (let page = 1; ; page++) {
      const response = await this.send(
        this.repoUrl(`/releases/${releaseId}/assets?per_page=${ASSET_PAGE_SIZE}&page=${page}`),
        { headers: this.headers(token), signal }
      );
      if (!response.ok) {
        throw await this.failure(response, `listing assets of release ${releaseId}`);
      }
      const batch = z.array(AssetSchema).parse(await response.json());
      assets.push(...batch);
      if (batch.length < ASSET_PAGE_SIZE) {
        return assets;
      }
    }
  }

  private async deleteAsset(assetId: number, token: string | undefined, signal?: AbortSignal): Promise<void> {
    const response = await this.send(this.repoUrl(`/releases/assets/${assetId}`), {
      method: 'DELETE',
      headers: this.headers(token),
      signal,
    });
    // 404: already gone, which is what we wanted
    if (response.status !== 204 && response.status !== 404) {
      throw await this.failure(response, `deletion of asset ${assetId}`);
    }
  }
}
