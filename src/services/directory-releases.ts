/**
 * Directory-backed release store.
 * Used for dry runs: assets land in <root>/<tag>/<assetName>.
 */

import { mkdir, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { errorMessage, tagName, type TagRef } from '../models/index.js';
import { ReleaseApiError, type ReleaseClient, type UploadRequest, type UploadedAsset } from './release-client.js';

export class DirectoryReleaseClient implements ReleaseClient {
  readonly name = 'directory';

  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  releaseDirectory(tagRef: TagRef): string {
    return join(this.root, tagName(tagRef));
  }

  async uploadAsset(request: UploadRequest): Promise<UploadedAsset> {
    throwIfAborted(request);
    const directory = this.releaseDirectory(request.tagRef);
    await mkdir(directory, { recursive: true });

    const target = join(directory, request.assetName);
    const replaced = await stat(target).then(
      () => true,
      () => false
    );

    // Write beside the asset and swap it in, so a reader never sees half a file
    const staging = join(directory, `.${request.assetName}.${process.pid}.${Date.now()}.partial`);
    try {
      await writeFile(staging, request.data, { signal: request.signal });
      throwIfAborted(request);
      await rename(staging, target);
    } catch (error) {
      await rm(staging, { force: true });
      throwIfAborted(request);
      throw error;
    }

    return {
      assetName: request.assetName,
      size: request.data.byteLength,
      url: `file://${target}`,
      replaced,
    };
  }

  async listAssets(tagRef: TagRef): Promise<string[]> {
    try {
      const entries = await readdir(this.releaseDirectory(tagRef), { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}

// An aborted attempt (the publisher's per-attempt timeout) may be retried
function throwIfAborted(request: UploadRequest): void {
  if (request.signal?.aborted) {
    throw new ReleaseApiError(
      `Writing ${request.assetName} was aborted: ${errorMessage(request.signal.reason)}`,
      undefined,
      true
    );
  }
}
