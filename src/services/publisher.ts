/**
 * Release publisher
 * Uploads a located artifact to the tag's release, retrying transient failures
 */

import { readFile } from 'fs/promises';
import pRetry, { AbortError } from 'p-retry';
import type { Logger } from 'pino';
import type { PublishedAsset, Result, UploadError } from '../models/index.js';
import { Ok, Err, attempt, errorMessage } from '../models/index.js';
import { ReleaseApiError, type ReleaseClient, type ReleaseTarget } from './release-client.js';

export interface PublisherOptions {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  /** Bound on a single upload attempt */
  attemptTimeoutMs: number;
  token?: string;
}

export class ReleasePublisher {
  constructor(
    private readonly client: ReleaseClient,
    private readonly options: PublisherOptions,
    private readonly logger: Logger
  ) {}

  async publish(
    artifactPath: string,
    assetName: string,
    release: ReleaseTarget
  ): Promise<Result<PublishedAsset, UploadError>> {
    const read = await attempt(
      () => readFile(artifactPath),
      (error): UploadError => ({
        kind: 'UPLOAD',
        message: `Cannot read artifact ${artifactPath}: ${errorMessage(error)}`,
        attempts: 0,
      })
    );
    if (!read.ok) {
      return Err(read.error);
    }
    const data = read.value;

    let attempts = 0;
    try {
      const uploaded = await pRetry(
        async (attemptNumber) => {
          attempts = attemptNumber;
          try {
            return await this.client.uploadAsset({
              tagRef: release.tagRef,
              assetName,
              data,
              ...(this.options.token !== undefined ? { token: this.options.token } : {}),
              signal: AbortSignal.timeout(this.options.attemptTimeoutMs),
            });
          } catch (error) {
            if (error instanceof ReleaseApiError && error.retryable) {
              throw error;
            }
            throw new AbortError(error instanceof Error ? error : new Error(String(error)));
          }
        },
        {
          retries: Math.max(0, this.options.maxAttempts - 1),
          factor: this.options.backoffFactor,
          minTimeout: this.options.initialDelayMs,
          maxTimeout: this.options.maxDelayMs,
          onFailedAttempt: (error) => {
            this.logger.warn(
              { assetName, attempt: error.attemptNumber, retriesLeft: error.retriesLeft, error: error.message },
              'Upload attempt failed'
            );
          },
        }
      );

      this.logger.info(
        { assetName, tagRef: release.tagRef, size: uploaded.size, replaced: uploaded.replaced, attempts },
        'Asset published'
      );

      return Ok({
        assetName: uploaded.assetName,
        tagRef: release.tagRef,
        size: uploaded.size,
        ...(uploaded.url !== undefined ? { url: uploaded.url } : {}),
        attempts,
      });
    } catch (error) {
      return Err({
        kind: 'UPLOAD',
        message: `Uploading ${assetName} to ${release.tagRef} failed: ${errorMessage(error)}`,
        attempts,
        ...(error instanceof ReleaseApiError && error.status !== undefined ? { status: error.status } : {}),
      });
    }
  }

  /** Asset names the tag's release holds right now */
  async releaseAssets(release: ReleaseTarget): Promise<Result<string[], string>> {
    return attempt(
      () => this.client.listAssets(release.tagRef, this.options.token),
      (error) => `Cannot list assets of ${release.tagRef}: ${errorMessage(error)}`
    );
  }
}
