/**
 * Artifact locator
 * Confirms the declared output of a build exists where the matrix says it will
 */

import { stat } from 'fs/promises';
import { join, resolve } from 'path';
import type { ArtifactMissingError, Result, TargetDescriptor } from '../models/index.js';
import { Ok, Err, errorMessage } from '../models/index.js';

export interface LocatedArtifact {
  path: string;
  size: number;
}

export class ArtifactLocator {
  expectedPath(descriptor: TargetDescriptor, workingDirectory: string): string {
    const directory = descriptor.artifactDirectory
      ? join(workingDirectory, descriptor.artifactDirectory)
      : workingDirectory;
    return resolve(directory, descriptor.artifactName);
  }

  /**
   * Only existence and file type are checked; the bytes are not inspected.
   */
  async locate(
    descriptor: TargetDescriptor,
    workingDirectory: string
  ): Promise<Result<LocatedArtifact, ArtifactMissingError>> {
    const path = this.expectedPath(descriptor, workingDirectory);

    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        return Err({
          kind: 'ARTIFACT_MISSING',
          message: `Build succeeded but ${descriptor.artifactName} is not a regular file`,
          expectedPath: path,
        });
      }
      return Ok({ path, size: stats.size });
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      return Err({
        kind: 'ARTIFACT_MISSING',
        message:
          code === 'ENOENT'
            ? `Build succeeded but ${descriptor.artifactName} was not produced`
            : `Cannot stat ${descriptor.artifactName}: ${errorMessage(error)}`,
        expectedPath: path,
      });
    }
  }
}
