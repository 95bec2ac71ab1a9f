/**
 * Per-target build environments.
 * Each pipeline instance gets its own scratch directory and variable set;
 * nothing here is shared between targets.
 */

import { cp, mkdir, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { delimiter, join, resolve } from 'path';
import type { TargetDescriptor } from '../models/index.js';

export type WorkspaceMode = 'shared' | 'copy';

export interface BuildEnvironment {
  readonly artifactName: string;
  readonly workingDirectory: string;
  readonly scratchDirectory: string;
  readonly environmentVariables: Readonly<Record<string, string>>;
}

export interface EnvironmentOptions {
  sourceDir: string;
  workspace: WorkspaceMode;
}

// Windows spells it Path; setting a second PATH key makes the child's lookup ambiguous
export function pathVariableName(env: Readonly<Record<string, string | undefined>> = process.env): string {
  return Object.keys(env).find((key) => key.toUpperCase() === 'PATH') ?? 'PATH';
}

export function prependToPath(current: string | undefined, directories: readonly string[]): string {
  const existing = (current ?? '').split(delimiter).filter((entry) => entry.length > 0);
  const additions = directories.filter((dir, index) => directories.indexOf(dir) === index && !existing.includes(dir));
  return [...additions, ...existing].join(delimiter);
}

/**
 * Allocate the scratch directory and, in copy mode, a private copy of the source tree.
 */
export async function createBuildEnvironment(
  descriptor: TargetDescriptor,
  options: EnvironmentOptions
): Promise<BuildEnvironment> {
  const scratchDirectory = await mkdtemp(join(tmpdir(), `release-matrix-${descriptor.artifactName}-`));
  const sourceRoot = resolve(options.sourceDir);

  try {
    let treeRoot = sourceRoot;
    if (options.workspace === 'copy') {
      treeRoot = join(scratchDirectory, 'src');
      await cp(sourceRoot, treeRoot, { recursive: true, verbatimSymlinks: true });
    }

    const tempDir = join(scratchDirectory, 'tmp');
    await mkdir(tempDir, { recursive: true });

    return {
      artifactName: descriptor.artifactName,
      workingDirectory: descriptor.workingDirectory ? join(treeRoot, descriptor.workingDirectory) : treeRoot,
      scratchDirectory,
      environmentVariables: {
        ...descriptor.env,
        TMPDIR: tempDir,
        TMP: tempDir,
        TEMP: tempDir,
        RELEASE_MATRIX_TARGET: descriptor.artifactName,
        RELEASE_MATRIX_OS: descriptor.platformOS,
        RELEASE_MATRIX_ARCH: descriptor.architecture,
      },
    };
  } catch (error) {
    await rm(scratchDirectory, { recursive: true, force: true });
    throw error;
  }
}

export function withVariables(
  env: BuildEnvironment,
  variables: Readonly<Record<string, string>>
): BuildEnvironment {
  return { ...env, environmentVariables: { ...env.environmentVariables, ...variables } };
}

export async function disposeBuildEnvironment(env: BuildEnvironment): Promise<void> {
  await rm(env.scratchDirectory, { recursive: true, force: true });
}
