/**
 * Target matrix loader
 * Reads the YAML matrix file and turns it into frozen target descriptors
 */

import { readFile } from 'fs/promises';
import * as yaml from 'yaml';
import type { ZodIssue } from 'zod';
import {
  MatrixFileSchema,
  type MatrixFile,
  type PlatformOS,
  type TargetDescriptor,
  type ToolRequirement,
  type ConfigError,
  type Result,
  Ok,
  Err,
  configError,
  errorMessage,
} from '../models/index.js';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function freezeRequirement(requirement: ToolRequirement): ToolRequirement {
  return Object.freeze({
    ...requirement,
    ...(requirement.platforms ? { platforms: Object.freeze([...requirement.platforms]) } : {}),
  });
}

function toDescriptors(file: MatrixFile): TargetDescriptor[] {
  const defaults = file.defaults;

  return file.targets.map((entry) => {
    const requirements = [...(defaults?.requires ?? []), ...entry.requires].map(freezeRequirement);

    const descriptor: TargetDescriptor = {
      platformOS: entry.os,
      architecture: entry.arch ?? defaults?.arch ?? 'x64',
      artifactName: entry.artifactName,
      buildProcedureRef: entry.procedure,
      buildProcedureArgs: Object.freeze([...entry.args]),
      toolchainRequirements: Object.freeze(requirements),
      ...(entry.workingDirectory !== undefined ? { workingDirectory: entry.workingDirectory } : {}),
      ...(entry.artifactDirectory !== undefined ? { artifactDirectory: entry.artifactDirectory } : {}),
      env: Object.freeze({ ...(defaults?.env ?? {}), ...entry.env }),
    };

    return Object.freeze(descriptor);
  });
}

/**
 * Parse matrix text. `source` names the file in error messages.
 */
export function parseMatrix(text: string, source: string = 'matrix'): Result<readonly TargetDescriptor[], ConfigError> {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    return Err(configError(`Matrix ${source} is not valid YAML: ${errorMessage(error)}`));
  }

  if (document === null || document === undefined) {
    return Err(configError(`Matrix ${source} is empty`));
  }

  const parsed = MatrixFileSchema.safeParse(document);
  if (!parsed.success) {
    return Err(configError(`Matrix ${source} is invalid`, parsed.error.issues.map(formatIssue)));
  }

  return Ok(Object.freeze(toDescriptors(parsed.data)));
}

export async function loadMatrix(path: string): Promise<Result<readonly TargetDescriptor[], ConfigError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return Err(configError(`Cannot read matrix file ${path}: ${errorMessage(error)}`));
  }
  return parseMatrix(text, path);
}

export interface TargetFilter {
  /** Artifact names to keep; empty keeps every target */
  artifactNames?: readonly string[];
  /** Only targets built on this host OS */
  hostPlatform?: PlatformOS;
}

export interface TargetSelection {
  scheduled: readonly TargetDescriptor[];
  skipped: readonly TargetDescriptor[];
}

/**
 * Split the matrix into targets this process runs and targets left to other hosts.
 * Naming an artifact that the matrix does not declare is a configuration error.
 */
export function selectTargets(
  matrix: readonly TargetDescriptor[],
  filter: TargetFilter
): Result<TargetSelection, ConfigError> {
  const wanted = filter.artifactNames ?? [];
  const known = new Set<string>(matrix.map((target) => target.artifactName));
  const unknown = wanted.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    return Err(
      configError(
        'Requested targets are not in the matrix',
        unknown.map((name) => `unknown artifactName "${name}"`)
      )
    );
  }

  const scheduled: TargetDescriptor[] = [];
  const skipped: TargetDescriptor[] = [];
  for (const target of matrix) {
    const named = wanted.length === 0 || wanted.includes(target.artifactName);
    const onHost = filter.hostPlatform === undefined || filter.hostPlatform === target.platformOS;
    if (named && onHost) {
      scheduled.push(target);
    } else {
      skipped.push(target);
    }
  }

  return Ok({ scheduled, skipped });
}
