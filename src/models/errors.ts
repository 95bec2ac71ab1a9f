/**
 * Error values carried through Result types
 */

import type { OutcomeStatus } from './states.js';

// Malformed or duplicate matrix entries, bad settings
export interface ConfigError {
  readonly kind: 'CONFIG';
  readonly message: string;
  readonly issues: readonly string[];
}

// Toolchain could not be installed or located
export interface ProvisionError {
  readonly kind: 'PROVISION';
  readonly message: string;
  readonly tool?: string;
  readonly diagnostics?: string;
}

// Build procedure exited non-zero or timed out
export interface BuildFailedError {
  readonly kind: 'BUILD_FAILED';
  readonly message: string;
  readonly exitCode: number | null;
  readonly timedOut: boolean;
  readonly diagnostics: string;
}

// Build exited 0 but the declared output is absent
export interface ArtifactMissingError {
  readonly kind: 'ARTIFACT_MISSING';
  readonly message: string;
  readonly expectedPath: string;
}

// Publishing failed after exhausting retries
export interface UploadError {
  readonly kind: 'UPLOAD';
  readonly message: string;
  readonly attempts: number;
  readonly status?: number;
}

export type StageError = ProvisionError | BuildFailedError | ArtifactMissingError | UploadError;

export function configError(message: string, issues: readonly string[] = []): ConfigError {
  return { kind: 'CONFIG', message, issues };
}

export function outcomeStatusFor(error: StageError): OutcomeStatus {
  switch (error.kind) {
    case 'PROVISION':
      return 'provisionFailed';
    case 'BUILD_FAILED':
      return 'buildFailed';
    case 'ARTIFACT_MISSING':
      return 'artifactMissing';
    case 'UPLOAD':
      return 'uploadFailed';
  }
}

/**
 * Text an operator can act on without re-running the pipeline
 */
export function describeStageError(error: StageError): string {
  switch (error.kind) {
    case 'PROVISION':
      return error.diagnostics ? `${error.message}\n${error.diagnostics}` : error.message;
    case 'BUILD_FAILED':
      return error.diagnostics.length > 0 ? `${error.message}\n${error.diagnostics}` : error.message;
    case 'ARTIFACT_MISSING':
      return `${error.message} (expected at ${error.expectedPath})`;
    case 'UPLOAD':
      return `${error.message} after ${error.attempts} attempt(s)`;
  }
}

export function formatConfigError(error: ConfigError): string {
  if (error.issues.length === 0) {
    return error.message;
  }
  return [error.message, ...error.issues.map((issue) => `  - ${issue}`)].join('\n');
}
