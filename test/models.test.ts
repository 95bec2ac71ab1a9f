/**
 * Model and state machine tests
 */

import { describe, test, expect } from 'vitest';
import { canTransition, isTerminalState, PipelineStates, type PipelineState } from '../src/models/states.js';
import { asArtifactName, asRunId, isArtifactName, isTagRef, tagName, asTagRef } from '../src/models/brands.js';
import { configError, describeStageError, formatConfigError, outcomeStatusFor } from '../src/models/errors.js';
import { BuildOutcomeSchema, ToolRequirementSchema } from '../src/models/schemas.js';
import { generateRunId } from '../src/utils/ids.js';

const ALL_STATES = Object.values(PipelineStates);

describe('Pipeline state machine', () => {
  test('happy path moves one stage at a time', () => {
    expect(canTransition('PENDING', 'PROVISIONING')).toBe(true);
    expect(canTransition('PROVISIONING', 'BUILDING')).toBe(true);
    expect(canTransition('BUILDING', 'VALIDATING')).toBe(true);
    expect(canTransition('VALIDATING', 'PUBLISHING')).toBe(true);
    expect(canTransition('PUBLISHING', 'SUCCEEDED')).toBe(true);
  });

  test('stages cannot be skipped or revisited', () => {
    expect(canTransition('PENDING', 'BUILDING')).toBe(false);
    expect(canTransition('PROVISIONING', 'PUBLISHING')).toBe(false);
    expect(canTransition('BUILDING', 'PROVISIONING')).toBe(false);
    expect(canTransition('VALIDATING', 'SUCCEEDED')).toBe(false);
  });

  test('every active stage may fail, PENDING may not', () => {
    expect(canTransition('PENDING', 'FAILED')).toBe(false);
    for (const state of ['PROVISIONING', 'BUILDING', 'VALIDATING', 'PUBLISHING'] as const) {
      expect(canTransition(state, 'FAILED')).toBe(true);
    }
  });

  test('cancellation is refused once publishing has started', () => {
    expect(canTransition('PENDING', 'CANCELLED')).toBe(true);
    expect(canTransition('VALIDATING', 'CANCELLED')).toBe(true);
    expect(canTransition('PUBLISHING', 'CANCELLED')).toBe(false);
  });

  test('terminal states are absorbing', () => {
    const terminal: PipelineState[] = ['SUCCEEDED', 'FAILED', 'CANCELLED'];
    for (const from of terminal) {
      expect(isTerminalState(from)).toBe(true);
      for (const to of ALL_STATES) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
    expect(isTerminalState('PUBLISHING')).toBe(false);
  });
});

describe('Branded types', () => {
  test('artifact names must be plain file names', () => {
    expect(isArtifactName('libisar_linux.so')).toBe(true);
    expect(isArtifactName('isar_windows.dll')).toBe(true);
    expect(isArtifactName('../escape.so')).toBe(false);
    expect(isArtifactName('dir/lib.so')).toBe(false);
    expect(isArtifactName('')).toBe(false);
    expect(() => asArtifactName('a b')).toThrow('Invalid artifact name: a b');
  });

  test('tag refs reject blanks and whitespace', () => {
    expect(isTagRef('refs/tags/v1.2.3')).toBe(true);
    expect(isTagRef('  ')).toBe(false);
    expect(isTagRef('v1 .2')).toBe(false);
  });

  test('branch and other non-tag refs are not tags', () => {
    expect(isTagRef('v1.2.3')).toBe(true);
    expect(isTagRef('refs/heads/main')).toBe(false);
    expect(isTagRef('refs/pull/7/merge')).toBe(false);
    expect(isTagRef('refs/tags/')).toBe(false);
    expect(() => asTagRef('refs/heads/main')).toThrow('Invalid tag ref: "refs/heads/main"');
  });

  test('tagName strips the refs/tags/ prefix', () => {
    expect(tagName(asTagRef('refs/tags/v1.2.3'))).toBe('v1.2.3');
    expect(tagName(asTagRef('v1.2.3'))).toBe('v1.2.3');
  });

  test('generated run ids are valid RunIds', () => {
    const id = generateRunId(1_700_000_000_000);
    expect(id.startsWith(`run_${(1_700_000_000_000).toString(36)}_`)).toBe(true);
    expect(asRunId(id)).toBe(id);
    expect(() => asRunId('job-1')).toThrow('Invalid RunId: job-1');
  });
});

describe('Errors', () => {
  test('each stage error maps to its outcome status', () => {
    expect(outcomeStatusFor({ kind: 'PROVISION', message: 'x' })).toBe('provisionFailed');
    expect(
      outcomeStatusFor({ kind: 'BUILD_FAILED', message: 'x', exitCode: 1, timedOut: false, diagnostics: '' })
    ).toBe('buildFailed');
    expect(outcomeStatusFor({ kind: 'ARTIFACT_MISSING', message: 'x', expectedPath: '/p' })).toBe('artifactMissing');
    expect(outcomeStatusFor({ kind: 'UPLOAD', message: 'x', attempts: 3 })).toBe('uploadFailed');
  });

  test('describeStageError keeps the diagnostics', () => {
    expect(
      describeStageError({
        kind: 'BUILD_FAILED',
        message: 'Build procedure exited with code 2: bash build.sh',
        exitCode: 2,
        timedOut: false,
        diagnostics: 'error[E0425]: cannot find value',
      })
    ).toBe('Build procedure exited with code 2: bash build.sh\nerror[E0425]: cannot find value');
    expect(describeStageError({ kind: 'ARTIFACT_MISSING', message: 'gone', expectedPath: '/w/lib.so' })).toBe(
      'gone (expected at /w/lib.so)'
    );
    expect(describeStageError({ kind: 'UPLOAD', message: 'HTTP 500', attempts: 5 })).toBe(
      'HTTP 500 after 5 attempt(s)'
    );
  });

  test('formatConfigError lists issues', () => {
    expect(formatConfigError(configError('Bad matrix', ['targets.0.os: Required']))).toBe(
      'Bad matrix\n  - targets.0.os: Required'
    );
    expect(formatConfigError(configError('Bad matrix'))).toBe('Bad matrix');
  });
});

describe('Schemas', () => {
  test('tool requirements accept aliases and the short form', () => {
    expect(ToolRequirementSchema.parse('clang')).toEqual({ tool: 'llvm' });
    expect(ToolRequirementSchema.parse({ tool: 'Assembler', platforms: ['windows'] })).toEqual({
      tool: 'nasm',
      platforms: ['windows'],
    });
    expect(ToolRequirementSchema.safeParse('gcc').success).toBe(false);
    expect(ToolRequirementSchema.safeParse({ tool: 'llvm', version: 'latest' }).success).toBe(false);
  });

  test('BuildOutcomeSchema rejects unknown statuses', () => {
    const outcome = {
      artifactName: 'libisar_linux.so',
      platformOS: 'linux',
      architecture: 'x64',
      status: 'success',
      stage: 'SUCCEEDED',
    };
    expect(BuildOutcomeSchema.safeParse(outcome).success).toBe(true);
    expect(BuildOutcomeSchema.safeParse({ ...outcome, status: 'done' }).success).toBe(false);
  });
});
