/**
 * State machine definitions for the per-target pipeline
 */

export const PipelineStates = {
  PENDING: 'PENDING',
  PROVISIONING: 'PROVISIONING',
  BUILDING: 'BUILDING',
  VALIDATING: 'VALIDATING',
  PUBLISHING: 'PUBLISHING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type PipelineState = (typeof PipelineStates)[keyof typeof PipelineStates];

export type TerminalState = Extract<PipelineState, 'SUCCEEDED' | 'FAILED' | 'CANCELLED'>;

export function isTerminalState(state: PipelineState): state is TerminalState {
  return state === 'SUCCEEDED' || state === 'FAILED' || state === 'CANCELLED';
}

// Outcome status reported per artifact
export const OutcomeStatuses = {
  SUCCESS: 'success',
  PROVISION_FAILED: 'provisionFailed',
  BUILD_FAILED: 'buildFailed',
  ARTIFACT_MISSING: 'artifactMissing',
  UPLOAD_FAILED: 'uploadFailed',
  CANCELLED: 'cancelled',
} as const;

export type OutcomeStatus = (typeof OutcomeStatuses)[keyof typeof OutcomeStatuses];

export const FailurePolicies = {
  FAIL_FAST: 'fail-fast',
  FAIL_INDEPENDENT: 'fail-independent',
} as const;

export type FailurePolicy = (typeof FailurePolicies)[keyof typeof FailurePolicies];

// Exhaustiveness checking
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}

const STAGE_ORDER: readonly PipelineState[] = [
  'PENDING',
  'PROVISIONING',
  'BUILDING',
  'VALIDATING',
  'PUBLISHING',
];

/**
 * Stages only move forward, one at a time. Any active state may fail;
 * cancellation is taken between stages, never once publishing has started.
 */
export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (isTerminalState(from)) {
    return false;
  }

  switch (to) {
    case 'FAILED':
      return from !== 'PENDING';
    case 'CANCELLED':
      return from !== 'PUBLISHING';
    case 'SUCCEEDED':
      return from === 'PUBLISHING';
    case 'PENDING':
      return false;
    case 'PROVISIONING':
    case 'BUILDING':
    case 'VALIDATING':
    case 'PUBLISHING':
      return STAGE_ORDER.indexOf(to) === STAGE_ORDER.indexOf(from) + 1;
    default:
      return assertNever(to);
  }
}
