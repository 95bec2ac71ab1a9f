/**
 * Target pipeline - one instance per matrix target
 *
 * PENDING -> PROVISIONING -> BUILDING -> VALIDATING -> PUBLISHING -> SUCCEEDED
 * Any stage may end in FAILED. Cancellation is checked between stages only;
 * a stage already started runs to its own completion or timeout.
 */

import type { Logger } from 'pino';
import type {
  BuildOutcome,
  OutcomeStatus,
  PipelineState,
  PublishedAsset,
  RunId,
  StageError,
  TargetDescriptor,
} from '../models/index.js';
import { canTransition, describeStageError, errorMessage, outcomeStatusFor } from '../models/index.js';
import type { Executor } from '../executors/index.js';
import type { ArtifactLocator } from '../services/artifacts.js';
import type { ReleasePublisher } from '../services/publisher.js';
import type { ReleaseTarget } from '../services/release-client.js';
import type { ProvisionerFactory } from '../toolchain/index.js';
import { disposeBuildEnvironment, type BuildEnvironment, type WorkspaceMode } from '../toolchain/index.js';

export interface TransitionEvent {
  runId: RunId;
  artifactName: string;
  from: PipelineState;
  to: PipelineState;
  payload: Record<string, unknown>;
}

export interface PipelineDeps {
  provisioners: ProvisionerFactory;
  executor: Executor;
  locator: ArtifactLocator;
  publisher: ReleasePublisher;
  onTransition?: (event: TransitionEvent) => void;
}

export interface PipelineSettings {
  sourceDir: string;
  workspace: WorkspaceMode;
  provisionTimeoutMs: number;
  buildTimeoutMs: number;
}

// Status reported when an unexpected exception escapes a stage
const STAGE_FAILURE_STATUS: Partial<Record<PipelineState, OutcomeStatus>> = {
  PROVISIONING: 'provisionFailed',
  BUILDING: 'buildFailed',
  VALIDATING: 'artifactMissing',
  PUBLISHING: 'uploadFailed',
};

export class TargetPipeline {
  private state: PipelineState = 'PENDING';
  private readonly logger: Logger;
  private startedAt: number | undefined;

  constructor(
    private readonly runId: RunId,
    private readonly descriptor: TargetDescriptor,
    private readonly release: ReleaseTarget,
    private readonly deps: PipelineDeps,
    private readonly settings: PipelineSettings,
    private readonly signal: AbortSignal,
    logger: Logger
  ) {
    this.logger = logger.child({ artifactName: descriptor.artifactName });
  }

  async run(): Promise<BuildOutcome> {
    if (this.signal.aborted) {
      return this.cancel('Run cancelled before this target started');
    }

    this.startedAt = Date.now();
    let env: BuildEnvironment | undefined;

    try {
      this.transition('PROVISIONING', { platform: this.descriptor.platformOS });
      const provisioner = this.deps.provisioners(this.descriptor.platformOS);
      const provisioned = await provisioner.provision(this.descriptor, {
        sourceDir: this.settings.sourceDir,
        workspace: this.settings.workspace,
        timeoutMs: this.settings.provisionTimeoutMs,
        logger: this.logger,
      });
      if (!provisioned.ok) {
        return this.fail(provisioned.error);
      }
      env = provisioned.value;

      if (this.signal.aborted) {
        return this.cancel('Run cancelled after provisioning');
      }
      this.transition('BUILDING', {
        procedure: this.descriptor.buildProcedureRef,
        args: this.descriptor.buildProcedureArgs,
        workingDirectory: env.workingDirectory,
      });
      const built = await this.deps.executor.execute(this.descriptor, env, {
        timeoutMs: this.settings.buildTimeoutMs,
      });
      if (!built.ok) {
        return this.fail(built.error);
      }

      if (this.signal.aborted) {
        return this.cancel('Run cancelled after building');
      }
      this.transition('VALIDATING', { durationMs: built.value.durationMs });
      const located = await this.deps.locator.locate(this.descriptor, env.workingDirectory);
      if (!located.ok) {
        return this.fail(located.error);
      }

      if (this.signal.aborted) {
        return this.cancel('Run cancelled before publishing');
      }
      this.transition('PUBLISHING', { artifactPath: located.value.path, size: located.value.size });
      const published = await this.deps.publisher.publish(
        located.value.path,
        this.descriptor.artifactName,
        this.release
      );
      if (!published.ok) {
        return this.fail(published.error);
      }

      return this.succeed(located.value.path, published.value);
    } catch (error) {
      return this.crash(error);
    } finally {
      if (env) {
        const owned = env;
        await disposeBuildEnvironment(owned).catch((error: unknown) => {
          this.logger.warn(
            { error: errorMessage(error), scratch: owned.scratchDirectory },
            'Failed to remove build environment'
          );
        });
      }
    }
  }

  private transition(to: PipelineState, payload: Record<string, unknown> = {}): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new Error(`Illegal pipeline transition ${from} -> ${to} for ${this.descriptor.artifactName}`);
    }
    this.state = to;
    this.logger.debug({ from, to }, 'Pipeline transition');
    this.deps.onTransition?.({
      runId: this.runId,
      artifactName: this.descriptor.artifactName,
      from,
      to,
      payload,
    });
  }

  private baseOutcome(status: OutcomeStatus, stage: PipelineState): BuildOutcome {
    const finishedAt = Date.now();
    return {
      artifactName: this.descriptor.artifactName,
      platformOS: this.descriptor.platformOS,
      architecture: this.descriptor.architecture,
      status,
      stage,
      ...(this.startedAt !== undefined
        ? { startedAt: this.startedAt, finishedAt, durationMs: finishedAt - this.startedAt }
        : {}),
    };
  }

  private succeed(artifactPath: string, asset: PublishedAsset): BuildOutcome {
    this.transition('SUCCEEDED', { assetName: asset.assetName, attempts: asset.attempts });
    this.logger.info({ tagRef: this.release.tagRef }, 'Target succeeded');
    return { ...this.baseOutcome('success', 'SUCCEEDED'), artifactPath, asset };
  }

  private fail(error: StageError): BuildOutcome {
    const stage = this.state;
    const diagnostics = describeStageError(error);
    this.transition('FAILED', { kind: error.kind, message: error.message });
    this.logger.warn({ stage, kind: error.kind, message: error.message }, 'Target failed');
    return { ...this.baseOutcome(outcomeStatusFor(error), stage), diagnostics };
  }

  private crash(error: unknown): BuildOutcome {
    const stage = this.state;
    const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
    this.logger.error({ stage, error: errorMessage(error) }, 'Unexpected error in pipeline');

    if (canTransition(stage, 'FAILED')) {
      this.transition('FAILED', { kind: 'INTERNAL', message: errorMessage(error) });
    }
    const status = STAGE_FAILURE_STATUS[stage] ?? 'buildFailed';
    return { ...this.baseOutcome(status, stage), diagnostics: `Unexpected error during ${stage}: ${message}` };
  }

  private cancel(reason: string): BuildOutcome {
    const stage = this.state;
    this.transition('CANCELLED', { reason });
    this.logger.info({ stage, reason }, 'Target cancelled');
    return { ...this.baseOutcome('cancelled', stage), diagnostics: reason };
  }
}
