/**
 * Orchestration driver - fans out one pipeline per target and aggregates a report
 */

import type { Logger } from 'pino';
import type {
  BuildOutcome,
  ConfigError,
  FailurePolicy,
  Result,
  RunId,
  RunReport,
  TargetDescriptor,
} from '../models/index.js';
import { Ok, Err, configError, errorMessage } from '../models/index.js';
import type { EventsRepository, RunsRepository } from '../db/index.js';
import type { ReleaseTarget } from '../services/release-client.js';
import { generateRunId } from '../utils/ids.js';
import { TargetPipeline, type PipelineDeps, type PipelineSettings, type TransitionEvent } from './pipeline.js';

export interface DriverOptions extends PipelineSettings {
  policy: FailurePolicy;
  maxConcurrency: number;
}

export interface RunLedger {
  runs: RunsRepository;
  events: EventsRepository;
}

export interface DriverDeps extends Omit<PipelineDeps, 'onTransition'> {
  ledger?: RunLedger;
}

export class OrchestrationDriver {
  constructor(
    private readonly deps: DriverDeps,
    private readonly options: DriverOptions,
    private readonly logger: Logger
  ) {}

  /**
   * Run every target once. A ConfigError is returned before any target starts;
   * all per-target failures are folded into the report instead.
   */
  async run(
    matrix: readonly TargetDescriptor[],
    release: ReleaseTarget,
    runId: RunId = generateRunId()
  ): Promise<Result<RunReport, ConfigError>> {
    const invalid = this.checkMatrix(matrix);
    if (invalid) {
      return Err(invalid);
    }

    const startedAt = Date.now();
    const policy = this.options.policy;
    const logger = this.logger.child({ runId, tagRef: release.tagRef });
    this.recordRunStart(runId, release, startedAt, logger);

    const controller = new AbortController();
    const outcomes = new Map<string, BuildOutcome>();
    const pipelineDeps: PipelineDeps = {
      provisioners: this.deps.provisioners,
      executor: this.deps.executor,
      locator: this.deps.locator,
      publisher: this.deps.publisher,
      onTransition: (event) => this.recordTransition(event, logger),
    };

    logger.info(
      { targets: matrix.map((target) => target.artifactName), policy, maxConcurrency: this.options.maxConcurrency },
      'Release run started'
    );

    // Worker loops pull the next pending target; at most maxConcurrency are in flight
    let cursor = 0;
    const work = async (): Promise<void> => {
      for (;;) {
        const descriptor = matrix[cursor++];
        if (!descriptor) {
          return;
        }

        const pipeline = new TargetPipeline(
          runId,
          descriptor,
          release,
          pipelineDeps,
          this.options,
          controller.signal,
          logger
        );
        const outcome = await pipeline.run();
        outcomes.set(descriptor.artifactName, outcome);

        if (
          policy === 'fail-fast' &&
          outcome.status !== 'success' &&
          outcome.status !== 'cancelled' &&
          !controller.signal.aborted
        ) {
          logger.warn(
            { artifactName: descriptor.artifactName, status: outcome.status },
            'Fail-fast: cancelling remaining targets'
          );
          controller.abort();
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.options.maxConcurrency, matrix.length));
    await Promise.all(Array.from({ length: workerCount }, () => work()));

    const ordered: Record<string, BuildOutcome> = {};
    for (const descriptor of matrix) {
      const outcome = outcomes.get(descriptor.artifactName);
      if (outcome) {
        ordered[descriptor.artifactName] = outcome;
      }
    }

    const releaseAssets = await this.listReleaseAssets(Object.values(ordered), release, logger);
    const report: RunReport = {
      runId,
      tagRef: release.tagRef,
      policy,
      startedAt,
      finishedAt: Date.now(),
      succeeded: Object.values(ordered).every((outcome) => outcome.status === 'success'),
      outcomes: ordered,
      ...(releaseAssets ? { releaseAssets } : {}),
    };

    this.recordRunEnd(report, logger);
    logger.info(
      {
        succeeded: report.succeeded,
        failed: Object.values(ordered)
          .filter((outcome) => outcome.status !== 'success')
          .map((outcome) => `${outcome.artifactName}:${outcome.status}`),
        durationMs: report.finishedAt - startedAt,
      },
      'Release run finished'
    );

    return Ok(report);
  }

  private checkMatrix(matrix: readonly TargetDescriptor[]): ConfigError | null {
    if (matrix.length === 0) {
      return configError('No targets scheduled for this run');
    }
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const target of matrix) {
      if (seen.has(target.artifactName)) {
        duplicates.add(target.artifactName);
      }
      seen.add(target.artifactName);
    }
    if (duplicates.size > 0) {
      return configError(
        'Matrix declares the same artifactName more than once',
        [...duplicates].map((name) => `duplicate artifactName "${name}"`)
      );
    }
    return null;
  }

  private async listReleaseAssets(
    outcomes: readonly BuildOutcome[],
    release: ReleaseTarget,
    logger: Logger
  ): Promise<string[] | undefined> {
    if (!outcomes.some((outcome) => outcome.status === 'success')) {
      return undefined;
    }
    const assets = await this.deps.publisher.releaseAssets(release);
    if (!assets.ok) {
      logger.warn({ error: assets.error }, 'Failed to list release assets');
      return undefined;
    }
    logger.info({ assets: assets.value }, 'Release assets');
    return assets.value;
  }

  private recordRunStart(runId: RunId, release: ReleaseTarget, startedAt: number, logger: Logger): void {
    const ledger = this.deps.ledger;
    if (!ledger) {
      return;
    }
    const result = ledger.runs.create({ id: runId, tagRef: release.tagRef, policy: this.options.policy, startedAt });
    if (!result.ok) {
      logger.warn({ error: result.error }, 'Failed to record run');
    }
  }

  private recordRunEnd(report: RunReport, logger: Logger): void {
    const ledger = this.deps.ledger;
    if (!ledger) {
      return;
    }
    const result = ledger.runs.complete(report);
    if (!result.ok) {
      logger.warn({ error: result.error }, 'Failed to record run report');
    }
  }

  private recordTransition(event: TransitionEvent, logger: Logger): void {
    const ledger = this.deps.ledger;
    if (!ledger) {
      return;
    }
    try {
      const result = ledger.events.create({
        runId: event.runId,
        artifactName: event.artifactName,
        fromState: event.from,
        toState: event.to,
        payload: event.payload,
      });
      if (!result.ok) {
        logger.warn({ artifactName: event.artifactName, error: result.error }, 'Failed to log event');
      }
    } catch (error) {
      logger.warn({ artifactName: event.artifactName, error: errorMessage(error) }, 'Failed to log event');
    }
  }
}
