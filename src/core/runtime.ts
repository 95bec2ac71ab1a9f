/**
 * Runtime assembly - builds the driver and its collaborators from configuration
 */

import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { createConnection, runMigrations, EventsRepository, RunsRepository } from '../db/index.js';
import { BuildExecutor, ExecaInvoker, type ProcedureInvoker } from '../executors/index.js';
import { ArtifactLocator } from '../services/artifacts.js';
import { DirectoryReleaseClient } from '../services/directory-releases.js';
import { GitHubReleaseClient } from '../services/github-releases.js';
import { ReleasePublisher } from '../services/publisher.js';
import type { ReleaseClient } from '../services/release-client.js';
import { provisionerRegistry, type ToolInstaller } from '../toolchain/index.js';
import { assertNever, type PlatformOS } from '../models/index.js';
import { OrchestrationDriver, type RunLedger } from './driver.js';

export interface RuntimeOverrides {
  releaseClient?: ReleaseClient;
  invoker?: ProcedureInvoker;
  installer?: (platform: PlatformOS) => ToolInstaller;
}

export interface Runtime {
  driver: OrchestrationDriver;
  releaseClient: ReleaseClient;
  ledger: RunLedger;
  close: () => void;
}

export function createReleaseClient(config: Config): ReleaseClient {
  const release = config.release;
  switch (release.backend) {
    case 'directory':
      return new DirectoryReleaseClient(release.directory);
    case 'github':
      if (!release.repository) {
        throw new Error('GITHUB_REPOSITORY is required for the github release backend');
      }
      return new GitHubReleaseClient({
        repository: release.repository,
        apiUrl: release.apiUrl,
        uploadUrl: release.uploadUrl,
        ...(release.token !== undefined ? { token: release.token } : {}),
      });
    default:
      return assertNever(release.backend);
  }
}

export function openLedger(config: Config): { ledger: RunLedger; close: () => void } {
  const { db, close } = createConnection(config.storage.sqlitePath, { mode: config.storage.mode });
  runMigrations(db);
  return { ledger: { runs: new RunsRepository(db), events: new EventsRepository(db) }, close };
}

export function createRuntime(config: Config, logger: Logger, overrides: RuntimeOverrides = {}): Runtime {
  const releaseClient = overrides.releaseClient ?? createReleaseClient(config);
  const { ledger, close } = openLedger(config);

  const publisher = new ReleasePublisher(
    releaseClient,
    {
      maxAttempts: config.upload.maxAttempts,
      initialDelayMs: config.upload.initialDelayMs,
      backoffFactor: config.upload.backoffFactor,
      maxDelayMs: config.upload.maxDelayMs,
      attemptTimeoutMs: config.timeouts.uploadSec * 1000,
      ...(config.release.token !== undefined ? { token: config.release.token } : {}),
    },
    logger.child({ component: 'publisher', backend: releaseClient.name })
  );

  const driver = new OrchestrationDriver(
    {
      provisioners: provisionerRegistry(overrides.installer),
      executor: new BuildExecutor(overrides.invoker ?? new ExecaInvoker()),
      locator: new ArtifactLocator(),
      publisher,
      ledger,
    },
    {
      policy: config.run.failurePolicy,
      maxConcurrency: config.run.maxConcurrency,
      sourceDir: config.run.sourceDir,
      workspace: config.run.workspace,
      provisionTimeoutMs: config.timeouts.provisionSec * 1000,
      buildTimeoutMs: config.timeouts.buildSec * 1000,
    },
    logger
  );

  logger.debug(
    { backend: releaseClient.name, storage: config.storage.mode, workspace: config.run.workspace },
    'Runtime initialized'
  );

  return { driver, releaseClient, ledger, close };
}
