/**
 * release-matrix library entry point
 */

export * from './models/index.js';
export { loadConfig, detectHostPlatform, type Config, type ConfigOverrides } from './config/index.js';
export { parseMatrix, loadMatrix, selectTargets, type TargetFilter, type TargetSelection } from './matrix/loader.js';
export * from './toolchain/index.js';
export * from './executors/index.js';
export { ArtifactLocator, type LocatedArtifact } from './services/artifacts.js';
export * from './services/release-client.js';
export { DirectoryReleaseClient } from './services/directory-releases.js';
export { GitHubReleaseClient, type GitHubReleaseClientOptions } from './services/github-releases.js';
export { ReleasePublisher, type PublisherOptions } from './services/publisher.js';
export { formatReport, formatHistory } from './services/report.js';
export { TargetPipeline, type PipelineDeps, type PipelineSettings, type TransitionEvent } from './core/pipeline.js';
export { OrchestrationDriver, type DriverDeps, type DriverOptions, type RunLedger } from './core/driver.js';
export { createRuntime, createReleaseClient, openLedger, type Runtime, type RuntimeOverrides } from './core/runtime.js';
export { createConnection, runMigrations, RunsRepository, EventsRepository } from './db/index.js';
export { createLogger, createSilentLogger } from './utils/logger.js';
export { generateRunId } from './utils/ids.js';
