#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { loadConfig, resolveTagRef, type ConfigOverrides } from './config/index.js';
import { loadMatrix, selectTargets } from './matrix/loader.js';
import { createRuntime, openLedger } from './core/runtime.js';
import { formatEvents, formatHistory, formatReport } from './services/report.js';
import { createLogger } from './utils/logger.js';
import { errorMessage, formatConfigError, isRunId } from './models/index.js';

const EXIT_FAILED = 1;
const EXIT_CONFIG = 2;

interface RunOptions {
  tag?: string;
  matrix?: string;
  policy?: string;
  concurrency?: number;
  target: string[];
  allPlatforms?: boolean;
  dryRun?: boolean;
  backend?: string;
  outDir?: string;
  report?: string;
  sourceDir?: string;
  workspace?: string;
  storage?: string;
  sqlite?: string;
  logLevel?: string;
}

interface ValidateOptions {
  matrix?: string;
}

interface HistoryOptions {
  sqlite?: string;
  tag?: string;
  limit: number;
}

interface ShowOptions {
  sqlite?: string;
  events?: boolean;
  target?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

async function run(opts: RunOptions): Promise<number> {
  const tag = resolveTagRef(opts.tag);
  if (!tag.ok) {
    console.error(tag.error);
    return EXIT_CONFIG;
  }

  const overrides: ConfigOverrides = {
    matrixFile: opts.matrix,
    sourceDir: opts.sourceDir,
    failurePolicy: opts.policy,
    maxConcurrency: opts.concurrency,
    workspace: opts.workspace,
    targets: opts.target.length > 0 ? opts.target : undefined,
    allPlatforms: opts.allPlatforms,
    dryRun: opts.dryRun,
    backend: opts.backend,
    releaseDirectory: opts.outDir,
    storage: opts.storage,
    sqlitePath: opts.sqlite ? resolve(opts.sqlite) : undefined,
    logLevel: opts.logLevel,
  };
  const configResult = loadConfig(overrides);
  if (!configResult.ok) {
    console.error(configResult.error);
    return EXIT_CONFIG;
  }
  const config = configResult.value;
  const logger = createLogger(config.logging);

  const matrix = await loadMatrix(config.run.matrixFile);
  if (!matrix.ok) {
    console.error(formatConfigError(matrix.error));
    return EXIT_CONFIG;
  }

  const selection = selectTargets(matrix.value, {
    artifactNames: config.run.targets,
    ...(config.run.hostPlatform !== undefined ? { hostPlatform: config.run.hostPlatform } : {}),
  });
  if (!selection.ok) {
    console.error(formatConfigError(selection.error));
    return EXIT_CONFIG;
  }
  if (selection.value.skipped.length > 0) {
    logger.info(
      { skipped: selection.value.skipped.map((target) => target.artifactName), host: config.run.hostPlatform },
      'Targets not scheduled on this host'
    );
  }

  const runtime = createRuntime(config, logger);
  try {
    const result = await runtime.driver.run(selection.value.scheduled, { tagRef: tag.value });
    if (!result.ok) {
      console.error(formatConfigError(result.error));
      return EXIT_CONFIG;
    }

    const report = result.value;
    console.log(formatReport(report));
    if (opts.report) {
      await writeFile(resolve(opts.report), `${JSON.stringify(report, null, 2)}\n`, 'utf8');
      logger.info({ path: resolve(opts.report) }, 'Run report written');
    }
    return report.succeeded ? 0 : EXIT_FAILED;
  } finally {
    runtime.close();
  }
}

async function validate(opts: ValidateOptions): Promise<number> {
  const path = opts.matrix ?? process.env['RELEASE_MATRIX_FILE'] ?? './release-matrix.yaml';
  const matrix = await loadMatrix(path);
  if (!matrix.ok) {
    console.error(formatConfigError(matrix.error));
    return EXIT_CONFIG;
  }

  for (const target of matrix.value) {
    const tools = target.toolchainRequirements
      .map((requirement) => (requirement.version ? `${requirement.tool}@${requirement.version}` : requirement.tool))
      .join(', ');
    console.log(
      `${target.artifactName}  ${target.platformOS}/${target.architecture}  ${target.buildProcedureRef}` +
        (tools ? `  [${tools}]` : '')
    );
  }
  console.log(`${matrix.value.length} target(s) OK`);
  return 0;
}

function openHistoryLedger(sqlite: string | undefined): ReturnType<typeof openLedger> | string {
  // Reading the ledger publishes nothing, so no release credentials are needed
  const configResult = loadConfig({
    storage: 'sqlite',
    backend: 'directory',
    ...(sqlite ? { sqlitePath: resolve(sqlite) } : {}),
  });
  if (!configResult.ok) {
    return configResult.error;
  }
  return openLedger(configResult.value);
}

function history(opts: HistoryOptions): number {
  const opened = openHistoryLedger(opts.sqlite);
  if (typeof opened === 'string') {
    console.error(opened);
    return EXIT_CONFIG;
  }

  const { ledger, close } = opened;
  try {
    const records = ledger.runs.listRecent(opts.limit, opts.tag);
    if (!records.ok) {
      console.error(records.error);
      return EXIT_FAILED;
    }
    console.log(formatHistory(records.value));
    return 0;
  } finally {
    close();
  }
}

function show(runId: string, opts: ShowOptions): number {
  if (!isRunId(runId)) {
    console.error(`Invalid run id: ${runId}`);
    return EXIT_CONFIG;
  }
  const opened = openHistoryLedger(opts.sqlite);
  if (typeof opened === 'string') {
    console.error(opened);
    return EXIT_CONFIG;
  }

  const { ledger, close } = opened;
  try {
    const record = ledger.runs.getById(runId);
    if (!record.ok) {
      console.error(record.error);
      return EXIT_FAILED;
    }
    if (!record.value) {
      console.error(`Run not found: ${runId}`);
      return EXIT_FAILED;
    }

    console.log(
      record.value.report
        ? formatReport(record.value.report)
        : `Run ${runId} for ${record.value.tagRef} has not finished`
    );

    if (opts.events) {
      const events = ledger.events.listByRun(runId, opts.target);
      if (!events.ok) {
        console.error(events.error);
        return EXIT_FAILED;
      }
      console.log(formatEvents(events.value));
    }
    return 0;
  } finally {
    close();
  }
}

function finish(code: Promise<number> | number): void {
  Promise.resolve(code)
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = EXIT_FAILED;
    });
}

const program = new Command();
program.name('release-matrix').description('Build every matrix target and publish its artifact to a tagged release').version('0.1.0');

program
  .command('run')
  .description('Provision, build, validate and publish every scheduled target')
  .option('--tag <ref>', 'Release tag (refs/tags/v1.2.3 or v1.2.3); defaults to RELEASE_TAG or GITHUB_REF')
  .option('--matrix <file>', 'Target matrix file')
  .option('--policy <policy>', 'Failure policy (fail-fast|fail-independent)')
  .option('--concurrency <n>', 'Maximum targets in flight', positiveInt)
  .option('--target <artifactName>', 'Only run this target (repeatable)', collect, [])
  .option('--all-platforms', 'Schedule targets for every OS, not only this host')
  .option('--dry-run', 'Publish into a local directory instead of the release backend')
  .option('--backend <backend>', 'Release backend (github|directory)')
  .option('--out-dir <dir>', 'Directory used by the directory backend')
  .option('--report <file>', 'Write the run report as JSON')
  .option('--source-dir <dir>', 'Source tree the build procedures run in')
  .option('--workspace <mode>', 'Workspace per target (copy|shared)')
  .option('--storage <mode>', 'Run ledger storage (memory|sqlite)')
  .option('--sqlite <path>', 'SQLite file path when using --storage sqlite')
  .option('--log-level <level>', 'Log level (trace|debug|info|warn|error)')
  .action((opts: RunOptions) => finish(run(opts)));

program
  .command('validate')
  .description('Check the target matrix and list its targets')
  .option('--matrix <file>', 'Target matrix file')
  .action((opts: ValidateOptions) => finish(validate(opts)));

program
  .command('history')
  .description('List recorded runs from the SQLite ledger')
  .option('--sqlite <path>', 'SQLite file path')
  .option('--tag <ref>', 'Only runs for this tag')
  .option('--limit <n>', 'Number of runs to show', positiveInt, 20)
  .action((opts: HistoryOptions) => finish(history(opts)));

program
  .command('show')
  .description('Print the report of a recorded run')
  .argument('<runId>', 'Run id as printed by run or history')
  .option('--sqlite <path>', 'SQLite file path')
  .option('--events', 'Also list every state transition')
  .option('--target <artifactName>', 'Only transitions of this target')
  .action((runId: string, opts: ShowOptions) => finish(show(runId, opts)));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(EXIT_FAILED);
});
