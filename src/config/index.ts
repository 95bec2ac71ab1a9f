/**
 * Configuration loader
 * Loads from environment variables, .env file and CLI overrides
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigSchema, type Config } from './schema.js';
import { type Result, Ok, Err, errorMessage, isTagRef, type PlatformOS, type TagRef } from '../models/index.js';

loadDotenv();

type Env = Readonly<Record<string, string | undefined>>;

export interface ConfigOverrides {
  matrixFile?: string;
  sourceDir?: string;
  failurePolicy?: string;
  maxConcurrency?: number;
  workspace?: string;
  targets?: string[];
  allPlatforms?: boolean;
  dryRun?: boolean;
  backend?: string;
  releaseDirectory?: string;
  storage?: string;
  sqlitePath?: string;
  logLevel?: string;
}

function getEnvNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function getEnvList(env: Env, key: string): string[] | undefined {
  const value = env[key];
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function detectHostPlatform(platform: NodeJS.Platform = process.platform): PlatformOS | undefined {
  switch (platform) {
    case 'linux':
      return 'linux';
    case 'darwin':
      return 'macos';
    case 'win32':
      return 'windows';
    default:
      return undefined;
  }
}

/**
 * The release tag of this run: `--tag`, else RELEASE_TAG, else the GITHUB_REF
 * of the triggering push
 */
export function resolveTagRef(explicit: string | undefined, env: Env = process.env): Result<TagRef, string> {
  const tag = explicit ?? env['RELEASE_TAG'] ?? env['GITHUB_REF'];
  if (tag === undefined || tag.trim() === '') {
    return Err('A release tag is required: pass --tag or set RELEASE_TAG / GITHUB_REF');
  }
  if (!isTagRef(tag)) {
    return Err(`Not a release tag: ${tag} (expected refs/tags/<name> or a bare tag name)`);
  }
  return Ok(tag);
}

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): Result<Config, string> {
  try {
    const storageMode = overrides.storage ?? env['RELEASE_MATRIX_STORAGE'] ?? 'memory';
    const sqlitePath =
      overrides.sqlitePath ??
      env['RELEASE_MATRIX_SQLITE_PATH'] ??
      (storageMode === 'sqlite' ? './.tmp/release-matrix.sqlite' : ':memory:');

    const allPlatforms = overrides.allPlatforms ?? getEnvBoolean(env, 'ALL_PLATFORMS') ?? false;
    const backend = overrides.dryRun ? 'directory' : (overrides.backend ?? env['RELEASE_BACKEND']);

    const config = {
      run: {
        matrixFile: overrides.matrixFile ?? env['RELEASE_MATRIX_FILE'],
        sourceDir: overrides.sourceDir ?? env['SOURCE_DIR'],
        failurePolicy: overrides.failurePolicy ?? env['FAILURE_POLICY'],
        maxConcurrency: overrides.maxConcurrency ?? getEnvNumber(env, 'MAX_CONCURRENCY'),
        workspace: overrides.workspace ?? env['WORKSPACE_MODE'],
        hostPlatform: allPlatforms ? undefined : detectHostPlatform(),
        targets: overrides.targets ?? getEnvList(env, 'RELEASE_TARGETS'),
      },
      timeouts: {
        provisionSec: getEnvNumber(env, 'PROVISION_TIMEOUT_SEC'),
        buildSec: getEnvNumber(env, 'BUILD_TIMEOUT_SEC'),
        uploadSec: getEnvNumber(env, 'UPLOAD_TIMEOUT_SEC'),
      },
      upload: {
        maxAttempts: getEnvNumber(env, 'UPLOAD_MAX_ATTEMPTS'),
        initialDelayMs: getEnvNumber(env, 'UPLOAD_INITIAL_DELAY_MS'),
        backoffFactor: getEnvNumber(env, 'UPLOAD_BACKOFF_FACTOR'),
        maxDelayMs: getEnvNumber(env, 'UPLOAD_MAX_DELAY_MS'),
      },
      release: {
        backend,
        repository: env['GITHUB_REPOSITORY'],
        apiUrl: env['GITHUB_API_URL'],
        uploadUrl: env['GITHUB_UPLOAD_URL'],
        token: env['RELEASE_TOKEN'] ?? env['GITHUB_TOKEN'],
        directory: overrides.releaseDirectory ?? env['RELEASE_DIRECTORY'],
      },
      storage: {
        mode: storageMode,
        sqlitePath,
      },
      logging: {
        level: overrides.logLevel ?? env['LOG_LEVEL'],
        pretty: getEnvBoolean(env, 'LOG_PRETTY'),
      },
    };

    const parsed = ConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return Err(`Invalid configuration: ${issues.join('; ')}`);
    }

    return Ok(parsed.data);
  } catch (error) {
    return Err(`Failed to load configuration: ${errorMessage(error)}`);
  }
}

export type { Config } from './schema.js';
