/**
 * Build executor interfaces
 */

import type { BuildFailedError, Result, TargetDescriptor } from '../models/index.js';
import type { BuildEnvironment } from '../toolchain/index.js';

export interface Invocation {
  procedure: string;
  args: readonly string[];
  workingDirectory: string;
  environmentVariables: Readonly<Record<string, string>>;
  timeoutMs?: number;
}

export interface InvocationResult {
  /** null when the process never produced an exit code (spawn failure, kill) */
  exitCode: number | null;
  output: string;
  timedOut: boolean;
}

/**
 * Runs an external build procedure. Its internals are opaque to the engine.
 */
export interface ProcedureInvoker {
  invoke(invocation: Invocation): Promise<InvocationResult>;
}

export interface BuildRun {
  exitCode: number;
  output: string;
  durationMs: number;
}

export interface ExecuteOptions {
  timeoutMs?: number;
}

export interface Executor {
  readonly name: string;
  execute(
    descriptor: TargetDescriptor,
    env: BuildEnvironment,
    options?: ExecuteOptions
  ): Promise<Result<BuildRun, BuildFailedError>>;
}
