/**
 * Build executor
 * Runs a target's build procedure inside its prepared environment
 */

import { extname } from 'path';
import type { BuildFailedError, Result, TargetDescriptor } from '../models/index.js';
import { Ok, Err } from '../models/index.js';
import type { BuildEnvironment } from '../toolchain/index.js';
import type { BuildRun, ExecuteOptions, Executor, Invocation, ProcedureInvoker } from './base.js';

/**
 * Scripts run through their interpreter so the matrix can name them directly,
 * the way the release workflow ran `bash tools/build_desktop.sh`.
 */
export function resolveInvocation(
  descriptor: TargetDescriptor,
  env: BuildEnvironment,
  timeoutMs?: number
): Invocation {
  const ref = descriptor.buildProcedureRef;
  const args = descriptor.buildProcedureArgs;
  const base = {
    workingDirectory: env.workingDirectory,
    environmentVariables: env.environmentVariables,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  };

  switch (extname(ref).toLowerCase()) {
    case '.sh':
      return { ...base, procedure: 'bash', args: [ref, ...args] };
    case '.ps1':
      return { ...base, procedure: 'pwsh', args: ['-NoProfile', '-NonInteractive', '-File', ref, ...args] };
    case '.cmd':
    case '.bat':
      return { ...base, procedure: 'cmd.exe', args: ['/d', '/s', '/c', ref, ...args] };
    default:
      return { ...base, procedure: ref, args: [...args] };
  }
}

export class BuildExecutor implements Executor {
  readonly name = 'build-procedure';

  constructor(private readonly invoker: ProcedureInvoker) {}

  async execute(
    descriptor: TargetDescriptor,
    env: BuildEnvironment,
    options: ExecuteOptions = {}
  ): Promise<Result<BuildRun, BuildFailedError>> {
    const invocation = resolveInvocation(descriptor, env, options.timeoutMs);
    const startedAt = Date.now();
    const result = await this.invoker.invoke(invocation);
    const durationMs = Date.now() - startedAt;
    const command = [invocation.procedure, ...invocation.args].join(' ');

    if (result.timedOut) {
      return Err({
        kind: 'BUILD_FAILED',
        message: `Build procedure timed out after ${options.timeoutMs ?? 0}ms: ${command}`,
        exitCode: result.exitCode,
        timedOut: true,
        diagnostics: result.output,
      });
    }

    if (result.exitCode !== 0) {
      return Err({
        kind: 'BUILD_FAILED',
        message:
          result.exitCode === null
            ? `Build procedure did not run to completion: ${command}`
            : `Build procedure exited with code ${result.exitCode}: ${command}`,
        exitCode: result.exitCode,
        timedOut: false,
        diagnostics: result.output,
      });
    }

    return Ok({ exitCode: 0, output: result.output, durationMs });
  }
}
