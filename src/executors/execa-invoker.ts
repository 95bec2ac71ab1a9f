/**
 * execa-backed procedure invoker
 */

import { execa } from 'execa';
import { errorMessage } from '../models/index.js';
import type { Invocation, InvocationResult, ProcedureInvoker } from './base.js';

export class ExecaInvoker implements ProcedureInvoker {
  async invoke(invocation: Invocation): Promise<InvocationResult> {
    const execOptions: {
      cwd: string;
      env: Record<string, string>;
      extendEnv: boolean;
      timeout?: number;
      reject: boolean;
      all: boolean;
    } = {
      cwd: invocation.workingDirectory,
      env: { ...invocation.environmentVariables },
      extendEnv: true, // Target variables are merged over the inherited environment
      reject: false, // Don't throw on non-zero exit
      all: true, // Combine stdout and stderr
    };

    if (invocation.timeoutMs !== undefined) {
      execOptions.timeout = invocation.timeoutMs;
    }

    try {
      const result = await execa(invocation.procedure, [...invocation.args], execOptions);
      const output = result.all ?? [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n');
      const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
      // With reject: false a spawn failure comes back as the error object itself
      let failureNote = '';
      if (exitCode === null) {
        if ('shortMessage' in result && typeof result.shortMessage === 'string') {
          failureNote = result.shortMessage;
        } else if (result.signal) {
          failureNote = `Terminated by ${result.signal}`;
        }
      }

      return {
        exitCode,
        output: failureNote ? `${output}\n${failureNote}`.trim() : output,
        timedOut: result.timedOut,
      };
    } catch (error) {
      return {
        exitCode: null,
        output: `Failed to start ${invocation.procedure}: ${errorMessage(error)}`,
        timedOut: false,
      };
    }
  }
}
