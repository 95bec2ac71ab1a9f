/**
 * Package-manager backed tool installer
 */

import { execa } from 'execa';
import { realpath } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { PlatformOS } from '../models/index.js';
import type { InstallOutcome, InstallPlan, LibraryLayout, LocatedTool, ToolInstaller } from './base.js';
import { pathVariableName } from './environment.js';

const PROBE_TIMEOUT_MS = 30_000;

export class CommandToolInstaller implements ToolInstaller {
  constructor(private readonly platform: PlatformOS) {}

  async locate(
    binary: string,
    searchPath: string,
    variables: Readonly<Record<string, string>> = {}
  ): Promise<LocatedTool | null> {
    const finder = this.platform === 'windows' ? 'where' : 'which';
    const found = await execa(finder, [binary], {
      env: { ...variables, [pathVariableName()]: searchPath },
      reject: false,
      timeout: PROBE_TIMEOUT_MS,
    });
    if (found.exitCode !== 0) {
      return null;
    }

    // `where` lists every match; the first one is what a child process would run
    const binaryPath = found.stdout.split(/\r?\n/)[0]?.trim();
    if (!binaryPath) {
      return null;
    }

    const probe = await execa(binaryPath, ['--version'], {
      env: { ...variables },
      reject: false,
      all: true,
      timeout: PROBE_TIMEOUT_MS,
    });
    const output = probe.all ?? probe.stdout;
    return { binaryPath, version: probe.exitCode === 0 ? firstVersionLine(output) : null };
  }

  async install(plan: InstallPlan, timeoutMs: number): Promise<InstallOutcome> {
    const result = await execa(plan.command, plan.args, {
      reject: false,
      all: true,
      timeout: timeoutMs,
    });
    return {
      ok: result.exitCode === 0 && !result.timedOut,
      output: result.all ?? `${result.stdout}\n${result.stderr}`,
      timedOut: result.timedOut,
    };
  }

  async resolveLibraryPath(binaryPath: string, layout: LibraryLayout): Promise<string> {
    const binDir = dirname(await realpath(binaryPath));
    return layout === 'bin' ? binDir : resolve(binDir, '..', 'lib');
  }
}

function firstVersionLine(output: string): string | null {
  const line = output.split(/\r?\n/).find((candidate) => /\d+\.\d+/.test(candidate));
  return line?.trim() ?? null;
}
