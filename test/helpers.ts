/**
 * Shared test doubles
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { asArtifactName, type TargetDescriptor } from '../src/models/index.js';
import type { InstallOutcome, InstallPlan, LibraryLayout, LocatedTool, ToolInstaller } from '../src/toolchain/index.js';
import type { Invocation, InvocationResult, ProcedureInvoker } from '../src/executors/index.js';

export function target(
  artifactName: string,
  overrides: Partial<Omit<TargetDescriptor, 'artifactName'>> = {}
): TargetDescriptor {
  return {
    platformOS: 'linux',
    architecture: 'x64',
    buildProcedureRef: 'tools/build_desktop.sh',
    buildProcedureArgs: [],
    toolchainRequirements: [],
    env: {},
    ...overrides,
    artifactName: asArtifactName(artifactName),
  };
}

export async function tempDir(prefix: string): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const path = await mkdtemp(join(tmpdir(), `${prefix}-`));
  return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

/**
 * Installer whose host starts with `present` tools. `afterInstall` maps a
 * package name to the binaries that appear once a plan naming it has run.
 */
export class FakeInstaller implements ToolInstaller {
  readonly plans: InstallPlan[] = [];
  readonly lookups: Array<{ binary: string; searchPath: string }> = [];
  readonly layouts: LibraryLayout[] = [];
  private readonly tools: Map<string, LocatedTool>;

  constructor(
    present: Record<string, LocatedTool> = {},
    private readonly afterInstall: Record<string, Record<string, LocatedTool>> = {},
    private readonly outcome: InstallOutcome = { ok: true, output: 'installed', timedOut: false }
  ) {
    this.tools = new Map(Object.entries(present));
  }

  async locate(binary: string, searchPath: string): Promise<LocatedTool | null> {
    this.lookups.push({ binary, searchPath });
    return this.tools.get(binary) ?? null;
  }

  async install(plan: InstallPlan, _timeoutMs: number): Promise<InstallOutcome> {
    this.plans.push(plan);
    if (this.outcome.ok) {
      for (const [pkg, binaries] of Object.entries(this.afterInstall)) {
        if (!plan.args.flatMap((arg) => arg.split(' ')).includes(pkg)) {
          continue;
        }
        for (const [binary, tool] of Object.entries(binaries)) {
          this.tools.set(binary, tool);
        }
      }
    }
    return this.outcome;
  }

  async resolveLibraryPath(binaryPath: string, layout: LibraryLayout): Promise<string> {
    this.layouts.push(layout);
    const binDir = binaryPath.slice(0, binaryPath.lastIndexOf('/'));
    return layout === 'bin' ? binDir : `${binDir.slice(0, binDir.lastIndexOf('/'))}/lib`;
  }
}

export type InvocationHandler = (invocation: Invocation) => Promise<InvocationResult>;

/**
 * Invoker that writes the target's artifact into its working directory,
 * unless a handler for that target says otherwise.
 */
export class FakeInvoker implements ProcedureInvoker {
  readonly invocations: Invocation[] = [];

  constructor(private readonly handlers: Record<string, InvocationHandler> = {}) {}

  async invoke(invocation: Invocation): Promise<InvocationResult> {
    this.invocations.push(invocation);
    const name = invocation.environmentVariables['RELEASE_MATRIX_TARGET'] ?? '';
    const handler = this.handlers[name];
    if (handler) {
      return handler(invocation);
    }
    await writeFile(join(invocation.workingDirectory, name), `binary:${name}`);
    return { exitCode: 0, output: `built ${name}`, timedOut: false };
  }
}
