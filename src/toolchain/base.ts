/**
 * Toolchain provisioning shared by every platform.
 * Platform classes only say how a tool is named, where it hides and how it
 * gets installed; the ensure/verify/export flow lives here.
 */

import { dirname } from 'path';
import type { Logger } from 'pino';
import type {
  PlatformOS,
  ProvisionError,
  Result,
  TargetDescriptor,
  ToolName,
  ToolRequirement,
} from '../models/index.js';
import { Ok, Err, errorMessage } from '../models/index.js';
import {
  createBuildEnvironment,
  disposeBuildEnvironment,
  pathVariableName,
  prependToPath,
  withVariables,
  type BuildEnvironment,
  type WorkspaceMode,
} from './environment.js';
import { majorOf, satisfiesMinimum } from './version.js';

export interface LocatedTool {
  binaryPath: string;
  version: string | null;
}

export interface InstallPlan {
  command: string;
  args: string[];
}

export interface InstallOutcome {
  ok: boolean;
  output: string;
  timedOut: boolean;
}

export type LibraryLayout = 'bin' | 'lib';

/**
 * Host-side installer. Implementations talk to the package manager and PATH.
 */
export interface ToolInstaller {
  /** `variables` are set, over the inherited environment, for the lookup and the version probe */
  locate(binary: string, searchPath: string, variables?: Readonly<Record<string, string>>): Promise<LocatedTool | null>;
  install(plan: InstallPlan, timeoutMs: number): Promise<InstallOutcome>;
  resolveLibraryPath(binaryPath: string, layout: LibraryLayout): Promise<string>;
}

export interface ProvisionContext {
  sourceDir: string;
  workspace: WorkspaceMode;
  timeoutMs: number;
  logger: Logger;
  inheritedEnv?: Readonly<Record<string, string | undefined>>;
}

export interface Provisioner {
  readonly platform: PlatformOS;
  provision(descriptor: TargetDescriptor, context: ProvisionContext): Promise<Result<BuildEnvironment, ProvisionError>>;
}

const BINARIES: Readonly<Record<ToolName, string>> = {
  llvm: 'clang',
  nasm: 'nasm',
  rust: 'cargo',
  cmake: 'cmake',
  ninja: 'ninja',
};

// rustup toolchain name: a channel, or the version a ">=" constraint starts from
function rustToolchain(requirement: ToolRequirement): string | undefined {
  return requirement.version?.replace(/^>=\s*/, '');
}

interface EnsuredTool {
  tool: LocatedTool;
  installed: boolean;
}

export abstract class BaseProvisioner implements Provisioner {
  abstract readonly platform: PlatformOS;

  constructor(protected readonly installer: ToolInstaller) {}

  /** Package-manager invocation for a missing tool, or null when there is none */
  protected abstract installPlan(requirement: ToolRequirement): InstallPlan | null;

  /** Where the platform's installers put a tool when it is not on PATH */
  protected searchDirectories(_requirement: ToolRequirement): string[] {
    return [];
  }

  protected binaryName(tool: ToolName): string {
    return BINARIES[tool];
  }

  protected libraryLayout(_tool: ToolName): LibraryLayout {
    return 'lib';
  }

  protected rustupPlan(requirement: ToolRequirement): InstallPlan {
    const toolchain = rustToolchain(requirement) ?? 'stable';
    return { command: 'rustup', args: ['toolchain', 'install', toolchain, '--profile', 'minimal'] };
  }

  /** Variables that select the requested tool; exported to the build as well */
  protected toolVariables(requirement: ToolRequirement): Record<string, string> {
    const toolchain = requirement.tool === 'rust' ? rustToolchain(requirement) : undefined;
    return toolchain !== undefined ? { RUSTUP_TOOLCHAIN: toolchain } : {};
  }

  protected versionMajor(requirement: ToolRequirement): number | undefined {
    return majorOf(requirement.version);
  }

  appliesTo(requirement: ToolRequirement): boolean {
    return requirement.platforms === undefined || requirement.platforms.includes(this.platform);
  }

  async provision(
    descriptor: TargetDescriptor,
    context: ProvisionContext
  ): Promise<Result<BuildEnvironment, ProvisionError>> {
    const logger = context.logger.child({ stage: 'provision', platform: this.platform });

    let env: BuildEnvironment;
    try {
      env = await createBuildEnvironment(descriptor, {
        sourceDir: context.sourceDir,
        workspace: context.workspace,
      });
    } catch (error) {
      return Err({
        kind: 'PROVISION',
        message: `Failed to prepare build environment: ${errorMessage(error)}`,
      });
    }

    const inherited = context.inheritedEnv ?? process.env;
    const pathKey = pathVariableName(inherited);
    const toolDirectories: string[] = [];
    const exported: Record<string, string> = {};

    for (const requirement of descriptor.toolchainRequirements) {
      if (!this.appliesTo(requirement)) {
        logger.debug({ tool: requirement.tool }, 'Requirement does not apply to this platform');
        continue;
      }

      const searchPath = prependToPath(inherited[pathKey], [...toolDirectories, ...this.searchDirectories(requirement)]);
      const variables = this.toolVariables(requirement);
      const ensured = await this.ensure(requirement, searchPath, variables, context.timeoutMs, logger);
      if (!ensured.ok) {
        await disposeBuildEnvironment(env);
        return ensured;
      }

      const { tool, installed } = ensured.value;
      logger.info({ tool: requirement.tool, version: tool.version, installed }, 'Tool ready');
      toolDirectories.push(dirname(tool.binaryPath));
      Object.assign(exported, variables);

      if (requirement.exportLibraryPath) {
        try {
          const libraryPath = await this.installer.resolveLibraryPath(
            tool.binaryPath,
            this.libraryLayout(requirement.tool)
          );
          exported[requirement.exportLibraryPath] = libraryPath;
          logger.debug({ variable: requirement.exportLibraryPath, libraryPath }, 'Exported library path');
        } catch (error) {
          await disposeBuildEnvironment(env);
          return Err({
            kind: 'PROVISION',
            tool: requirement.tool,
            message: `Cannot resolve library path for ${requirement.tool}: ${errorMessage(error)}`,
          });
        }
      }
    }

    if (toolDirectories.length > 0) {
      exported[pathKey] = prependToPath(inherited[pathKey], toolDirectories);
    }

    return Ok(withVariables(env, exported));
  }

  private async ensure(
    requirement: ToolRequirement,
    searchPath: string,
    variables: Readonly<Record<string, string>>,
    timeoutMs: number,
    logger: Logger
  ): Promise<Result<EnsuredTool, ProvisionError>> {
    const binary = this.binaryName(requirement.tool);

    try {
      const present = await this.installer.locate(binary, searchPath, variables);
      if (present && satisfiesMinimum(present.version, requirement.version)) {
        logger.debug({ tool: requirement.tool, version: present.version }, 'Tool already satisfied');
        return Ok({ tool: present, installed: false });
      }

      const plan = this.installPlan(requirement);
      if (!plan) {
        return Err({
          kind: 'PROVISION',
          tool: requirement.tool,
          message: `No installer for ${requirement.tool} on ${this.platform}`,
        });
      }

      logger.info(
        { tool: requirement.tool, found: present?.version ?? null, wanted: requirement.version ?? 'any' },
        'Installing tool'
      );
      const outcome = await this.installer.install(plan, timeoutMs);
      if (!outcome.ok) {
        return Err({
          kind: 'PROVISION',
          tool: requirement.tool,
          message: outcome.timedOut
            ? `Installing ${requirement.tool} timed out after ${timeoutMs}ms`
            : `Installing ${requirement.tool} failed: ${plan.command} ${plan.args.join(' ')}`,
          diagnostics: outcome.output,
        });
      }

      const installed = await this.installer.locate(binary, searchPath, variables);
      if (!installed) {
        return Err({
          kind: 'PROVISION',
          tool: requirement.tool,
          message: `${binary} not found after installing ${requirement.tool}`,
          diagnostics: outcome.output,
        });
      }
      if (!satisfiesMinimum(installed.version, requirement.version)) {
        return Err({
          kind: 'PROVISION',
          tool: requirement.tool,
          message: `${requirement.tool} ${installed.version ?? '(unknown version)'} does not satisfy ${requirement.version ?? 'any'}`,
        });
      }

      return Ok({ tool: installed, installed: true });
    } catch (error) {
      return Err({
        kind: 'PROVISION',
        tool: requirement.tool,
        message: `Provisioning ${requirement.tool} failed: ${errorMessage(error)}`,
      });
    }
  }
}
