import type { InstallPlan } from './base.js';
import { BaseProvisioner } from './base.js';
import { assertNever, type ToolRequirement } from '../models/index.js';

// Homebrew keeps LLVM keg-only, so its binaries are never linked onto PATH
const BREW_PREFIXES = ['/opt/homebrew', '/usr/local'];

export class MacosProvisioner extends BaseProvisioner {
  readonly platform = 'macos' as const;

  private formula(requirement: ToolRequirement): string {
    const major = this.versionMajor(requirement);
    switch (requirement.tool) {
      case 'llvm':
        return major !== undefined ? `llvm@${major}` : 'llvm';
      case 'nasm':
      case 'cmake':
      case 'ninja':
      case 'rust':
        return requirement.tool;
      default:
        return assertNever(requirement.tool);
    }
  }

  protected override searchDirectories(requirement: ToolRequirement): string[] {
    if (requirement.tool === 'llvm') {
      const formula = this.formula(requirement);
      return BREW_PREFIXES.map((prefix) => `${prefix}/opt/${formula}/bin`);
    }
    if (requirement.tool === 'rust' && process.env['HOME']) {
      return [`${process.env['HOME']}/.cargo/bin`];
    }
    return BREW_PREFIXES.map((prefix) => `${prefix}/bin`);
  }

  protected installPlan(requirement: ToolRequirement): InstallPlan | null {
    if (requirement.tool === 'rust') {
      return this.rustupPlan(requirement);
    }
    return { command: 'brew', args: ['install', this.formula(requirement)] };
  }
}
