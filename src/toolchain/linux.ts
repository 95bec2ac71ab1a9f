import type { InstallPlan, ToolInstaller } from './base.js';
import { BaseProvisioner } from './base.js';
import { assertNever, type ToolRequirement } from '../models/index.js';

export interface LinuxProvisionerOptions {
  /** Prefix apt-get with sudo; off when already running as root */
  useSudo?: boolean;
}

export class LinuxProvisioner extends BaseProvisioner {
  readonly platform = 'linux' as const;

  private readonly useSudo: boolean;

  constructor(installer: ToolInstaller, options: LinuxProvisionerOptions = {}) {
    super(installer);
    this.useSudo = options.useSudo ?? (typeof process.getuid === 'function' && process.getuid() !== 0);
  }

  protected override searchDirectories(requirement: ToolRequirement): string[] {
    const major = this.versionMajor(requirement);
    if (requirement.tool === 'llvm' && major !== undefined) {
      return [`/usr/lib/llvm-${major}/bin`];
    }
    if (requirement.tool === 'rust' && process.env['HOME']) {
      return [`${process.env['HOME']}/.cargo/bin`];
    }
    return [];
  }

  protected installPlan(requirement: ToolRequirement): InstallPlan | null {
    const major = this.versionMajor(requirement);
    let packages: string[];
    switch (requirement.tool) {
      case 'llvm':
        packages = major !== undefined ? [`clang-${major}`, `libclang-${major}-dev`] : ['clang', 'libclang-dev'];
        break;
      case 'nasm':
        packages = ['nasm'];
        break;
      case 'cmake':
        packages = ['cmake'];
        break;
      case 'ninja':
        packages = ['ninja-build'];
        break;
      case 'rust':
        return this.rustupPlan(requirement);
      default:
        return assertNever(requirement.tool);
    }

    // Fresh CI images ship without package lists
    const script = `apt-get update -qq && apt-get install -y --no-install-recommends ${packages.join(' ')}`;
    return this.useSudo
      ? { command: 'sudo', args: ['-n', 'sh', '-c', script] }
      : { command: 'sh', args: ['-c', script] };
  }
}
