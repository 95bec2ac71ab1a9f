import type { InstallPlan, LibraryLayout } from './base.js';
import { BaseProvisioner } from './base.js';
import type { ToolName, ToolRequirement } from '../models/index.js';

const PROGRAM_FILES = process.env['ProgramFiles'] ?? 'C:\\Program Files';

// Chocolatey installs land here; the running process does not see the new PATH
const INSTALL_DIRS: Readonly<Record<ToolName, string[]>> = {
  llvm: [`${PROGRAM_FILES}\\LLVM\\bin`],
  nasm: [`${PROGRAM_FILES}\\NASM`],
  cmake: [`${PROGRAM_FILES}\\CMake\\bin`],
  ninja: ['C:\\ProgramData\\chocolatey\\bin'],
  rust: [`${process.env['USERPROFILE'] ?? 'C:\\Users\\Default'}\\.cargo\\bin`],
};

export class WindowsProvisioner extends BaseProvisioner {
  readonly platform = 'windows' as const;

  protected override binaryName(tool: ToolName): string {
    return `${super.binaryName(tool)}.exe`;
  }

  // libclang.dll ships next to clang.exe
  protected override libraryLayout(_tool: ToolName): LibraryLayout {
    return 'bin';
  }

  protected override searchDirectories(requirement: ToolRequirement): string[] {
    return INSTALL_DIRS[requirement.tool];
  }

  protected installPlan(requirement: ToolRequirement): InstallPlan | null {
    if (requirement.tool === 'rust') {
      return this.rustupPlan(requirement);
    }

    const args = ['install', requirement.tool, '-y', '--no-progress'];
    const version = requirement.version?.replace(/^>=\s*/, '');
    // choco pins exact versions; "11" means the 11.0.0 package
    if (version !== undefined) {
      const parts = version.split('.');
      while (parts.length < 3) {
        parts.push('0');
      }
      args.push(`--version=${parts.join('.')}`);
    }
    return { command: 'choco', args };
  }
}
